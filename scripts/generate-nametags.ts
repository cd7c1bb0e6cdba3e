#!/usr/bin/env tsx
// USAGE:
// npm start -- [names.csv]
// NAMETAG_OUTPUT_DIR=out OPENSCAD_PATH=/opt/openscad/bin/openscad npm start

import { runCli } from "../lib/cli";

runCli(process.argv.slice(2))
  .then((code) => process.exit(code))
  .catch((err) => {
    console.error(err);
    process.exit(1);
  });
