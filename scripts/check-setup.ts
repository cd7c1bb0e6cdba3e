import { loadConfig } from "../lib/env";
import { errorToExitMessage } from "../lib/errors";
import { execFileRunner } from "../lib/openscad/runner";
import { checkSetup, reportSetup } from "../lib/setup-check";

console.log("Checking nametag generator setup...");

async function main(): Promise<number> {
  try {
    const config = loadConfig();
    const report = await checkSetup(config, execFileRunner);
    return reportSetup(report);
  } catch (err) {
    for (const line of errorToExitMessage(err)) console.error(line);
    return 1;
  }
}

main()
  .then((code) => process.exit(code))
  .catch((err) => {
    console.error(err);
    process.exit(1);
  });
