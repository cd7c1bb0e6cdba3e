import { access } from "node:fs/promises";
import type { Config } from "./env";
import type { Log } from "./nametag/types";
import { findOpenScad } from "./openscad/locate";
import type { ProcessRunner } from "./openscad/runner";

export interface SetupReport {
  csvFile: { path: string; present: boolean };
  openscad: { path: string | null };
}

export async function checkSetup(config: Config, runner: ProcessRunner, log: Log = console): Promise<SetupReport> {
  const present = await access(config.csvFile).then(
    () => true,
    () => false,
  );
  const openscadPath = await findOpenScad(runner, {
    preferred: config.openscadPath,
    timeoutMs: config.probeTimeoutMs,
    log,
  });
  return { csvFile: { path: config.csvFile, present }, openscad: { path: openscadPath } };
}

export function reportSetup(report: SetupReport, log: Log = console): number {
  let missing = 0;

  if (report.csvFile.present) {
    log.log(`✅ Present: CSV file ${report.csvFile.path}`);
  } else {
    log.error(`❌ Missing: CSV file ${report.csvFile.path}`);
    missing++;
  }

  if (report.openscad.path) {
    log.log(`✅ Present: OpenSCAD ${report.openscad.path}`);
  } else {
    log.error("❌ Missing: OpenSCAD executable");
    missing++;
  }

  if (missing > 0) {
    log.error(`\nTotal Missing: ${missing}`);
    return 1;
  }
  log.log("\nReady to generate nametags.");
  return 0;
}
