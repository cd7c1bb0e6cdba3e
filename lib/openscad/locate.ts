import type { Log } from "../nametag/types";
import type { ProcessRunner } from "./runner";

export const OPENSCAD_CANDIDATES = [
  "openscad", // on PATH
  "/usr/bin/openscad",
  "/usr/local/bin/openscad",
  "C:\\Program Files\\OpenSCAD\\openscad.exe",
  "C:\\Program Files (x86)\\OpenSCAD\\openscad.exe",
  "/Applications/OpenSCAD.app/Contents/MacOS/OpenSCAD",
] as const;

export interface LocateOptions {
  preferred?: string;
  timeoutMs?: number;
  log?: Log;
}

// First candidate that answers `--version` with exit code 0, or null.
export async function findOpenScad(runner: ProcessRunner, options: LocateOptions = {}): Promise<string | null> {
  const { preferred, timeoutMs = 5_000, log = console } = options;
  const candidates = preferred ? [preferred, ...OPENSCAD_CANDIDATES] : [...OPENSCAD_CANDIDATES];

  for (const candidate of candidates) {
    try {
      const result = await runner.run(candidate, ["--version"], { timeoutMs });
      if (result.exitCode === 0 && !result.timedOut) {
        log.log(`Found OpenSCAD at: ${candidate}`);
        return candidate;
      }
    } catch {
      // Missing, not executable, or otherwise unlaunchable: try the next one.
      continue;
    }
  }

  return null;
}
