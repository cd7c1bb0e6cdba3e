import { access, unlink, writeFile } from "node:fs/promises";
import path from "node:path";
import { describeError } from "../errors";
import { execFileRunner, LaunchError, type ProcessRunner, type ProcessResult } from "../openscad/runner";
import { sanitizeFilename } from "../sanitize";
import { buildNametagScad } from "./template";
import type { NametagOutcome, NametagRequest } from "./types";

export interface GenerateOptions {
  runner?: ProcessRunner;
  timeoutMs?: number;
}

export function nametagPaths(outputDir: string, name: string) {
  const safeName = sanitizeFilename(name);
  return {
    scriptPath: path.join(outputDir, `temp_${safeName}.scad`),
    outputPath: path.join(outputDir, `${safeName}.stl`),
  };
}

async function exists(file: string): Promise<boolean> {
  try {
    await access(file);
    return true;
  } catch {
    return false;
  }
}

export async function generateNametag(
  toolPath: string,
  request: NametagRequest,
  outputDir: string,
  options: GenerateOptions = {},
): Promise<NametagOutcome> {
  const { runner = execFileRunner, timeoutMs = 60_000 } = options;
  const { scriptPath, outputPath } = nametagPaths(outputDir, request.name);

  try {
    await writeFile(scriptPath, buildNametagScad(request.name, request.params, request.overrides), "utf8");
  } catch (err) {
    return { ok: false, reason: "FILESYSTEM_ERROR", detail: describeError(err) };
  }

  let result: ProcessResult;
  try {
    result = await runner.run(toolPath, ["-o", outputPath, scriptPath], { timeoutMs });
  } catch (err) {
    if (err instanceof LaunchError && err.errno === "ENOENT") {
      return { ok: false, reason: "TOOL_MISSING", detail: err.message };
    }
    return { ok: false, reason: "NON_ZERO_EXIT", detail: describeError(err) };
  }

  if (result.timedOut) return { ok: false, reason: "TIMEOUT" };

  if (result.exitCode !== 0) {
    return { ok: false, reason: "NON_ZERO_EXIT", detail: result.stderr || undefined };
  }

  if (!(await exists(outputPath))) {
    return { ok: false, reason: "FILESYSTEM_ERROR", detail: `no output written to ${outputPath}` };
  }

  try {
    await unlink(scriptPath);
  } catch (err) {
    return { ok: false, reason: "FILESYSTEM_ERROR", detail: describeError(err) };
  }

  return { ok: true, outputPath };
}
