import { access, mkdir } from "node:fs/promises";
import path from "node:path";
import { loadConfig } from "./env";
import {
  errorToExitMessage,
  InputMissingError,
  NoValidRecordsError,
  OutputDirError,
  ToolNotFoundError,
} from "./errors";
import { runBatch } from "./nametag/batch";
import { readRecords } from "./nametag/records";
import type { BatchSummary, Log } from "./nametag/types";
import { findOpenScad } from "./openscad/locate";
import { execFileRunner, type ProcessRunner } from "./openscad/runner";

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  runner?: ProcessRunner;
  log?: Log;
}

const RULE = "=".repeat(60);

async function fileExists(file: string): Promise<boolean> {
  try {
    await access(file);
    return true;
  } catch {
    return false;
  }
}

async function generateAll(args: readonly string[], runner: ProcessRunner, env: NodeJS.ProcessEnv, log: Log) {
  const config = loadConfig(env);
  const csvFile = args[0] || config.csvFile;

  if (!(await fileExists(csvFile))) throw new InputMissingError(csvFile);

  const toolPath = await findOpenScad(runner, {
    preferred: config.openscadPath,
    timeoutMs: config.probeTimeoutMs,
    log,
  });
  if (!toolPath) throw new ToolNotFoundError();

  try {
    await mkdir(config.outputDir, { recursive: true });
  } catch (err) {
    throw new OutputDirError(config.outputDir, err);
  }
  log.log(`Output directory: ${config.outputDir}`);
  log.log("");

  const requests = await readRecords(csvFile);
  if (requests.length === 0) throw new NoValidRecordsError();

  log.log(`Found ${requests.length} name(s) to process`);
  log.log("");

  const summary = await runBatch(toolPath, requests, config.outputDir, {
    runner,
    timeoutMs: config.renderTimeoutMs,
    log,
  });
  return { summary, outputDir: config.outputDir };
}

function printSummary(log: Log, summary: BatchSummary, outputDir: string) {
  log.log("");
  log.log(RULE);
  log.log("Generation Complete!");
  log.log(`Successful: ${summary.successful}`);
  log.log(`Failed: ${summary.failed}`);
  log.log(`Output location: ${path.resolve(outputDir)}`);
  log.log(RULE);
}

// Returns the process exit status. Per-record failures do not affect it.
export async function runCli(args: readonly string[], deps: CliDeps = {}): Promise<number> {
  const { env = process.env, runner = execFileRunner, log = console } = deps;

  log.log(RULE);
  log.log("Automatic Nametag STL Generator");
  log.log(RULE);
  log.log("");

  try {
    const { summary, outputDir } = await generateAll(args, runner, env, log);
    printSummary(log, summary, outputDir);
    return 0;
  } catch (err) {
    for (const line of errorToExitMessage(err)) log.error(line);
    return 1;
  }
}
