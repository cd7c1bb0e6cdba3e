import { generateNametag, type GenerateOptions } from "./generate";
import type { BatchSummary, Log, NametagOutcome, NametagRequest } from "./types";

export interface BatchOptions extends GenerateOptions {
  log?: Log;
}

function outcomeLines(outcome: NametagOutcome): string[] {
  if (outcome.ok) return ["  ✓ Success"];
  if (outcome.reason === "TIMEOUT") return ["  ✗ Timeout"];

  const lines = ["  ✗ Failed"];
  if (outcome.detail) lines.push(`  Error: ${outcome.detail}`);
  return lines;
}

export async function runBatch(
  toolPath: string,
  requests: readonly NametagRequest[],
  outputDir: string,
  options: BatchOptions = {},
): Promise<BatchSummary> {
  const { log = console, ...generateOptions } = options;
  const summary: BatchSummary = {
    total: requests.length,
    successful: 0,
    failed: 0,
    failures: { TOOL_MISSING: 0, NON_ZERO_EXIT: 0, TIMEOUT: 0, FILESYSTEM_ERROR: 0 },
  };

  // Strictly sequential; a later request may overwrite an earlier one's file.
  for (const [i, request] of requests.entries()) {
    // Announced up front; a render can take up to the full timeout.
    log.log(`[${i + 1}/${requests.length}] Generating STL for: ${request.name}...`);
    const outcome = await generateNametag(toolPath, request, outputDir, generateOptions);
    for (const line of outcomeLines(outcome)) log.log(line);

    if (outcome.ok) {
      summary.successful++;
    } else {
      summary.failed++;
      summary.failures[outcome.reason]++;
    }
  }

  return summary;
}
