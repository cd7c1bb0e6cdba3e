import { z } from "zod";
import { ConfigError } from "./errors";

const ConfigSchema = z.object({
  NAMETAG_CSV_FILE: z.string().min(1).default("names.csv"),
  NAMETAG_OUTPUT_DIR: z.string().min(1).default("generated_nametags"),
  OPENSCAD_PATH: z.string().min(1).optional(),
  NAMETAG_RENDER_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  NAMETAG_PROBE_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
});

export interface Config {
  csvFile: string;
  outputDir: string;
  openscadPath?: string;
  renderTimeoutMs: number;
  probeTimeoutMs: number;
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  // Empty strings count as unset.
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined && value.trim() !== "") present[key] = value;
  }

  const parsed = ConfigSchema.safeParse(present);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(detail);
  }

  const env = parsed.data;
  return {
    csvFile: env.NAMETAG_CSV_FILE,
    outputDir: env.NAMETAG_OUTPUT_DIR,
    openscadPath: env.OPENSCAD_PATH,
    renderTimeoutMs: env.NAMETAG_RENDER_TIMEOUT_MS,
    probeTimeoutMs: env.NAMETAG_PROBE_TIMEOUT_MS,
  };
}
