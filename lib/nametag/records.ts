import { readFile } from "node:fs/promises";
import { TextDecoder } from "node:util";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import { describeError, InputParseError } from "../errors";
import { DEFAULT_PARAMS, PARAM_KEYS, type NametagParams, type NametagRequest, type ParamKey } from "./types";

const Rows = z.array(z.record(z.string(), z.unknown()));

// Plain decimal with optional exponent. Rejects hex, "Infinity" and "NaN".
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function parseParamValue(raw: unknown): number | null {
  if (typeof raw !== "string") return null;
  const trimmed = raw.trim();
  if (!DECIMAL.test(trimmed)) return null;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

export function resolveParams(row: Record<string, unknown>): { params: NametagParams; overrides: ParamKey[] } {
  const params: Record<ParamKey, number> = { ...DEFAULT_PARAMS };
  const overrides: ParamKey[] = [];
  for (const key of PARAM_KEYS) {
    const value = parseParamValue(row[key]);
    if (value === null) continue;
    params[key] = value;
    overrides.push(key);
  }
  return { params, overrides };
}

export function parseRecords(text: string): NametagRequest[] {
  let raw: unknown;
  try {
    raw = parse(text, {
      columns: true,
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
      relax_quotes: true,
    });
  } catch (err) {
    throw new InputParseError(describeError(err));
  }

  const rows = Rows.safeParse(raw);
  if (!rows.success) throw new InputParseError("unexpected CSV row shape");

  const requests: NametagRequest[] = [];
  for (const row of rows.data) {
    const name = typeof row.name === "string" ? row.name.trim() : "";
    if (!name) continue;
    requests.push({ name, ...resolveParams(row) });
  }
  return requests;
}

export async function readRecords(csvPath: string): Promise<NametagRequest[]> {
  let text: string;
  try {
    const bytes = await readFile(csvPath);
    text = new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch (err) {
    throw new InputParseError(describeError(err));
  }
  return parseRecords(text);
}
