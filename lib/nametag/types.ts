export const PARAM_KEYS = [
  "nametag_width",
  "nametag_height",
  "nametag_thickness",
  "text_size",
  "text_height",
  "ring_width",
  "ring_height",
  "mounting_hole_diameter",
  "corner_radius",
] as const;

export type ParamKey = (typeof PARAM_KEYS)[number];

export type NametagParams = Readonly<Record<ParamKey, number>>;

// Millimetres. Text height is raised above the plate, not engraved.
export const DEFAULT_PARAMS: NametagParams = {
  nametag_width: 80,
  nametag_height: 30,
  nametag_thickness: 3,
  text_size: 8,
  text_height: 1.5,
  ring_width: 3,
  ring_height: 1.2,
  mounting_hole_diameter: 4,
  corner_radius: 3,
};

export interface NametagRequest {
  readonly name: string;
  readonly params: NametagParams;
  // Keys whose value came from the CSV rather than the defaults.
  readonly overrides?: readonly ParamKey[];
}

export type FailureReason = "TOOL_MISSING" | "NON_ZERO_EXIT" | "TIMEOUT" | "FILESYSTEM_ERROR";

export type NametagOutcome =
  | { ok: true; outputPath: string }
  | { ok: false; reason: FailureReason; detail?: string };

export interface BatchSummary {
  total: number;
  successful: number;
  failed: number;
  failures: Record<FailureReason, number>;
}

export type Log = Pick<Console, "log" | "error">;
