export class ConfigError extends Error {
  code = "CONFIG_INVALID" as const;
  constructor(message: string) { super(message); }
}

export class InputMissingError extends Error {
  code = "INPUT_MISSING" as const;
  constructor(public readonly path: string) { super(`CSV file '${path}' not found!`); }
}

export class ToolNotFoundError extends Error {
  code = "TOOL_NOT_FOUND" as const;
  constructor() { super("OpenSCAD not found!"); }
}

export class OutputDirError extends Error {
  code = "OUTPUT_DIR_FAILED" as const;
  constructor(public readonly path: string, cause: unknown) {
    super(`Could not create output directory '${path}': ${describeError(cause)}`);
  }
}

export class InputParseError extends Error {
  code = "INPUT_PARSE_FAILED" as const;
  constructor(message: string) { super(message); }
}

export class NoValidRecordsError extends Error {
  code = "NO_VALID_RECORDS" as const;
  constructor() { super("No valid names found in CSV file!"); }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

// Lines printed to stderr before the process exits with status 1.
export function errorToExitMessage(err: unknown): string[] {
  if (err instanceof InputMissingError) {
    return [
      `Error: ${err.message}`,
      "",
      "Please create a CSV file with at least a 'name' column.",
      "Example CSV content:",
      "name",
      "John Smith",
      "Jane Doe",
      "Alice Johnson",
    ];
  }
  if (err instanceof ToolNotFoundError) {
    return [
      `Error: ${err.message}`,
      "",
      "Please install OpenSCAD from: https://openscad.org/downloads.html",
      "Or ensure it's in your system PATH.",
    ];
  }
  if (err instanceof InputParseError) return [`Error reading CSV file: ${err.message}`];
  if (err instanceof ConfigError) return [`Error: invalid configuration: ${err.message}`];
  if (err instanceof OutputDirError || err instanceof NoValidRecordsError) {
    return [`Error: ${err.message}`];
  }
  return [`Unexpected error: ${describeError(err)}`];
}
