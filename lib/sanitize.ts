// Anything that is not a letter, digit, space, hyphen or underscore.
const UNSAFE_FILENAME_CHARS = /[^\p{L}\p{N} _-]/gu;

// Filesystem-safe base name for a display name. Distinct names can map to the
// same result ("A/B" and "A B" both give "A_B"); callers do not disambiguate.
export function sanitizeFilename(name: string): string {
  return name.replace(UNSAFE_FILENAME_CHARS, "_").trim().replace(/ /g, "_");
}
