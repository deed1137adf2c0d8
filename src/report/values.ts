/**
 * Cell-level helpers shared by the report reader and the enricher
 */

export function isBlank(val: unknown): boolean {
  if (val === undefined || val === null) return true;
  if (typeof val === "string" && val.trim() === "") return true;
  return false;
}

/**
 * Reads the boolean spellings found in exported reports
 * ("true"/"false", "True"/"False", "1"/"0", "yes"/"no").
 * Anything else yields undefined so the caller can decide.
 */
export function parseBooleanLike(value: unknown): boolean | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === "boolean") return value;
  const str = String(value).trim().toLowerCase();
  if (str === "") return undefined;
  if (["true", "1", "yes", "y"].includes(str)) return true;
  if (["false", "0", "no", "n"].includes(str)) return false;
  return undefined;
}

export function textOrDefault(value: string | undefined, fallback: string): string {
  if (value === undefined || isBlank(value)) return fallback;
  return value;
}

export function formatCell(value: unknown): string {
  if (value === undefined || value === null) return "";
  if (typeof value === "boolean") return value ? "true" : "false";
  return String(value);
}
