export type CellValue = string | number | boolean | null | undefined;

const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

const TRUE_WORDS = new Set(["1", "true", "yes", "y", "t"]);
const FALSE_WORDS = new Set(["0", "false", "no", "n", "f", ""]);

/**
 * Parses a decimal number written with either a point or a comma as the
 * decimal separator. Returns null for anything else.
 */
export function parseDecimal(raw: CellValue): number | null {
  if (raw === null || raw === undefined || typeof raw === "boolean") {
    return null;
  }
  if (typeof raw === "number") {
    return Number.isFinite(raw) ? raw : null;
  }
  const s = raw.trim().replace(/,/g, ".");
  if (!DECIMAL_PATTERN.test(s)) {
    return null;
  }
  const parsed = Number(s);
  return Number.isFinite(parsed) ? parsed : null;
}

export function toFloat(raw: CellValue, fallback = 0): number {
  return parseDecimal(raw) ?? fallback;
}

/**
 * Spreadsheet flag to boolean. Known words first, then the number truncated to
 * an integer, then the truthiness of the text itself.
 */
export function toBool(raw: CellValue): boolean {
  if (raw === null || raw === undefined) {
    return false;
  }
  if (typeof raw === "boolean") {
    return raw;
  }
  if (typeof raw === "number") {
    return Math.trunc(raw) !== 0;
  }
  const v = raw.trim().toLowerCase();
  if (TRUE_WORDS.has(v)) {
    return true;
  }
  if (FALSE_WORDS.has(v)) {
    return false;
  }
  const numeric = parseDecimal(v);
  if (numeric !== null) {
    return Math.trunc(numeric) !== 0;
  }
  return raw.length > 0;
}

export function toText(raw: CellValue): string {
  if (raw === null || raw === undefined) {
    return "";
  }
  return String(raw).trim();
}

/**
 * Empty text becomes null.
 */
export function toOptionalText(raw: CellValue): string | null {
  const text = toText(raw);
  return text ? text : null;
}
