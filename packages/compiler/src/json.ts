// Shape checks for JSON inputs (pattern table, AST dumps). Each helper reports
// through `onFail`, so callers choose the diagnostic code.

export type JsonRecord = Record<string, unknown>;

export type ShapeFailure = (message: string) => never;

export function isJsonRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function asRecord(value: unknown, label: string, onFail: ShapeFailure): JsonRecord {
  if (!isJsonRecord(value)) return onFail(`${label} must be a JSON object.`);
  return value;
}

export function asArray(value: unknown, label: string, onFail: ShapeFailure): readonly unknown[] {
  if (!Array.isArray(value)) return onFail(`${label} must be an array.`);
  return value;
}

export function asString(value: unknown, label: string, onFail: ShapeFailure): string {
  if (typeof value !== "string" || value.length === 0) return onFail(`${label} must be a non-empty string.`);
  return value;
}

export function asInteger(value: unknown, label: string, onFail: ShapeFailure): number {
  if (typeof value !== "number" || !Number.isInteger(value)) return onFail(`${label} must be an integer.`);
  return value;
}

export function asStringArray(value: unknown, label: string, onFail: ShapeFailure): readonly string[] {
  const items = asArray(value, label, onFail);
  const out: string[] = [];
  for (const entry of items) {
    if (typeof entry !== "string") return onFail(`${label} must be an array of strings.`);
    out.push(entry);
  }
  return out;
}

export function assertKnownKeys(
  value: JsonRecord,
  allowed: readonly string[],
  label: string,
  onFail: ShapeFailure
): void {
  for (const key of Object.keys(value)) {
    if (!allowed.includes(key)) onFail(`${label}: unknown key '${key}'.`);
  }
}
