import { createHash } from "node:crypto";

/** JSON-compatible data, the shape immutable values are projected to. */
export type PlainValue =
  | null
  | string
  | number
  | boolean
  | readonly PlainValue[]
  | { readonly [field: string]: PlainValue };

/**
 * JSON with object keys sorted and no whitespace, so that equal values
 * always encode to the same text.
 */
export function canonicalJson(value: PlainValue): string {
  if (isList(value)) {
    return `[${value.map(canonicalJson).join(",")}]`;
  }
  if (value !== null && typeof value === "object") {
    const entries = Object.keys(value)
      .sort()
      .map((key) => `${JSON.stringify(key)}:${canonicalJson(value[key] ?? null)}`);
    return `{${entries.join(",")}}`;
  }
  return JSON.stringify(value);
}

export function sha256Hex(text: string): string {
  return createHash("sha256").update(text, "utf8").digest("hex");
}

function isList(value: PlainValue): value is readonly PlainValue[] {
  return Array.isArray(value);
}
