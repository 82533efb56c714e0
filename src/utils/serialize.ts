/**
 * Convert decoded event values into JSON that PostgreSQL JSONB accepts
 */

import { PublicKey } from "@solana/web3.js";
import type { FieldValue } from "../parser/types.js";

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/**
 * Control characters rejected by (or meaningless in) PostgreSQL text:
 * 0x00 (NULL) - "unsupported Unicode escape sequence" in JSONB
 * 0x01-0x08, 0x0B, 0x0C, 0x0E-0x1F
 *
 * We keep: 0x09 (tab), 0x0A (newline), 0x0D (carriage return)
 */
function isAllowedCodeUnit(code: number): boolean {
  if (code >= 0x20) return true;
  return code === 0x09 || code === 0x0a || code === 0x0d;
}

export function stripControlChars(text: string): string {
  let result = "";
  for (let i = 0; i < text.length; i++) {
    if (isAllowedCodeUnit(text.charCodeAt(i))) {
      result += text[i];
    }
  }
  return result;
}

/**
 * bigint -> decimal string, PublicKey -> base58, bytes -> hex
 */
export function toStorageJson(value: FieldValue): JsonValue {
  if (value === null) return null;
  if (typeof value === "bigint") return value.toString();
  if (typeof value === "string") return stripControlChars(value);
  if (typeof value === "number" || typeof value === "boolean") return value;
  if (value instanceof PublicKey) return value.toBase58();
  if (value instanceof Uint8Array) return Buffer.from(value).toString("hex");
  if (Array.isArray(value)) return value.map(toStorageJson);

  const out: { [key: string]: JsonValue } = {};
  for (const [key, field] of Object.entries(value)) {
    out[key] = toStorageJson(field);
  }
  return out;
}
