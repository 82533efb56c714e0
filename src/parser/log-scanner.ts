import { LogParseError } from "../errors.js";
import { DISCRIMINATOR_SIZE, EventRegistry } from "./registry.js";
import type { ProgramEvent } from "./types.js";

// Checked in this order; both carry a base64 event envelope
export const PROGRAM_LOG = "Program log: ";
export const PROGRAM_DATA = "Program data: ";

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * Strict base64 decode. Buffer.from(..., "base64") silently skips invalid
 * characters, which would turn plain program output into garbage bytes.
 */
export function decodeBase64(text: string): Buffer | null {
  if (!BASE64_PATTERN.test(text)) return null;
  return Buffer.from(text, "base64");
}

function stripMarker(line: string): string | null {
  if (line.startsWith(PROGRAM_LOG)) return line.slice(PROGRAM_LOG.length);
  if (line.startsWith(PROGRAM_DATA)) return line.slice(PROGRAM_DATA.length);
  return null;
}

export class LogScanner {
  constructor(private registry: EventRegistry) {}

  /**
   * Extract the event embedded in a single log line.
   *
   * Lines without a marker and envelopes with an unknown discriminant yield
   * null. A marker followed by text that is not an event envelope throws
   * LogParseError; a known discriminant with a bad payload throws DecodeError.
   */
  extract(line: string): ProgramEvent | null {
    const encoded = stripMarker(line);
    if (encoded === null) return null;

    const bytes = decodeBase64(encoded);
    if (!bytes) {
      throw new LogParseError("invalid base64");
    }
    if (bytes.length < DISCRIMINATOR_SIZE) {
      throw new LogParseError(`envelope too short (${bytes.length} bytes)`);
    }

    return this.registry.resolve(
      bytes.subarray(0, DISCRIMINATOR_SIZE),
      bytes.subarray(DISCRIMINATOR_SIZE)
    );
  }
}
