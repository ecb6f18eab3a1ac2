import { createHash, timingSafeEqual } from "node:crypto";
import { inspect } from "node:util";

export const DEFAULT_SESSION_SECRET = "change-me-please";
export const MASKED_SECRET = "****";

function digest(value: string): Buffer {
  return createHash("sha256").update(value, "utf8").digest();
}

/**
 * Process-wide shared credential for privileged routes. Loaded once, never
 * mutated; its value cannot leak through logging, JSON or string conversion.
 */
export class SessionSecret {
  readonly isDefault: boolean;
  readonly #digest: Buffer;

  constructor(value: string) {
    if (value === "") {
      throw new Error("SESSION_SECRET_ERROR secret must be non-empty");
    }
    this.isDefault = value === DEFAULT_SESSION_SECRET;
    this.#digest = digest(value);
  }

  matches(candidate: string | undefined): boolean {
    if (typeof candidate !== "string" || candidate === "") {
      return false;
    }
    return timingSafeEqual(digest(candidate), this.#digest);
  }

  toString(): string {
    return MASKED_SECRET;
  }

  toJSON(): string {
    return MASKED_SECRET;
  }

  [inspect.custom](): string {
    return `SessionSecret(${MASKED_SECRET})`;
  }
}
