import { invalidInput } from "../../core/errors/core.errors";
import type { JsonObject } from "./web.types";

const USERNAME_MAX_LENGTH = 64;
const PROOFS_MAX_PER_SUBMISSION = 1_000;

export interface PaintRequest {
  readonly x: number;
  readonly y: number;
  readonly color: number;
  readonly userId: string;
}

export interface ReviewProofRequest {
  readonly cardId: number;
  readonly timestamp: number;
}

export interface ReviewSubmissionRequest {
  readonly userId: string;
  readonly proofs: readonly ReviewProofRequest[];
}

function asObject(value: unknown): Record<string, unknown> | null {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return null;
  }
  return value as Record<string, unknown>;
}

export function requireInteger(row: JsonObject, field: string): number {
  const value = row[field];
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw invalidInput(`VALIDATION_ERROR ${field} must be an integer`);
  }
  return value;
}

export function requireFiniteNumber(row: JsonObject, field: string): number {
  const value = row[field];
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw invalidInput(`VALIDATION_ERROR ${field} must be a finite number`);
  }
  return value;
}

export function requireNonEmptyString(row: JsonObject, field: string): string {
  const value = row[field];
  if (typeof value !== "string" || value.trim() === "") {
    throw invalidInput(`VALIDATION_ERROR ${field} must be a non-empty string`);
  }
  return value;
}

export function parseIntegerParam(raw: string | undefined, field: string): number {
  if (typeof raw !== "string" || !/^-?\d+$/.test(raw)) {
    throw invalidInput(`VALIDATION_ERROR ${field} must be an integer`);
  }
  return Number(raw);
}

export function parsePaintRequest(body: JsonObject): PaintRequest {
  return {
    x: requireInteger(body, "x"),
    y: requireInteger(body, "y"),
    color: requireInteger(body, "color"),
    userId: requireNonEmptyString(body, "user_id"),
  };
}

export function parseUsername(body: JsonObject): string {
  const username = requireNonEmptyString(body, "username").trim();
  if (username.length > USERNAME_MAX_LENGTH) {
    throw invalidInput(
      `VALIDATION_ERROR username must be at most ${String(USERNAME_MAX_LENGTH)} characters`
    );
  }
  return username;
}

export function parseReviewSubmission(body: JsonObject): ReviewSubmissionRequest {
  const userId = requireNonEmptyString(body, "user_id");
  const rawProofs = body.proofs;
  if (!Array.isArray(rawProofs)) {
    throw invalidInput("VALIDATION_ERROR proofs must be an array");
  }
  if (rawProofs.length > PROOFS_MAX_PER_SUBMISSION) {
    throw invalidInput(
      `VALIDATION_ERROR proofs must contain at most ${String(PROOFS_MAX_PER_SUBMISSION)} entries`
    );
  }

  const proofs = rawProofs.map((entry: unknown, index) => {
    const row = asObject(entry);
    if (!row) {
      throw invalidInput(`VALIDATION_ERROR proofs[${String(index)}] must be an object`);
    }
    return {
      cardId: requireInteger(row, "card_id"),
      timestamp: requireFiniteNumber(row, "timestamp"),
    };
  });

  return { userId, proofs };
}
