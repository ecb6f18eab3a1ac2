export const ERROR_CODES = {
  UNAUTHORIZED: "UNAUTHORIZED",
  UNAVAILABLE: "UNAVAILABLE",
  STORE_ERROR: "STORE_ERROR",
  DEADLINE_EXCEEDED: "DEADLINE_EXCEEDED",
  INVALID_INPUT: "INVALID_INPUT",
  NOT_FOUND: "NOT_FOUND",
  INSUFFICIENT_PAINT: "INSUFFICIENT_PAINT",
  RATE_LIMITED: "RATE_LIMITED",
  CONFIGURATION_ERROR: "CONFIGURATION_ERROR",
  INTERNAL_ERROR: "INTERNAL_ERROR",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export interface CoreErrorShape {
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}
