import { ERROR_CODES, type ErrorCode } from "../../core/errors/canonical_error_codes";

export interface ErrorMetadata {
  publicMessage: "Y" | "N";
  httpStatus: number;
  cliExitCode: number;
  retryable: boolean;
}

export const ERROR_POLICY_REGISTRY = {
  [ERROR_CODES.UNAUTHORIZED]: {
    publicMessage: "Y",
    httpStatus: 401,
    cliExitCode: 1,
    retryable: false,
  },
  [ERROR_CODES.UNAVAILABLE]: {
    publicMessage: "Y",
    httpStatus: 503,
    cliExitCode: 1,
    retryable: true,
  },
  [ERROR_CODES.STORE_ERROR]: {
    publicMessage: "N",
    httpStatus: 500,
    cliExitCode: 2,
    retryable: false,
  },
  [ERROR_CODES.DEADLINE_EXCEEDED]: {
    publicMessage: "Y",
    httpStatus: 504,
    cliExitCode: 1,
    retryable: true,
  },
  [ERROR_CODES.INVALID_INPUT]: {
    publicMessage: "Y",
    httpStatus: 400,
    cliExitCode: 1,
    retryable: false,
  },
  [ERROR_CODES.NOT_FOUND]: {
    publicMessage: "Y",
    httpStatus: 404,
    cliExitCode: 1,
    retryable: false,
  },
  [ERROR_CODES.INSUFFICIENT_PAINT]: {
    publicMessage: "Y",
    httpStatus: 403,
    cliExitCode: 1,
    retryable: false,
  },
  [ERROR_CODES.RATE_LIMITED]: {
    publicMessage: "Y",
    httpStatus: 429,
    cliExitCode: 1,
    retryable: true,
  },
  [ERROR_CODES.CONFIGURATION_ERROR]: {
    publicMessage: "N",
    httpStatus: 500,
    cliExitCode: 2,
    retryable: false,
  },
  [ERROR_CODES.INTERNAL_ERROR]: {
    publicMessage: "N",
    httpStatus: 500,
    cliExitCode: 2,
    retryable: false,
  },
} satisfies Record<ErrorCode, ErrorMetadata>;
