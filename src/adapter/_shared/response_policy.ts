import type { CoreErrorShape } from "../../core/errors/canonical_error_codes";
import { ERROR_POLICY_REGISTRY } from "./error_policy_registry";

export interface ExternalErrorResponse {
  readonly httpStatus: number;
  readonly retryable: boolean;
  readonly body: {
    ok: false;
    error: { code: string; message: string };
  };
}

export const INTERNAL_ERROR_PUBLIC_MESSAGE = "Internal Server Error";

export function mapCoreErrorToExternal(
  err: Pick<CoreErrorShape, "code" | "message">
): ExternalErrorResponse {
  const policy = ERROR_POLICY_REGISTRY[err.code];
  return {
    httpStatus: policy.httpStatus,
    retryable: policy.retryable,
    body: {
      ok: false,
      error: {
        code: err.code,
        message: policy.publicMessage === "Y" ? err.message : INTERNAL_ERROR_PUBLIC_MESSAGE,
      },
    },
  };
}
