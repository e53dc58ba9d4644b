// Maps errors thrown by provider SDKs onto the pipeline error taxonomy.

import { PermanentServiceError, PipelineError, TransientServiceError, errorMessage } from "../errors.js";

// HTTP statuses that retrying the same request will not fix.
const PERMANENT_STATUSES = new Set([400, 401, 403, 404, 413, 415, 422]);

function statusOf(err: unknown): number | null {
  if (err instanceof Error && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return null;
}

/**
 * Wrap an SDK error as Transient or Permanent based on its HTTP status.
 * Errors already in the taxonomy pass through unchanged.
 */
export function classifyProviderError(err: unknown, provider: string): PipelineError {
  if (err instanceof PipelineError) return err;
  const status = statusOf(err);
  const message = `${provider} request failed${status !== null ? ` (HTTP ${status})` : ""}: ${errorMessage(err)}`;
  if (status !== null && PERMANENT_STATUSES.has(status)) {
    return new PermanentServiceError(message, { cause: err });
  }
  return new TransientServiceError(message, { cause: err });
}
