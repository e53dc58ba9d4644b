// Multimodal Risk Triage - Error taxonomy
//
// Every pipeline error carries a stable `code`. The orchestrator decides retry
// versus terminal handling from the class alone; callers never parse messages.

import type { FailureReason } from "./types.js";

export type PipelineErrorCode =
  | "VALIDATION_ERROR"
  | "TRANSIENT_SERVICE_ERROR"
  | "PERMANENT_SERVICE_ERROR"
  | "SCHEMA_ERROR"
  | "RESOURCE_EXHAUSTED"
  | "VERSION_CONFLICT"
  | "NOT_FOUND";

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Bad caller input. Fails immediately, never retried. */
export class ValidationError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("VALIDATION_ERROR", message, options);
  }
}

/** A provider hiccup (network, throttling, timeout). Retried with backoff. */
export class TransientServiceError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("TRANSIENT_SERVICE_ERROR", message, options);
  }
}

/** A provider refusal that retrying the same input will not fix. */
export class PermanentServiceError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("PERMANENT_SERVICE_ERROR", message, options);
  }
}

/** Reasoning output that still violates the response schema after repair attempts. */
export class SchemaError extends PipelineError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super("SCHEMA_ERROR", message);
    this.issues = issues;
  }
}

/** A retry or time ceiling was exceeded. */
export class ResourceExhaustedError extends PipelineError {
  constructor(message: string) {
    super("RESOURCE_EXHAUSTED", message);
  }
}

/** Optimistic write lost against a concurrent writer. */
export class VersionConflictError extends PipelineError {
  readonly expectedVersion: number;
  readonly actualVersion: number;

  constructor(id: string, expectedVersion: number, actualVersion: number) {
    super(
      "VERSION_CONFLICT",
      `Version conflict for request ${id}: expected ${expectedVersion}, found ${actualVersion}`,
    );
    this.expectedVersion = expectedVersion;
    this.actualVersion = actualVersion;
  }
}

export class NotFoundError extends PipelineError {
  constructor(message: string) {
    super("NOT_FOUND", message);
  }
}

/**
 * The failure recorded on a request that a stage error ends. Schema and
 * exhaustion errors keep their own codes; anything else is internal and its
 * message is prefixed with `context`.
 */
export function toFailureReason(err: unknown, context: string): FailureReason {
  if (err instanceof SchemaError) {
    const detail = err.issues.length > 0 ? `: ${err.issues.join("; ")}` : "";
    return { code: "SCHEMA_ERROR", message: `${err.message}${detail}` };
  }
  if (err instanceof ResourceExhaustedError) {
    return { code: "RESOURCE_EXHAUSTED", message: err.message };
  }
  return { code: "INTERNAL_ERROR", message: `${context}: ${errorMessage(err)}` };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Whether an error from a provider call is worth retrying. Anything that is not
 * explicitly permanent or a validation failure is treated as transient.
 */
export function isRetryable(err: unknown): boolean {
  if (err instanceof ValidationError || err instanceof PermanentServiceError) {
    return false;
  }
  return true;
}
