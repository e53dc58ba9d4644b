// In-process job table: lifts a synchronous capability call into the
// submit/poll shape the modality adapters expect.
//
// Submissions are deduplicated by client token, so resubmitting the same token
// returns the existing handle instead of starting a second run. Handles live
// only as long as the process; an unknown handle polls as a transient failure.

import { v4 as uuidv4 } from "uuid";
import { errorMessage, isRetryable } from "../errors.js";

export type PollResult<T> =
  | { status: "pending" }
  | { status: "succeeded"; result: T }
  | { status: "failed"; error: string; permanent: boolean }
  | { status: "timed_out"; error: string };

/**
 * Submit/poll capability contract. `clientToken` is an idempotency token:
 * two submissions with the same token must refer to the same external job.
 */
export interface AsyncJobCapability<I, R> {
  submit(input: I, clientToken: string): Promise<string>;
  fetch(handle: string): Promise<PollResult<R>>;
  /** Best effort; resolves even when the job already finished. */
  abort(handle: string): Promise<void>;
  /** Forget a finished job once its outcome has been recorded elsewhere. */
  release?(handle: string): void;
}

export type JobRunner<I, R> = (input: I, signal: AbortSignal) => Promise<R>;

interface JobEntry<R> {
  controller: AbortController;
  outcome: PollResult<R>;
}

export class InProcessJobTable<I, R> implements AsyncJobCapability<I, R> {
  private readonly name: string;
  private readonly runner: JobRunner<I, R>;
  private readonly jobs: Map<string, JobEntry<R>> = new Map();
  private readonly tokens: Map<string, string> = new Map();

  constructor(name: string, runner: JobRunner<I, R>) {
    this.name = name;
    this.runner = runner;
  }

  async submit(input: I, clientToken: string): Promise<string> {
    const existing = this.tokens.get(clientToken);
    if (existing) return existing;

    const handle = `${this.name}-${uuidv4()}`;
    const controller = new AbortController();
    const entry: JobEntry<R> = { controller, outcome: { status: "pending" } };

    this.start(input, controller.signal)
      .then((result) => {
        if (entry.outcome.status === "pending") {
          entry.outcome = { status: "succeeded", result };
        }
      })
      .catch((err: unknown) => {
        if (entry.outcome.status === "pending") {
          entry.outcome = { status: "failed", error: errorMessage(err), permanent: !isRetryable(err) };
        }
      });

    this.tokens.set(clientToken, handle);
    this.jobs.set(handle, entry);
    return handle;
  }

  async fetch(handle: string): Promise<PollResult<R>> {
    const entry = this.jobs.get(handle);
    if (!entry) {
      return { status: "failed", error: `Unknown ${this.name} job handle: ${handle}`, permanent: false };
    }
    return entry.outcome;
  }

  async abort(handle: string): Promise<void> {
    const entry = this.jobs.get(handle);
    if (!entry || entry.outcome.status !== "pending") return;
    entry.outcome = { status: "failed", error: "Job aborted", permanent: false };
    entry.controller.abort();
  }

  /** Drops a finished job's bookkeeping. Later polls of the handle see an unknown job. */
  release(handle: string): void {
    const entry = this.jobs.get(handle);
    if (!entry || entry.outcome.status === "pending") return;
    this.jobs.delete(handle);
    for (const [token, tokenHandle] of this.tokens) {
      if (tokenHandle === handle) this.tokens.delete(token);
    }
  }

  get size(): number {
    return this.jobs.size;
  }

  // The runner may throw synchronously; fold that into the returned promise.
  private async start(input: I, signal: AbortSignal): Promise<R> {
    return this.runner(input, signal);
  }
}
