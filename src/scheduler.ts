// Multimodal Risk Triage - Pipeline Scheduler
// Cooperative timer loop: each request is advanced one step at a time and
// rescheduled after the delay the orchestrator suggests. At start-up every
// non-terminal request in the store is resumed.

import { NotFoundError, errorMessage } from "./errors.js";
import { isTerminalState, type AdvanceOutcome } from "./job-orchestrator.js";
import type { Logger } from "./logger.js";
import { createLogger } from "./logger.js";
import type { RequestStore } from "./request-store.js";

export interface Advancer {
  advance(requestId: string): Promise<AdvanceOutcome>;
}

export interface PipelineSchedulerDeps {
  orchestrator: Advancer;
  store: Pick<RequestStore, "listIds" | "get">;
  /** Delay before retrying a step that threw. */
  retryDelayMs?: number;
  logger?: Logger;
}

export class PipelineScheduler {
  private readonly orchestrator: Advancer;
  private readonly store: Pick<RequestStore, "listIds" | "get">;
  private readonly retryDelayMs: number;
  private readonly logger: Logger;
  private readonly timers: Map<string, ReturnType<typeof setTimeout>> = new Map();
  private readonly running: Set<string> = new Set();
  private stopped = false;

  constructor(deps: PipelineSchedulerDeps) {
    this.orchestrator = deps.orchestrator;
    this.store = deps.store;
    this.retryDelayMs = deps.retryDelayMs ?? 5000;
    this.logger = deps.logger ?? createLogger("Scheduler");
  }

  /** (Re)arm the timer for a request. A pending timer is replaced. */
  schedule(requestId: string, delayMs: number = 0): void {
    if (this.stopped) return;
    const existing = this.timers.get(requestId);
    if (existing) clearTimeout(existing);

    const timer = setTimeout(() => {
      this.timers.delete(requestId);
      this.run(requestId).catch((err: unknown) => {
        this.logger.error(`Scheduler loop for ${requestId} crashed: ${errorMessage(err)}`);
      });
    }, delayMs);
    this.timers.set(requestId, timer);
  }

  /** Schedule every stored request that has not reached a terminal state. */
  async resumeAll(): Promise<number> {
    let resumed = 0;
    for (const id of await this.store.listIds()) {
      const request = await this.store.get(id);
      if (request && !isTerminalState(request.state)) {
        this.schedule(id);
        resumed++;
      }
    }
    this.logger.info(`Resumed ${resumed} in-flight request(s)`);
    return resumed;
  }

  stop(): void {
    this.stopped = true;
    for (const timer of this.timers.values()) clearTimeout(timer);
    this.timers.clear();
  }

  get scheduledCount(): number {
    return this.timers.size;
  }

  private async run(requestId: string): Promise<void> {
    if (this.stopped) return;
    // One step per request at a time; a timer that fires mid-step tries again later
    if (this.running.has(requestId)) {
      this.schedule(requestId, this.retryDelayMs);
      return;
    }

    this.running.add(requestId);
    try {
      const outcome = await this.orchestrator.advance(requestId);
      if (outcome.done) {
        this.logger.info(`Request ${requestId} finished in state "${outcome.state}"`);
      } else {
        this.schedule(requestId, outcome.wakeAfterMs ?? this.retryDelayMs);
      }
    } catch (err) {
      if (err instanceof NotFoundError) {
        this.logger.warn(`Dropping unknown request ${requestId}`);
        return;
      }
      this.logger.error(`Advancing ${requestId} failed; retrying in ${this.retryDelayMs}ms: ${errorMessage(err)}`);
      this.schedule(requestId, this.retryDelayMs);
    } finally {
      this.running.delete(requestId);
    }
  }
}
