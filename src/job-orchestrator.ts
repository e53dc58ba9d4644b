// Multimodal Risk Triage - Job Orchestrator
// Drives one AnalysisRequest through its state machine, one non-blocking step
// per advance() call. Every decision is derived from the persisted request, so
// a fresh process can pick up any request where the last one stopped.
//
// Request states:
//   RECEIVED → EXTRACTING → ANALYZING_MODALITIES → AGGREGATING → FUSING
//            → SELECTING_EVIDENCE → COMPLETED
//   any non-terminal state → FAILED | CANCELLED
//
// Modality jobs:
//   PENDING → RUNNING (submit acknowledged) → SUCCEEDED | FAILED | TIMED_OUT
//   FAILED | TIMED_OUT → PENDING (retry with backoff) until the attempt bound,
//   then terminal (permanent = true).
//
// The submission key of an attempt is persisted before the external call. A
// PENDING job that has a key but no handle is resubmitted with the same key,
// which the adapter ledger resolves to the original external job.

import { access } from "node:fs/promises";
import { isEmotionEvents, isTimeline, isTranscript, isUtterances } from "./artifact-guards.js";
import {
  DEFAULT_FUSION_CONFIG,
  DEFAULT_ORCHESTRATOR_CONFIG,
  type FusionConfig,
  type OrchestratorConfig,
} from "./config.js";
import type { EvidenceSelector } from "./evidence-selector.js";
import {
  NotFoundError,
  ResourceExhaustedError,
  TransientServiceError,
  ValidationError,
  VersionConflictError,
  errorMessage,
  isRetryable,
  toFailureReason,
} from "./errors.js";
import type { FusionEngine } from "./fusion-engine.js";
import type { Logger } from "./logger.js";
import { createLogger } from "./logger.js";
import type { ModalityAdapters, PollResult } from "./modality-adapters.js";
import {
  MODALITY_GRAPH,
  evaluatePolicy,
  isJobTerminal,
  isReady,
  isUnreachable,
  type ModalityGraph,
} from "./modality-graph.js";
import type { ReportAssembler } from "./report-assembler.js";
import type { RequestStore } from "./request-store.js";
import type { ResultAggregator } from "./result-aggregator.js";
import {
  JobState,
  MODALITIES,
  RequestState,
  type AnalysisRequest,
  type FailureCode,
  type Modality,
  type ModalityJob,
  type RequestStatus,
  type Timeline,
} from "./types.js";

export interface AdvanceOutcome {
  state: RequestState;
  /** The request reached a terminal state; no further advance is needed. */
  done: boolean;
  /** Suggested delay before the next advance; null when done. */
  wakeAfterMs: number | null;
}

export type TransitionListener = (request: AnalysisRequest) => void;

export interface JobOrchestratorDeps {
  store: RequestStore;
  adapters: ModalityAdapters;
  aggregator: ResultAggregator;
  fusion: FusionEngine;
  evidence: EvidenceSelector;
  reports: ReportAssembler;
  config?: Partial<OrchestratorConfig>;
  fusionConfig?: Partial<FusionConfig>;
  graph?: ModalityGraph;
  logger?: Logger;
  now?: () => Date;
}

// ─── State machine ──────────────────────────────────────────────────────────────

const TERMINAL_STATES: ReadonlySet<RequestState> = new Set([
  RequestState.COMPLETED,
  RequestState.FAILED,
  RequestState.CANCELLED,
]);

/**
 * Forward transitions. FAILED and CANCELLED are reachable from every
 * non-terminal state and are checked separately.
 */
const VALID_TRANSITIONS: ReadonlyMap<RequestState, RequestState> = new Map([
  [RequestState.RECEIVED, RequestState.EXTRACTING],
  [RequestState.EXTRACTING, RequestState.ANALYZING_MODALITIES],
  [RequestState.ANALYZING_MODALITIES, RequestState.AGGREGATING],
  [RequestState.AGGREGATING, RequestState.FUSING],
  [RequestState.FUSING, RequestState.SELECTING_EVIDENCE],
  [RequestState.SELECTING_EVIDENCE, RequestState.COMPLETED],
]);

export function isTerminalState(state: RequestState): boolean {
  return TERMINAL_STATES.has(state);
}

export function canTransition(from: RequestState, to: RequestState): boolean {
  if (isTerminalState(from)) return false;
  if (to === RequestState.FAILED || to === RequestState.CANCELLED) return true;
  return VALID_TRANSITIONS.get(from) === to;
}

/**
 * @throws Error naming both states when the transition is not allowed.
 */
export function assertTransition(from: RequestState, to: RequestState): void {
  if (!canTransition(from, to)) {
    throw new Error(`Invalid state transition: "${from}" → "${to}"`);
  }
}

const STATE_MESSAGES: Readonly<Record<RequestState, string>> = {
  [RequestState.RECEIVED]: "Upload accepted",
  [RequestState.EXTRACTING]: "Preparing media",
  [RequestState.ANALYZING_MODALITIES]: "Analyzing facial emotion, speech and sentiment",
  [RequestState.AGGREGATING]: "Merging analysis results",
  [RequestState.FUSING]: "Assessing risk indicators",
  [RequestState.SELECTING_EVIDENCE]: "Selecting evidence frames",
  [RequestState.COMPLETED]: "Report ready",
  [RequestState.FAILED]: "Analysis failed",
  [RequestState.CANCELLED]: "Analysis cancelled",
};

export function toStatus(request: AnalysisRequest): RequestStatus {
  const job = (modality: Modality) => ({
    state: request.jobs[modality].state,
    attempts: request.jobs[modality].attempts,
    permanent: request.jobs[modality].permanent,
  });
  return {
    id: request.id,
    state: request.state,
    message: STATE_MESSAGES[request.state],
    jobs: { visual: job("visual"), speech: job("speech"), sentiment: job("sentiment") },
    failure: request.failure,
    updatedAt: request.updatedAt,
  };
}

/** Failure code used when a hard modality fails permanently. */
const HARD_FAILURE_CODES: Partial<Record<Modality, FailureCode>> = {
  speech: "SPEECH_UNAVAILABLE",
};

const MAX_CONFLICT_RETRIES = 5;

export function backoffDelayMs(attempts: number, baseMs: number, maxMs: number): number {
  return Math.min(maxMs, baseMs * 2 ** Math.max(0, attempts - 1));
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

// ─── JobOrchestrator ────────────────────────────────────────────────────────────

export class JobOrchestrator {
  private readonly store: RequestStore;
  private readonly adapters: ModalityAdapters;
  private readonly aggregator: ResultAggregator;
  private readonly fusion: FusionEngine;
  private readonly evidence: EvidenceSelector;
  private readonly reports: ReportAssembler;
  private readonly config: OrchestratorConfig;
  private readonly maxStageAttempts: number;
  private readonly graph: ModalityGraph;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly listeners: Set<TransitionListener> = new Set();

  constructor(deps: JobOrchestratorDeps) {
    this.store = deps.store;
    this.adapters = deps.adapters;
    this.aggregator = deps.aggregator;
    this.fusion = deps.fusion;
    this.evidence = deps.evidence;
    this.reports = deps.reports;
    this.config = { ...DEFAULT_ORCHESTRATOR_CONFIG, ...deps.config };
    this.maxStageAttempts = deps.fusionConfig?.maxStageAttempts ?? DEFAULT_FUSION_CONFIG.maxStageAttempts;
    this.graph = deps.graph ?? MODALITY_GRAPH;
    this.logger = deps.logger ?? createLogger("JobOrchestrator");
    this.now = deps.now ?? (() => new Date());
  }

  /** Subscribe to every persisted change of any request. Returns an unsubscribe function. */
  onTransition(listener: TransitionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async getStatus(requestId: string): Promise<RequestStatus> {
    return toStatus(await this.load(requestId));
  }

  /**
   * Perform one step for the request and report where it stands.
   * @throws NotFoundError for an unknown id.
   */
  async advance(requestId: string): Promise<AdvanceOutcome> {
    const request = await this.load(requestId);
    if (isTerminalState(request.state)) {
      return this.outcome(request, null);
    }

    // Handles obtained during this step; aborted if the step loses a race
    // against cancellation.
    const submitted: Array<{ modality: Modality; handle: string }> = [];
    try {
      return await this.step(request, submitted);
    } catch (err) {
      if (err instanceof VersionConflictError) {
        return this.recoverFromConflict(requestId, submitted);
      }
      this.logger.error(`Step in "${request.state}" failed for ${requestId}: ${errorMessage(err)}`);
      return this.failLatest(requestId, "INTERNAL_ERROR", `Unexpected error while ${request.state}: ${errorMessage(err)}`);
    }
  }

  /**
   * Move the request to CANCELLED and abort in-flight jobs. Cancelling a
   * terminal request returns it unchanged.
   */
  async cancel(requestId: string): Promise<AnalysisRequest> {
    for (let attempt = 1; ; attempt++) {
      const request = await this.load(requestId);
      if (isTerminalState(request.state)) return request;
      try {
        const cancelled = await this.transition(request, RequestState.CANCELLED);
        this.logger.info(`Cancelled ${requestId} during "${request.state}"`);
        await this.abortRunning(cancelled);
        return cancelled;
      } catch (err) {
        if (!(err instanceof VersionConflictError) || attempt >= MAX_CONFLICT_RETRIES) throw err;
      }
    }
  }

  // ─── Steps ──────────────────────────────────────────────────────────────────

  private async step(
    request: AnalysisRequest,
    submitted: Array<{ modality: Modality; handle: string }>,
  ): Promise<AdvanceOutcome> {
    switch (request.state) {
      case RequestState.RECEIVED:
        return this.outcome(await this.transition(request, RequestState.EXTRACTING), 0);
      case RequestState.EXTRACTING:
        return this.stepExtracting(request);
      case RequestState.ANALYZING_MODALITIES:
        return this.stepModalities(request, submitted);
      case RequestState.AGGREGATING:
        return this.stepAggregating(request);
      case RequestState.FUSING:
        return this.stepFusing(request);
      case RequestState.SELECTING_EVIDENCE:
        return this.stepSelectingEvidence(request);
      default:
        return this.outcome(request, null);
    }
  }

  private async stepExtracting(request: AnalysisRequest): Promise<AdvanceOutcome> {
    const audioPath = request.media.audioPath;
    if (audioPath === null || !(await fileExists(audioPath))) {
      return this.outcome(
        await this.fail(request, "EXTRACTION_FAILURE", "Normalized audio track is missing"),
        null,
      );
    }
    return this.outcome(await this.transition(request, RequestState.ANALYZING_MODALITIES), 0);
  }

  private async stepModalities(
    loaded: AnalysisRequest,
    submitted: Array<{ modality: Modality; handle: string }>,
  ): Promise<AdvanceOutcome> {
    const now = this.now();
    let request = loaded;

    // 1. Open new attempts (and record their keys) before anything external happens.
    const scheduled = this.scheduleAttempts(request, now);
    if (scheduled) request = await this.save(scheduled);

    // 2. Submit every attempt that has a key but no handle yet.
    const toSubmit = MODALITIES.filter((m) => {
      const job = request.jobs[m];
      return job.state === JobState.PENDING && job.submissionKey !== null && job.handle === null;
    });
    if (toSubmit.length > 0) {
      const jobs = await Promise.all(toSubmit.map((m) => this.submitJob(request, m, now)));
      const next = structuredClone(request);
      toSubmit.forEach((modality, i) => {
        next.jobs[modality] = jobs[i];
        const handle = jobs[i].handle;
        if (jobs[i].state === JobState.RUNNING && handle !== null) {
          submitted.push({ modality, handle });
        }
      });
      request = await this.save(next);
    }

    // 3. Poll running jobs and enforce their hard timeouts.
    const running = MODALITIES.filter((m) => request.jobs[m].state === JobState.RUNNING);
    if (running.length > 0) {
      const jobs = await Promise.all(running.map((m) => this.pollJob(request, m, now)));
      if (jobs.some((job, i) => job !== request.jobs[running[i]])) {
        const next = structuredClone(request);
        running.forEach((modality, i) => {
          next.jobs[modality] = jobs[i];
        });
        request = await this.save(next);

        // Outcomes are persisted; the capabilities can forget these jobs
        for (const modality of running) {
          const handle = request.jobs[modality].handle;
          if (request.jobs[modality].state !== JobState.RUNNING && handle !== null) {
            this.adapters[modality].release(handle);
          }
        }
      }
    }

    // 4. Apply the dependency policy.
    const decision = evaluatePolicy(request.jobs, this.graph);
    if (decision.kind === "fail") {
      const job = request.jobs[decision.modality];
      const code = HARD_FAILURE_CODES[decision.modality] ?? "INTERNAL_ERROR";
      return this.outcome(
        await this.fail(request, code, `${decision.modality} analysis failed permanently: ${job.lastError ?? "unknown error"}`),
        null,
      );
    }
    if (decision.kind === "proceed") {
      if (decision.missing.length > 0) {
        this.logger.warn(`Proceeding for ${request.id} without: ${decision.missing.join(", ")}`);
      }
      const aggregating = await this.transition(request, RequestState.AGGREGATING, {
        missingModalities: decision.missing,
      });
      return this.outcome(aggregating, 0);
    }
    return this.outcome(request, this.modalityWakeDelay(request, now));
  }

  private async stepAggregating(request: AnalysisRequest): Promise<AdvanceOutcome> {
    const [visual, speech, sentiment] = await Promise.all([
      this.readResult(request.jobs.visual, isEmotionEvents),
      this.readResult(request.jobs.speech, isTranscript),
      this.readResult(request.jobs.sentiment, isUtterances),
    ]);

    const timeline = this.aggregator.aggregate({
      durationSeconds: request.media.durationSeconds,
      visual,
      speech,
      sentiment,
    });
    const timelineRef = await this.store.putArtifact(request.id, "timeline", timeline);
    this.logger.info(`Merged timeline for ${request.id}: ${timeline.entries.length} entries`);

    return this.outcome(await this.transition(request, RequestState.FUSING, { timelineRef }), 0);
  }

  private async stepFusing(request: AnalysisRequest): Promise<AdvanceOutcome> {
    const now = this.now();
    if (request.nextStageAttemptAt !== null) {
      const wait = Date.parse(request.nextStageAttemptAt) - now.getTime();
      if (wait > 0) return this.outcome(request, wait);
    }

    const timeline = await this.readTimeline(request);
    try {
      const assessment = await this.fusion.assess(timeline, {
        requestId: request.id,
        durationSeconds: request.media.durationSeconds,
        missingModalities: request.missingModalities,
      });
      const next = await this.transition(request, RequestState.SELECTING_EVIDENCE, {
        assessment,
        nextStageAttemptAt: null,
      });
      return this.outcome(next, 0);
    } catch (err) {
      if (err instanceof VersionConflictError) throw err;
      if (err instanceof TransientServiceError) {
        return this.deferFusion(request, err, now);
      }
      return this.outcome(await this.failWith(request, err, "Reasoning failed"), null);
    }
  }

  private async deferFusion(request: AnalysisRequest, err: TransientServiceError, now: Date): Promise<AdvanceOutcome> {
    const stageAttempts = request.stageAttempts + 1;
    if (stageAttempts >= this.maxStageAttempts) {
      const exhausted = new ResourceExhaustedError(
        `Reasoning unavailable after ${stageAttempts} attempt(s): ${err.message}`,
      );
      return this.outcome(await this.failWith(request, exhausted, "Reasoning failed"), null);
    }

    const delay = backoffDelayMs(stageAttempts, this.config.retry.backoffBaseMs, this.config.retry.backoffMaxMs);
    this.logger.warn(
      `Reasoning attempt ${stageAttempts}/${this.maxStageAttempts} for ${request.id} failed; retrying in ${delay}ms: ${err.message}`,
    );
    const saved = await this.save({
      ...request,
      stageAttempts,
      nextStageAttemptAt: new Date(now.getTime() + delay).toISOString(),
    });
    return this.outcome(saved, delay);
  }

  private async stepSelectingEvidence(request: AnalysisRequest): Promise<AdvanceOutcome> {
    const assessment = request.assessment;
    if (assessment === null) {
      throw new Error(`Request ${request.id} reached evidence selection without an assessment`);
    }

    const frames = await this.evidence.select(request.id, assessment.citedWindows, request.media);
    const [timeline, transcript] = await Promise.all([
      this.readTimeline(request),
      this.readResult(request.jobs.speech, isTranscript),
    ]);

    // A cancel may have landed while frames were extracted
    await this.assertUnchanged(request);
    await this.reports.assemble(request, assessment, frames, { timeline, transcript }, this.now());

    let completed: AnalysisRequest;
    try {
      completed = await this.transition(request, RequestState.COMPLETED);
    } catch (err) {
      if (err instanceof VersionConflictError) await this.discardStrayReport(request.id);
      throw err;
    }
    this.logger.info(`Completed ${request.id}: score ${assessment.riskScore} (${assessment.classification})`);
    return this.outcome(completed, null);
  }

  /** @throws VersionConflictError when the stored request moved past `request`. */
  private async assertUnchanged(request: AnalysisRequest): Promise<void> {
    const latest = await this.load(request.id);
    if (latest.version !== request.version) {
      throw new VersionConflictError(request.id, request.version, latest.version);
    }
  }

  /** Removes a report written for a request that then ended without completing. */
  private async discardStrayReport(requestId: string): Promise<void> {
    const latest = await this.load(requestId);
    if (isTerminalState(latest.state) && latest.state !== RequestState.COMPLETED) {
      await this.store.deleteReport(requestId);
      this.logger.warn(`Discarded report of ${requestId}, which ended in "${latest.state}"`);
    }
  }

  // ─── Modality jobs ──────────────────────────────────────────────────────────

  /** Returns the request with new attempts opened, or null when nothing changed. */
  private scheduleAttempts(request: AnalysisRequest, now: Date): AnalysisRequest | null {
    const next = structuredClone(request);
    let changed = false;

    for (const modality of MODALITIES) {
      const job = next.jobs[modality];
      if (isJobTerminal(job)) continue;

      if (isUnreachable(modality, next.jobs, this.graph)) {
        next.jobs[modality] = {
          ...job,
          state: JobState.FAILED,
          permanent: true,
          nextAttemptAt: null,
          lastError: `Not run: prerequisite ${this.graph[modality].dependsOn.join(", ")} failed`,
        };
        changed = true;
        continue;
      }
      if (!isReady(modality, next.jobs, this.graph)) continue;

      const fresh = job.state === JobState.PENDING && job.submissionKey === null;
      const retry = job.state === JobState.FAILED || job.state === JobState.TIMED_OUT;
      const due = job.nextAttemptAt === null || Date.parse(job.nextAttemptAt) <= now.getTime();
      if ((fresh || retry) && due) {
        const attempts = job.attempts + 1;
        next.jobs[modality] = {
          ...job,
          state: JobState.PENDING,
          attempts,
          submissionKey: `${request.id}:${modality}:${attempts}`,
          handle: null,
          submittedAt: null,
          nextAttemptAt: null,
          resultRef: null,
        };
        changed = true;
      }
    }
    return changed ? next : null;
  }

  private async submitJob(request: AnalysisRequest, modality: Modality, now: Date): Promise<ModalityJob> {
    const job = request.jobs[modality];
    const key = job.submissionKey;
    if (key === null) {
      throw new Error(`Job ${modality} of ${request.id} has no submission key`);
    }

    try {
      const handle = await this.submitToAdapter(request, modality, key);
      return { ...job, state: JobState.RUNNING, handle, submittedAt: now.toISOString() };
    } catch (err) {
      return this.recordFailure(request.id, job, errorMessage(err), !isRetryable(err), JobState.FAILED, now);
    }
  }

  private async submitToAdapter(request: AnalysisRequest, modality: Modality, key: string): Promise<string> {
    switch (modality) {
      case "visual":
        return this.adapters.visual.submit(
          request.id,
          {
            sourcePath: request.media.sourcePath,
            durationSeconds: request.media.durationSeconds,
            workDir: this.store.artifactPath(request.id, "visual-frames"),
          },
          key,
        );
      case "speech": {
        const audioPath = request.media.audioPath;
        if (audioPath === null) {
          throw new ValidationError("No normalized audio track to transcribe");
        }
        return this.adapters.speech.submit(request.id, { audioPath, language: this.config.language }, key);
      }
      case "sentiment": {
        const transcript = await this.readResult(request.jobs.speech, isTranscript);
        if (transcript === null) {
          throw new ValidationError("Sentiment requires a successful transcript");
        }
        return this.adapters.sentiment.submit(request.id, { transcript }, key);
      }
    }
  }

  private async pollJob(request: AnalysisRequest, modality: Modality, now: Date): Promise<ModalityJob> {
    const job = request.jobs[modality];
    const handle = job.handle;
    if (handle === null) {
      return this.recordFailure(request.id, job, "Running job has no handle", false, JobState.FAILED, now);
    }

    const limitSeconds = this.config.jobTimeoutSeconds[modality];
    if (job.submittedAt !== null && now.getTime() - Date.parse(job.submittedAt) > limitSeconds * 1000) {
      await this.abortQuietly(request.id, modality, handle);
      return this.recordFailure(request.id, job, `Timed out after ${limitSeconds}s`, false, JobState.TIMED_OUT, now);
    }

    let result: PollResult<unknown>;
    try {
      result = await this.adapters[modality].poll(handle);
    } catch (err) {
      return this.recordFailure(request.id, job, errorMessage(err), !isRetryable(err), JobState.FAILED, now);
    }

    switch (result.status) {
      case "pending":
        return job;
      case "succeeded": {
        const resultRef = await this.store.putArtifact(request.id, modality, result.result);
        this.logger.info(`${modality} job for ${request.id} succeeded on attempt ${job.attempts}`);
        return { ...job, state: JobState.SUCCEEDED, resultRef, lastError: null, nextAttemptAt: null };
      }
      case "failed":
        return this.recordFailure(request.id, job, result.error, result.permanent, JobState.FAILED, now);
      case "timed_out":
        return this.recordFailure(request.id, job, result.error, false, JobState.TIMED_OUT, now);
    }
  }

  private recordFailure(
    requestId: string,
    job: ModalityJob,
    error: string,
    permanent: boolean,
    state: JobState.FAILED | JobState.TIMED_OUT,
    now: Date,
  ): ModalityJob {
    const { maxAttempts, backoffBaseMs, backoffMaxMs } = this.config.retry;
    const terminal = permanent || job.attempts >= maxAttempts;

    if (terminal) {
      this.logger.warn(
        `${job.modality} job for ${requestId} failed permanently after ${job.attempts} attempt(s): ${error}`,
      );
      return { ...job, state, lastError: error, permanent: true, nextAttemptAt: null };
    }

    const delay = backoffDelayMs(job.attempts, backoffBaseMs, backoffMaxMs);
    this.logger.warn(
      `${job.modality} job for ${requestId} attempt ${job.attempts}/${maxAttempts} ${state}; retrying in ${delay}ms: ${error}`,
    );
    return {
      ...job,
      state,
      lastError: error,
      permanent: false,
      nextAttemptAt: new Date(now.getTime() + delay).toISOString(),
    };
  }

  /** Shortest of the poll interval and the time until the next scheduled retry. */
  private modalityWakeDelay(request: AnalysisRequest, now: Date): number {
    let delay = this.config.pollIntervalMs;
    for (const modality of MODALITIES) {
      const job = request.jobs[modality];
      if (isJobTerminal(job) || job.nextAttemptAt === null) continue;
      delay = Math.min(delay, Math.max(0, Date.parse(job.nextAttemptAt) - now.getTime()));
    }
    return delay;
  }

  private async abortRunning(request: AnalysisRequest): Promise<void> {
    await Promise.all(
      MODALITIES.map(async (modality) => {
        const job = request.jobs[modality];
        if (job.state === JobState.RUNNING && job.handle !== null) {
          await this.abortQuietly(request.id, modality, job.handle);
          this.adapters[modality].release(job.handle);
        }
      }),
    );
  }

  private async abortQuietly(requestId: string, modality: Modality, handle: string): Promise<void> {
    try {
      await this.adapters[modality].abort(handle);
    } catch (err) {
      this.logger.warn(`Abort of ${modality} job ${handle} for ${requestId} failed: ${errorMessage(err)}`);
    }
  }

  // ─── Persistence helpers ────────────────────────────────────────────────────

  private async load(requestId: string): Promise<AnalysisRequest> {
    const request = await this.store.get(requestId);
    if (!request) {
      throw new NotFoundError(`Request not found: ${requestId}`);
    }
    return request;
  }

  private async save(request: AnalysisRequest): Promise<AnalysisRequest> {
    const stored = await this.store.update({ ...request, updatedAt: this.now().toISOString() });
    for (const listener of this.listeners) {
      try {
        listener(stored);
      } catch (err) {
        this.logger.warn(`Transition listener failed for ${stored.id}: ${errorMessage(err)}`);
      }
    }
    return stored;
  }

  private async transition(
    request: AnalysisRequest,
    to: RequestState,
    patch: Partial<Omit<AnalysisRequest, "id" | "version" | "state" | "history">> = {},
  ): Promise<AnalysisRequest> {
    assertTransition(request.state, to);
    const at = this.now().toISOString();
    const saved = await this.save({
      ...request,
      ...patch,
      state: to,
      history: [...request.history, { state: to, at }],
    });
    this.logger.debug(`${request.id}: ${request.state} → ${to}`);
    return saved;
  }

  private async fail(request: AnalysisRequest, code: FailureCode, message: string): Promise<AnalysisRequest> {
    const failed = await this.transition(request, RequestState.FAILED, {
      failure: { code, message },
      assessment: null,
    });
    this.logger.error(`Request ${request.id} failed with ${code}: ${message}`);
    await this.abortRunning(failed);
    return failed;
  }

  private async failWith(request: AnalysisRequest, err: unknown, context: string): Promise<AnalysisRequest> {
    const { code, message } = toFailureReason(err, context);
    return this.fail(request, code, message);
  }

  /** Reload and fail the latest copy, unless it is already terminal. */
  private async failLatest(requestId: string, code: FailureCode, message: string): Promise<AdvanceOutcome> {
    for (let attempt = 1; ; attempt++) {
      const latest = await this.load(requestId);
      if (isTerminalState(latest.state)) return this.outcome(latest, null);
      try {
        return this.outcome(await this.fail(latest, code, message), null);
      } catch (err) {
        if (!(err instanceof VersionConflictError) || attempt >= MAX_CONFLICT_RETRIES) throw err;
      }
    }
  }

  private async recoverFromConflict(
    requestId: string,
    submitted: Array<{ modality: Modality; handle: string }>,
  ): Promise<AdvanceOutcome> {
    const latest = await this.load(requestId);
    if (isTerminalState(latest.state)) {
      for (const { modality, handle } of submitted) {
        await this.abortQuietly(requestId, modality, handle);
      }
      return this.outcome(latest, null);
    }
    this.logger.debug(`Lost a write race on ${requestId}; retrying from version ${latest.version}`);
    return this.outcome(latest, 0);
  }

  private async readResult<T>(job: ModalityJob, guard: (value: unknown) => value is T): Promise<T | null> {
    if (job.state !== JobState.SUCCEEDED || job.resultRef === null) return null;
    const value = await this.store.getArtifact(job.resultRef);
    if (!guard(value)) {
      throw new Error(`Stored ${job.modality} result ${job.resultRef} has an unexpected shape`);
    }
    return value;
  }

  private async readTimeline(request: AnalysisRequest): Promise<Timeline> {
    if (request.timelineRef === null) {
      throw new Error(`Request ${request.id} has no timeline`);
    }
    const value = await this.store.getArtifact(request.timelineRef);
    if (!isTimeline(value)) {
      throw new Error(`Stored timeline ${request.timelineRef} has an unexpected shape`);
    }
    return value;
  }

  private outcome(request: AnalysisRequest, wakeAfterMs: number | null): AdvanceOutcome {
    const done = isTerminalState(request.state);
    return { state: request.state, done, wakeAfterMs: done ? null : wakeAfterMs };
  }
}
