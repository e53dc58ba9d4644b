import { afterEach, describe, it, expect } from "vitest";
import { NotFoundError, TransientServiceError } from "./errors.js";
import { assertTransition, backoffDelayMs, canTransition } from "./job-orchestrator.js";
import type { ReasoningCapability } from "./providers/openai-reasoning.js";
import { makeMedia, makeRequest } from "./testing/fakes.js";
import {
  createHarness,
  flushJobs,
  runUntilDone,
  scriptedReasoning,
  scriptedTranscript,
  type Harness,
  type HarnessOptions,
} from "./testing/harness.js";
import { JobState, RequestState, type AnalysisRequest, type Transcript } from "./types.js";

// ─── Helpers ────────────────────────────────────────────────────────────────────

async function loadRequest(harness: Harness, id: string): Promise<AnalysisRequest> {
  const request = await harness.store.get(id);
  if (!request) throw new Error(`missing request ${id}`);
  return request;
}

/** Speech runner that stays pending until the gate opens. */
function gatedSpeech() {
  let open = (): void => {};
  const gate = new Promise<void>((resolve) => {
    open = resolve;
  });
  const seen: { signal?: AbortSignal; calls: number } = { calls: 0 };
  const runner = async (_input: unknown, signal: AbortSignal): Promise<Transcript> => {
    seen.calls++;
    seen.signal = signal;
    await gate;
    return scriptedTranscript();
  };
  return { runner, open: () => open(), seen };
}

/** Advance `steps` times, moving the clock by each suggested delay. */
async function step(harness: Harness, id: string, steps: number): Promise<void> {
  for (let i = 0; i < steps; i++) {
    const outcome = await harness.orchestrator.advance(id);
    harness.clock.advance(outcome.wakeAfterMs ?? 0);
    await flushJobs();
  }
}

// ─── State machine ──────────────────────────────────────────────────────────────

describe("request state machine", () => {
  it("allows the forward chain one step at a time", () => {
    expect(canTransition(RequestState.RECEIVED, RequestState.EXTRACTING)).toBe(true);
    expect(canTransition(RequestState.FUSING, RequestState.SELECTING_EVIDENCE)).toBe(true);
    expect(canTransition(RequestState.RECEIVED, RequestState.FUSING)).toBe(false);
    expect(canTransition(RequestState.FUSING, RequestState.AGGREGATING)).toBe(false);
  });

  it("allows failing or cancelling from any non-terminal state only", () => {
    expect(canTransition(RequestState.ANALYZING_MODALITIES, RequestState.FAILED)).toBe(true);
    expect(canTransition(RequestState.RECEIVED, RequestState.CANCELLED)).toBe(true);
    expect(canTransition(RequestState.COMPLETED, RequestState.FAILED)).toBe(false);
    expect(canTransition(RequestState.CANCELLED, RequestState.FAILED)).toBe(false);
  });

  it("names both states in the error", () => {
    expect(() => assertTransition(RequestState.COMPLETED, RequestState.FUSING)).toThrow(
      'Invalid state transition: "completed" → "fusing"',
    );
  });
});

describe("backoffDelayMs()", () => {
  it("doubles per attempt up to the ceiling", () => {
    expect([1, 2, 3, 4, 5].map((n) => backoffDelayMs(n, 1000, 8000))).toEqual([1000, 2000, 4000, 8000, 8000]);
  });
});

// ─── Orchestrator ───────────────────────────────────────────────────────────────

describe("JobOrchestrator", () => {
  let harness: Harness | undefined;

  async function setup(options: HarnessOptions = {}): Promise<Harness> {
    harness = await createHarness(options);
    return harness;
  }

  afterEach(async () => {
    await harness?.cleanup();
    harness = undefined;
  });

  it("rejects unknown request ids", async () => {
    const h = await setup();
    await expect(h.orchestrator.advance("nope")).rejects.toThrow(NotFoundError);
  });

  it("reports status for a fresh request", async () => {
    const h = await setup();
    const created = await h.submitClip();

    expect(await h.orchestrator.getStatus(created.id)).toEqual({
      id: "req-1",
      state: RequestState.RECEIVED,
      message: "Upload accepted",
      jobs: {
        visual: { state: JobState.PENDING, attempts: 0, permanent: false },
        speech: { state: JobState.PENDING, attempts: 0, permanent: false },
        sentiment: { state: JobState.PENDING, attempts: 0, permanent: false },
      },
      failure: null,
      updatedAt: "2024-01-01T00:00:00.000Z",
    });
  });

  it("fails with EXTRACTION_FAILURE when the audio track is missing", async () => {
    const h = await setup();
    await h.store.create(makeRequest({ id: "req-9", media: makeMedia({ audioPath: null }) }));

    await runUntilDone(h.orchestrator, h.clock, "req-9");
    const request = await loadRequest(h, "req-9");

    expect(request.state).toBe(RequestState.FAILED);
    expect(request.failure).toEqual({ code: "EXTRACTION_FAILURE", message: "Normalized audio track is missing" });
  });

  it("submits visual and speech together and holds sentiment until speech succeeds", async () => {
    const speech = gatedSpeech();
    const h = await setup({ runners: { speech: speech.runner } });
    const created = await h.submitClip();
    const snapshots: AnalysisRequest[] = [];
    h.orchestrator.onTransition((request) => snapshots.push(request));

    await step(h, created.id, 6);
    const waiting = await loadRequest(h, created.id);

    expect(waiting.state).toBe(RequestState.ANALYZING_MODALITIES);
    expect(waiting.jobs.visual.state).toBe(JobState.SUCCEEDED);
    expect(waiting.jobs.speech.state).toBe(JobState.RUNNING);
    expect(waiting.jobs.sentiment.attempts).toBe(0);
    expect(h.tables.sentiment.size).toBe(0);

    speech.open();
    await h.runUntilDone(created.id);

    expect((await loadRequest(h, created.id)).state).toBe(RequestState.COMPLETED);
    for (const snapshot of snapshots) {
      if (snapshot.jobs.sentiment.submissionKey !== null) {
        expect(snapshot.jobs.speech.state).toBe(JobState.SUCCEEDED);
      }
    }
  });

  it("retries a transient speech failure with a new submission key", async () => {
    let calls = 0;
    const h = await setup({
      runners: {
        speech: async () => {
          calls++;
          if (calls === 1) throw new TransientServiceError("Deepgram request failed (HTTP 503): unavailable");
          return scriptedTranscript();
        },
      },
    });
    const created = await h.submitClip();

    await h.runUntilDone(created.id);
    const request = await loadRequest(h, created.id);

    expect(request.state).toBe(RequestState.COMPLETED);
    expect(calls).toBe(2);
    expect(request.jobs.speech).toMatchObject({
      state: JobState.SUCCEEDED,
      attempts: 2,
      submissionKey: "req-1:speech:2",
      lastError: null,
    });
    expect(await h.store.ledgerGet("req-1", "req-1:speech:1")).not.toBeNull();
    expect(await h.store.ledgerGet("req-1", "req-1:speech:2")).not.toBeNull();
  });

  it("gives up on speech after the attempt bound", async () => {
    const h = await setup({
      runners: {
        speech: async () => {
          throw new TransientServiceError("Deepgram request failed (HTTP 503): unavailable");
        },
      },
    });
    const created = await h.submitClip();

    await h.runUntilDone(created.id);
    const request = await loadRequest(h, created.id);

    expect(request.state).toBe(RequestState.FAILED);
    expect(request.failure?.code).toBe("SPEECH_UNAVAILABLE");
    expect(request.jobs.speech).toMatchObject({ state: JobState.FAILED, attempts: 3, permanent: true });
  });

  it("forces a timeout on a job that outlives its ceiling and aborts it", async () => {
    const speech = gatedSpeech();
    const h = await setup({
      runners: { speech: speech.runner },
      orchestrator: {
        jobTimeoutSeconds: { visual: 900, speech: 5, sentiment: 900 },
        retry: { maxAttempts: 1, backoffBaseMs: 1000, backoffMaxMs: 8000 },
      },
    });
    const created = await h.submitClip();

    await h.runUntilDone(created.id);
    const request = await loadRequest(h, created.id);

    expect(request.jobs.speech.state).toBe(JobState.TIMED_OUT);
    expect(request.failure).toEqual({
      code: "SPEECH_UNAVAILABLE",
      message: "speech analysis failed permanently: Timed out after 5s",
    });
    expect(speech.seen.signal?.aborted).toBe(true);
  });

  it("cancels a running request and aborts its jobs", async () => {
    const speech = gatedSpeech();
    const h = await setup({ runners: { speech: speech.runner } });
    const created = await h.submitClip();
    await step(h, created.id, 3);

    const cancelled = await h.orchestrator.cancel(created.id);
    const again = await h.orchestrator.cancel(created.id);
    const outcome = await h.orchestrator.advance(created.id);

    expect(cancelled.state).toBe(RequestState.CANCELLED);
    expect(cancelled.history[cancelled.history.length - 1].state).toBe(RequestState.CANCELLED);
    expect(again.version).toBe(cancelled.version);
    expect(outcome).toEqual({ state: RequestState.CANCELLED, done: true, wakeAfterMs: null });
    expect(speech.seen.signal?.aborted).toBe(true);
  });

  describe("resumption", () => {
    it("does not resubmit a job whose handle is recorded", async () => {
      const speech = gatedSpeech();
      const h = await setup({ runners: { speech: speech.runner } });
      const created = await h.submitClip();
      await step(h, created.id, 3);
      const before = await loadRequest(h, created.id);

      const restarted = h.restart({ keepJobs: true });
      await restarted.orchestrator.advance(created.id);
      const after = await loadRequest(h, created.id);

      expect(before.jobs.speech.handle).not.toBeNull();
      expect(after.jobs.speech.handle).toBe(before.jobs.speech.handle);
      expect(after.jobs.speech.attempts).toBe(1);
      expect(h.tables.speech.size).toBe(1);
      expect(speech.seen.calls).toBe(1);
    });

    it("retries a job whose handle was lost with the process", async () => {
      const speech = gatedSpeech();
      const h = await setup({ runners: { speech: speech.runner } });
      const created = await h.submitClip();
      await step(h, created.id, 3);

      const restarted = h.restart();
      speech.open();
      await runUntilDone(restarted.orchestrator, h.clock, created.id);
      const request = await loadRequest(h, created.id);

      expect(request.state).toBe(RequestState.COMPLETED);
      expect(request.jobs.speech.attempts).toBe(2);
      expect(request.jobs.speech.submissionKey).toBe("req-1:speech:2");
    });

    it("reuses the recorded handle when the crash came after the ledger write", async () => {
      const h = await setup();
      const created = await h.submitClip();
      await step(h, created.id, 2);
      const analyzing = await loadRequest(h, created.id);
      const key = "req-1:speech:1";
      await h.store.update({
        ...analyzing,
        jobs: { ...analyzing.jobs, speech: { ...analyzing.jobs.speech, attempts: 1, submissionKey: key } },
      });
      const handle = await h.adapters.speech.submit(
        created.id,
        { audioPath: analyzing.media.audioPath ?? "", language: "en" },
        key,
      );

      await h.orchestrator.advance(created.id);
      const request = await loadRequest(h, created.id);

      expect(request.jobs.speech.handle).toBe(handle);
      expect(request.jobs.speech.attempts).toBe(1);
      expect(h.tables.speech.size).toBe(1);
    });

    it("reuses the external job when the crash came before the ledger write", async () => {
      const h = await setup();
      const created = await h.submitClip();
      await step(h, created.id, 2);
      const analyzing = await loadRequest(h, created.id);
      const key = "req-1:speech:1";
      await h.store.update({
        ...analyzing,
        jobs: { ...analyzing.jobs, speech: { ...analyzing.jobs.speech, attempts: 1, submissionKey: key } },
      });
      const handle = await h.tables.speech.submit({ audioPath: analyzing.media.audioPath ?? "", language: "en" }, key);

      await h.orchestrator.advance(created.id);
      const request = await loadRequest(h, created.id);

      expect(request.jobs.speech.handle).toBe(handle);
      expect(await h.store.ledgerGet(created.id, key)).toBe(handle);
      expect(h.tables.speech.size).toBe(1);
    });
  });

  describe("fusion stage", () => {
    function flakyReasoning(failures: number) {
      const scripted = scriptedReasoning();
      const state = { calls: 0 };
      const reasoning: ReasoningCapability = {
        complete: async (prompt, signal) => {
          state.calls++;
          if (state.calls <= failures) {
            throw new TransientServiceError("OpenAI request failed (HTTP 503): overloaded");
          }
          return scripted.complete(prompt, signal);
        },
      };
      return { reasoning, state };
    }

    it("retries transient reasoning failures with backoff", async () => {
      const { reasoning, state } = flakyReasoning(2);
      const h = await setup({ reasoning, fusion: { maxStageAttempts: 3 } });
      const created = await h.submitClip();

      await h.runUntilDone(created.id);
      const request = await loadRequest(h, created.id);

      expect(request.state).toBe(RequestState.COMPLETED);
      expect(request.stageAttempts).toBe(2);
      expect(state.calls).toBe(3);
    });

    it("fails with RESOURCE_EXHAUSTED once the stage bound is reached", async () => {
      const { reasoning, state } = flakyReasoning(Number.POSITIVE_INFINITY);
      const h = await setup({ reasoning, fusion: { maxStageAttempts: 3 } });
      const created = await h.submitClip();

      await h.runUntilDone(created.id);
      const request = await loadRequest(h, created.id);

      expect(request.failure).toEqual({
        code: "RESOURCE_EXHAUSTED",
        message: "Reasoning unavailable after 3 attempt(s): OpenAI request failed (HTTP 503): overloaded",
      });
      expect(state.calls).toBe(3);
    });

    it("fails with SCHEMA_ERROR and no score when repairs run out", async () => {
      const reasoning: ReasoningCapability = { complete: async () => "not json" };
      const h = await setup({ reasoning, fusion: { maxRepairAttempts: 1 } });
      const created = await h.submitClip();

      await h.runUntilDone(created.id);
      const request = await loadRequest(h, created.id);

      expect(request.state).toBe(RequestState.FAILED);
      expect(request.failure).toEqual({
        code: "SCHEMA_ERROR",
        message: "Reasoning output violated the response schema after 2 attempt(s): Response is not a JSON object",
      });
      expect(request.assessment).toBeNull();
      expect(await h.store.getReport(created.id)).toBeNull();
    });
  });
});
