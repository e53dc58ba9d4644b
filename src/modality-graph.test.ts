// Unit tests for the modality dependency graph

import { describe, it, expect } from "vitest";
import { evaluatePolicy, isJobTerminal, isReady, isUnreachable } from "./modality-graph.js";
import { JobState, type Modality, type ModalityJob } from "./types.js";

function makeJob(modality: Modality, overrides: Partial<ModalityJob> = {}): ModalityJob {
  return {
    modality,
    state: JobState.PENDING,
    handle: null,
    submissionKey: null,
    attempts: 0,
    submittedAt: null,
    nextAttemptAt: null,
    lastError: null,
    permanent: false,
    resultRef: null,
    ...overrides,
  };
}

function makeJobs(
  overrides: Partial<Record<Modality, Partial<ModalityJob>>> = {},
): Record<Modality, ModalityJob> {
  return {
    visual: makeJob("visual", overrides.visual),
    speech: makeJob("speech", overrides.speech),
    sentiment: makeJob("sentiment", overrides.sentiment),
  };
}

const succeeded = { state: JobState.SUCCEEDED };
const deadFailed = { state: JobState.FAILED, permanent: true };
const deadTimedOut = { state: JobState.TIMED_OUT, permanent: true };

describe("isJobTerminal()", () => {
  it("treats succeeded and permanently failed jobs as terminal", () => {
    expect(isJobTerminal(makeJob("visual", succeeded))).toBe(true);
    expect(isJobTerminal(makeJob("visual", deadFailed))).toBe(true);
    expect(isJobTerminal(makeJob("visual", deadTimedOut))).toBe(true);
  });

  it("treats retryable failures and in-flight jobs as non-terminal", () => {
    expect(isJobTerminal(makeJob("visual", { state: JobState.FAILED }))).toBe(false);
    expect(isJobTerminal(makeJob("visual", { state: JobState.RUNNING }))).toBe(false);
    expect(isJobTerminal(makeJob("visual"))).toBe(false);
  });
});

describe("isReady()", () => {
  it("visual and speech have no prerequisites", () => {
    const jobs = makeJobs();
    expect(isReady("visual", jobs)).toBe(true);
    expect(isReady("speech", jobs)).toBe(true);
  });

  it("sentiment waits for speech to succeed", () => {
    expect(isReady("sentiment", makeJobs({ speech: { state: JobState.RUNNING } }))).toBe(false);
    expect(isReady("sentiment", makeJobs({ speech: succeeded }))).toBe(true);
  });
});

describe("isUnreachable()", () => {
  it("sentiment is unreachable once speech failed permanently", () => {
    expect(isUnreachable("sentiment", makeJobs({ speech: deadFailed }))).toBe(true);
    expect(isUnreachable("sentiment", makeJobs({ speech: { state: JobState.FAILED } }))).toBe(false);
  });
});

describe("evaluatePolicy()", () => {
  it("waits while any job is in flight", () => {
    expect(evaluatePolicy(makeJobs({ speech: succeeded, visual: succeeded }))).toEqual({ kind: "waiting" });
  });

  it("fails on a permanent speech failure even when visual succeeded", () => {
    expect(evaluatePolicy(makeJobs({ visual: succeeded, speech: deadTimedOut }))).toEqual({
      kind: "fail",
      modality: "speech",
    });
  });

  it("fails on speech before the other jobs finish", () => {
    expect(evaluatePolicy(makeJobs({ visual: { state: JobState.RUNNING }, speech: deadFailed }))).toEqual({
      kind: "fail",
      modality: "speech",
    });
  });

  it("proceeds with the soft modalities that failed listed as missing", () => {
    expect(evaluatePolicy(makeJobs({ visual: deadFailed, speech: succeeded, sentiment: succeeded }))).toEqual({
      kind: "proceed",
      missing: ["visual"],
    });
  });

  it("proceeds with nothing missing when all succeeded", () => {
    expect(evaluatePolicy(makeJobs({ visual: succeeded, speech: succeeded, sentiment: succeeded }))).toEqual({
      kind: "proceed",
      missing: [],
    });
  });
});
