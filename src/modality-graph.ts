// Multimodal Risk Triage - Modality dependency graph
// Declares which modalities are required and which ones wait on others.
// The orchestrator consults this graph instead of hard-coding the policy.

import { JobState, MODALITIES, type Modality, type ModalityJob } from "./types.js";

export type Requirement = "hard" | "soft";

export interface ModalityNode {
  requirement: Requirement;
  /** Modalities that must reach Succeeded before this one is submitted. */
  dependsOn: readonly Modality[];
}

export type ModalityGraph = Readonly<Record<Modality, ModalityNode>>;

export const MODALITY_GRAPH: ModalityGraph = {
  visual: { requirement: "soft", dependsOn: [] },
  speech: { requirement: "hard", dependsOn: [] },
  sentiment: { requirement: "soft", dependsOn: ["speech"] },
};

type JobSet = Readonly<Record<Modality, ModalityJob>>;

/** Succeeded, or failed/timed out with no retries left. */
export function isJobTerminal(job: ModalityJob): boolean {
  if (job.state === JobState.SUCCEEDED) return true;
  return job.permanent && (job.state === JobState.FAILED || job.state === JobState.TIMED_OUT);
}

export function isPermanentlyFailed(job: ModalityJob): boolean {
  return isJobTerminal(job) && job.state !== JobState.SUCCEEDED;
}

/** All prerequisites have succeeded, so the modality may be submitted. */
export function isReady(modality: Modality, jobs: JobSet, graph: ModalityGraph = MODALITY_GRAPH): boolean {
  return graph[modality].dependsOn.every((dep) => jobs[dep].state === JobState.SUCCEEDED);
}

/** Some prerequisite failed permanently, so the modality can never run. */
export function isUnreachable(modality: Modality, jobs: JobSet, graph: ModalityGraph = MODALITY_GRAPH): boolean {
  return graph[modality].dependsOn.some((dep) => isPermanentlyFailed(jobs[dep]));
}

export type PolicyDecision =
  | { kind: "waiting" }
  | { kind: "fail"; modality: Modality }
  | { kind: "proceed"; missing: Modality[] };

/**
 * Decide whether the modality phase is over.
 *  - Any hard modality permanently failed → fail (regardless of the others).
 *  - Every modality terminal → proceed, listing the soft ones that failed.
 *  - Otherwise keep waiting.
 */
export function evaluatePolicy(jobs: JobSet, graph: ModalityGraph = MODALITY_GRAPH): PolicyDecision {
  for (const modality of MODALITIES) {
    if (graph[modality].requirement === "hard" && isPermanentlyFailed(jobs[modality])) {
      return { kind: "fail", modality };
    }
  }

  if (!MODALITIES.every((modality) => isJobTerminal(jobs[modality]))) {
    return { kind: "waiting" };
  }

  return {
    kind: "proceed",
    missing: MODALITIES.filter((modality) => isPermanentlyFailed(jobs[modality])),
  };
}
