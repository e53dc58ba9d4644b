// Fusion & Scoring Engine: turns the merged timeline into a risk assessment
// using a generative reasoning step under a strict JSON output contract.
//
// Pipeline:
//   1. Weighting: the modality weighting policy scores the available evidence.
//   2. Reasoning: the model receives the structured timeline and returns
//      risk_score / classification / narrative / cited_entries / indicators.
//   3. Validation: on contract violations the model is re-prompted with the
//      issue list, up to maxRepairAttempts times; then SchemaError. A score is
//      never defaulted or invented.
//   4. Finalization: classification is recomputed from the score, cited entry
//      ids are resolved to windows and missing modalities are disclosed.

import { AssessmentValidator } from "./assessment-validator.js";
import { DEFAULT_FUSION_CONFIG, type FusionConfig } from "./config.js";
import { SchemaError, TransientServiceError } from "./errors.js";
import type { Logger } from "./logger.js";
import { createLogger } from "./logger.js";
import type { ReasoningCapability, ReasoningPrompt } from "./providers/openai-reasoning.js";
import { CoverageWeightingPolicy, type ModalityWeightingPolicy, type ModalityWeights } from "./scoring-policy.js";
import {
  MODALITIES,
  type FusedAssessment,
  type Modality,
  type ModalityStatus,
  type Timeline,
  type TimelineEntry,
} from "./types.js";
import { formatTimestamp } from "./utils.js";

export interface FusionContext {
  requestId: string;
  durationSeconds: number;
  /** Soft modalities that failed permanently. */
  missingModalities: Modality[];
}

export interface FusionEngineDeps {
  reasoning: ReasoningCapability;
  policy?: ModalityWeightingPolicy;
  config?: Partial<FusionConfig>;
  logger?: Logger;
}

// ─── Disclosure ─────────────────────────────────────────────────────────────────

export const MODALITY_NAMES: Readonly<Record<Modality, string>> = {
  visual: "visual (facial emotion)",
  speech: "speech",
  sentiment: "sentiment",
};

export function disclosureSentence(missing: readonly Modality[]): string {
  const names = missing.map((m) => MODALITY_NAMES[m]);
  const joined = names.length > 1 ? `${names.slice(0, -1).join(", ")} and ${names[names.length - 1]}` : names[0];
  const verb = names.length > 1 ? "analyses were" : "analysis was";
  return `Note: the ${joined} ${verb} unavailable for this request, so this assessment relies on the remaining modalities.`;
}

function disclosesModality(sentences: readonly string[], modality: Modality): boolean {
  const named = new RegExp(`\\b${modality}\\b`, "i");
  return sentences.some((sentence) => named.test(sentence) && /\bunavailable\b/i.test(sentence));
}

/**
 * Prepend the disclosure sentence unless, for every missing modality, some
 * sentence of the narrative names it as a whole word and calls it unavailable.
 */
export function ensureDisclosure(narrative: string, missing: readonly Modality[]): string {
  if (missing.length === 0) return narrative;
  const sentences = narrative.split(/(?<=[.!?])\s+/);
  if (missing.every((m) => disclosesModality(sentences, m))) return narrative;
  return `${disclosureSentence(missing)} ${narrative}`;
}

// ─── Prompt construction ────────────────────────────────────────────────────────

const SYSTEM_PROMPT = `You assist non-specialist triage reviewers by assessing indicators of possible domestic-violence risk in a recorded video. You receive a merged, time-ordered timeline of machine-derived observations: facial emotion events (visual), transcript segments (speech) and utterance sentiment (sentiment).

## Output Format
Respond with a valid JSON object matching this exact structure:
{
  "risk_score": integer from 0 to 100,
  "classification": "low" | "medium" | "high",
  "narrative": "string (3-6 sentences explaining the score, referencing timestamps)",
  "cited_entries": ["entry ids from the timeline, e.g. \\"e3\\", that support the score"],
  "indicators": ["short labels of observed indicators, at most 10"]
}

## Rules
- classification MUST follow the score: low = 0-33, medium = 34-66, high = 67-100.
- cited_entries MUST only contain ids that appear in the timeline, each at most once. Cite at least one entry when the timeline is not empty.
- Base the assessment only on the observations provided. Do not speculate about identities, relationships or events that are not in the timeline.
- The observations are automated and can be wrong; weigh modalities by the weights given and say when evidence is thin.
- If any analysis is listed as unavailable, the narrative MUST say so.
- This is a screening aid, not a determination; avoid definitive language.`;

function describeEntry(entry: TimelineEntry): string {
  const parts = [
    `${entry.id} [${formatTimestamp(entry.window.start)}-${formatTimestamp(entry.window.end)}]`,
    `${entry.modality}/${entry.label}`,
    `confidence=${entry.confidence}`,
  ];
  if (entry.mergedCount > 1) parts.push(`merged=${entry.mergedCount}`);
  if (entry.sentimentScore !== undefined) parts.push(`score=${entry.sentimentScore}`);
  if (entry.entities && entry.entities.length > 0) parts.push(`entities=${entry.entities.join("|")}`);
  if (entry.text) parts.push(JSON.stringify(entry.text));
  return parts.join(" ");
}

export function buildFusionPrompt(
  timeline: Timeline,
  context: FusionContext,
  weights: ModalityWeights,
): ReasoningPrompt {
  let user = `## Recording
Duration: ${formatTimestamp(context.durationSeconds)} (${context.durationSeconds.toFixed(1)}s)

## Timeline Summary
${JSON.stringify(timeline.summary, null, 2)}

## Modality Weights
${MODALITIES.map((m) => `- ${m}: ${weights.weights[m]}`).join("\n")}
Coverage confidence: ${weights.confidence}

## Timeline Entries
${timeline.entries.length > 0 ? timeline.entries.map(describeEntry).join("\n") : "(no entries)"}`;

  if (context.missingModalities.length > 0) {
    user += `

## Unavailable Analyses
${context.missingModalities.map((m) => `- ${MODALITY_NAMES[m]}: failed permanently, no data`).join("\n")}
The narrative MUST state that the ${context.missingModalities.join(" and ")} analysis was unavailable.`;
  }

  user += `

Assess the risk indicators following the rules and output format above. Respond with ONLY the JSON object.`;

  return { system: SYSTEM_PROMPT, user };
}

export function buildRepairPrompt(original: ReasoningPrompt, previous: string, issues: string[]): ReasoningPrompt {
  return {
    system: original.system,
    user: `${original.user}

## Previous Response (rejected)
${previous}

## Validation Issues
${issues.map((issue) => `- ${issue}`).join("\n")}

Please provide a corrected response that fixes every issue above. Respond with ONLY the JSON object.`,
  };
}

// ─── FusionEngine ───────────────────────────────────────────────────────────────

export class FusionEngine {
  private readonly reasoning: ReasoningCapability;
  private readonly policy: ModalityWeightingPolicy;
  private readonly config: FusionConfig;
  private readonly validator = new AssessmentValidator();
  private readonly logger: Logger;

  constructor(deps: FusionEngineDeps) {
    this.reasoning = deps.reasoning;
    this.policy = deps.policy ?? new CoverageWeightingPolicy();
    this.config = { ...DEFAULT_FUSION_CONFIG, ...deps.config };
    this.logger = deps.logger ?? createLogger("FusionEngine");
  }

  /**
   * @throws SchemaError when the response still violates the contract after all repairs.
   * @throws TransientServiceError when reasoning is unavailable or times out.
   */
  async assess(timeline: Timeline, context: FusionContext): Promise<FusedAssessment> {
    const coverage = this.coverage(timeline, context);
    const weights = this.policy.weigh(coverage);
    const prompt = buildFusionPrompt(timeline, context, weights);
    const known = new Set(timeline.entries.map((e) => e.id));

    let raw = await this.callReasoning(prompt);
    let check = this.validator.validate(raw, known);

    for (let repair = 1; !check.valid && repair <= this.config.maxRepairAttempts; repair++) {
      this.logger.warn(
        `Reasoning response for ${context.requestId} failed validation (${check.issues.length} issue(s)); repair ${repair}/${this.config.maxRepairAttempts}`,
      );
      raw = await this.callReasoning(buildRepairPrompt(prompt, raw, check.issues));
      check = this.validator.validate(raw, known);
    }

    const parsed = check.assessment;
    if (!parsed) {
      throw new SchemaError(
        `Reasoning output violated the response schema after ${this.config.maxRepairAttempts + 1} attempt(s)`,
        check.issues,
      );
    }

    const cited = timeline.entries.filter((entry) => parsed.citedEntryIds.includes(entry.id));
    const citedWindows = cited
      .map((entry) => ({ ...entry.window }))
      .sort((a, b) => a.start - b.start || a.end - b.end);

    const assessment: FusedAssessment = {
      riskScore: parsed.riskScore,
      classification: parsed.classification,
      narrative: ensureDisclosure(parsed.narrative, context.missingModalities),
      citedWindows,
      citedEntryIds: cited.map((entry) => entry.id),
      indicators: parsed.indicators,
      confidence: weights.confidence,
      missingModalities: [...context.missingModalities],
    };

    this.logger.info(
      `Assessed ${context.requestId}: score ${assessment.riskScore} (${assessment.classification}), ${citedWindows.length} cited window(s)`,
    );
    return assessment;
  }

  private coverage(timeline: Timeline, context: FusionContext): Record<Modality, ModalityStatus> {
    const coverage: Record<Modality, ModalityStatus> = { ...timeline.summary.modalities };
    for (const modality of context.missingModalities) {
      coverage[modality] = "missing";
    }
    return coverage;
  }

  private async callReasoning(prompt: ReasoningPrompt): Promise<string> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new TransientServiceError(`Reasoning timed out after ${this.config.reasoningTimeoutMs}ms`));
      }, this.config.reasoningTimeoutMs);
    });

    try {
      return await Promise.race([this.reasoning.complete(prompt, controller.signal), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
