// Multimodal Risk Triage - Scoring policy
// Deterministic score → classification mapping and the pluggable modality
// weighting policy used by the fusion engine.

import { ValidationError } from "./errors.js";
import { MODALITIES, type Modality, type ModalityStatus, type RiskClassification } from "./types.js";
import { roundTo } from "./utils.js";

// ─── Classification ─────────────────────────────────────────────────────────────

export const CLASSIFICATION_BANDS: ReadonlyArray<{ classification: RiskClassification; min: number; max: number }> = [
  { classification: "low", min: 0, max: 33 },
  { classification: "medium", min: 34, max: 66 },
  { classification: "high", min: 67, max: 100 },
];

export function isValidRiskScore(score: unknown): score is number {
  return typeof score === "number" && Number.isInteger(score) && score >= 0 && score <= 100;
}

/**
 * Low = [0,33], Medium = [34,66], High = [67,100].
 * @throws ValidationError for anything that is not an integer in [0, 100].
 */
export function classify(score: number): RiskClassification {
  if (!isValidRiskScore(score)) {
    throw new ValidationError(`Risk score must be an integer between 0 and 100 (got ${score})`);
  }
  for (const band of CLASSIFICATION_BANDS) {
    if (score <= band.max) return band.classification;
  }
  return "high";
}

// ─── Modality weighting ─────────────────────────────────────────────────────────

export interface ModalityWeights {
  /** Relative weight of each modality in the fused judgement; missing modalities weigh 0. Sums to 1 when any is available. */
  weights: Record<Modality, number>;
  /** Share of the full evidence base that was available, in [0, 1]. */
  confidence: number;
}

export interface ModalityWeightingPolicy {
  weigh(coverage: Record<Modality, ModalityStatus>): ModalityWeights;
}

export const DEFAULT_BASE_WEIGHTS: Readonly<Record<Modality, number>> = {
  visual: 0.3,
  speech: 0.4,
  sentiment: 0.3,
};

/**
 * Fixed base weights renormalized over the available modalities. Confidence is
 * the base weight that survived.
 */
export class CoverageWeightingPolicy implements ModalityWeightingPolicy {
  private readonly baseWeights: Readonly<Record<Modality, number>>;

  constructor(baseWeights: Readonly<Record<Modality, number>> = DEFAULT_BASE_WEIGHTS) {
    for (const modality of MODALITIES) {
      if (!(baseWeights[modality] >= 0)) {
        throw new ValidationError(`Base weight for ${modality} must be a non-negative number`);
      }
    }
    this.baseWeights = baseWeights;
  }

  weigh(coverage: Record<Modality, ModalityStatus>): ModalityWeights {
    const total = MODALITIES.reduce((sum, m) => sum + this.baseWeights[m], 0);
    const available = MODALITIES.reduce(
      (sum, m) => sum + (coverage[m] === "available" ? this.baseWeights[m] : 0),
      0,
    );

    const weights: Record<Modality, number> = { visual: 0, speech: 0, sentiment: 0 };
    for (const modality of MODALITIES) {
      weights[modality] =
        coverage[modality] === "available" && available > 0
          ? roundTo(this.baseWeights[modality] / available, 3)
          : 0;
    }

    return { weights, confidence: total > 0 ? roundTo(available / total, 3) : 0 };
  }
}
