// Assessment Validator: checks a reasoning response against the fusion
// output contract before anything is built from it.
//
// Contract:
//   risk_score     integer in [0, 100]
//   classification "low" | "medium" | "high"; the stored value is always
//                  derived from risk_score
//   narrative      non-empty string
//   cited_entries  non-empty list of distinct timeline entry ids (may be empty
//                  only when the timeline itself is empty)
//   indicators     list of short strings (optional, at most MAX_INDICATORS)

import { parseJsonObject } from "./providers/openai-client.js";
import { classify, isValidRiskScore } from "./scoring-policy.js";
import type { RiskClassification } from "./types.js";

// ─── Public result type ─────────────────────────────────────────────────────────

export interface ValidationResult {
  valid: boolean;
  issues: string[];
}

export interface RawAssessment {
  riskScore: number;
  classification: RiskClassification;
  narrative: string;
  citedEntryIds: string[];
  indicators: string[];
}

export type AssessmentCheck = ValidationResult & { assessment: RawAssessment | null };

export const MAX_INDICATORS = 10;
export const MAX_INDICATOR_LENGTH = 80;

function isClassification(value: unknown): value is RiskClassification {
  return value === "low" || value === "medium" || value === "high";
}

// ─── AssessmentValidator ────────────────────────────────────────────────────────

export class AssessmentValidator {
  /**
   * Validate raw model output. Every problem found is reported; the parsed
   * assessment is only returned when there are none.
   */
  validate(raw: string, knownEntryIds: ReadonlySet<string>): AssessmentCheck {
    const obj = parseJsonObject(raw);
    if (!obj) {
      return { valid: false, issues: ["Response is not a JSON object"], assessment: null };
    }

    const issues: string[] = [];

    const score = obj.risk_score;
    if (!isValidRiskScore(score)) {
      issues.push(`'risk_score' must be an integer between 0 and 100 (got ${JSON.stringify(score) ?? "nothing"})`);
    }

    const classification = obj.classification;
    if (!isClassification(classification)) {
      issues.push(`'classification' must be one of "low", "medium", "high" (got ${JSON.stringify(classification) ?? "nothing"})`);
    }

    const narrative = obj.narrative;
    if (typeof narrative !== "string" || narrative.trim().length === 0) {
      issues.push("'narrative' must be a non-empty string");
    }

    const cited = this.checkCitations(obj.cited_entries, knownEntryIds, issues);
    const indicators = this.checkIndicators(obj.indicators, issues);

    if (
      issues.length > 0 ||
      !isValidRiskScore(score) ||
      typeof narrative !== "string" ||
      cited === null ||
      indicators === null
    ) {
      return { valid: false, issues, assessment: null };
    }

    return {
      valid: true,
      issues: [],
      assessment: {
        riskScore: score,
        classification: classify(score),
        narrative: narrative.trim(),
        citedEntryIds: cited,
        indicators,
      },
    };
  }

  private checkCitations(value: unknown, known: ReadonlySet<string>, issues: string[]): string[] | null {
    if (!Array.isArray(value)) {
      issues.push("'cited_entries' must be an array of timeline entry ids");
      return null;
    }

    const ids: string[] = [];
    let ok = true;
    for (const item of value) {
      if (typeof item !== "string") {
        issues.push(`'cited_entries' contains a non-string value: ${JSON.stringify(item)}`);
        ok = false;
      } else if (!known.has(item)) {
        issues.push(`'cited_entries' references unknown entry "${item}"`);
        ok = false;
      } else if (ids.includes(item)) {
        issues.push(`'cited_entries' lists "${item}" more than once`);
        ok = false;
      } else {
        ids.push(item);
      }
    }

    if (ok && ids.length === 0 && known.size > 0) {
      issues.push("'cited_entries' must cite at least one timeline entry");
      ok = false;
    }
    return ok ? ids : null;
  }

  private checkIndicators(value: unknown, issues: string[]): string[] | null {
    if (value === undefined) return [];
    if (!Array.isArray(value)) {
      issues.push("'indicators' must be an array of strings");
      return null;
    }
    if (value.length > MAX_INDICATORS) {
      issues.push(`'indicators' must have at most ${MAX_INDICATORS} items (got ${value.length})`);
      return null;
    }
    const indicators: string[] = [];
    for (const item of value) {
      if (typeof item !== "string" || item.trim().length === 0 || item.length > MAX_INDICATOR_LENGTH) {
        issues.push(`'indicators' items must be non-empty strings of at most ${MAX_INDICATOR_LENGTH} characters`);
        return null;
      }
      indicators.push(item.trim());
    }
    return indicators;
  }
}
