import { describe, it, expect } from "vitest";
import { AssessmentValidator } from "./assessment-validator.js";

// ─── Helpers ────────────────────────────────────────────────────────────────────

function makeResponse(overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({
    risk_score: 48,
    classification: "medium",
    narrative: "Raised voice and negative statements around 00:12.",
    cited_entries: ["e1", "e3"],
    indicators: ["raised voice", "negative sentiment"],
    ...overrides,
  });
}

const KNOWN = new Set(["e1", "e2", "e3"]);

// ─── Tests ──────────────────────────────────────────────────────────────────────

describe("AssessmentValidator", () => {
  const validator = new AssessmentValidator();

  it("accepts a conforming response", () => {
    expect(validator.validate(makeResponse(), KNOWN)).toEqual({
      valid: true,
      issues: [],
      assessment: {
        riskScore: 48,
        classification: "medium",
        narrative: "Raised voice and negative statements around 00:12.",
        citedEntryIds: ["e1", "e3"],
        indicators: ["raised voice", "negative sentiment"],
      },
    });
  });

  it("treats missing indicators as an empty list", () => {
    const result = validator.validate(makeResponse({ indicators: undefined }), KNOWN);
    expect(result.valid).toBe(true);
    expect(result.assessment?.indicators).toEqual([]);
  });

  it("rejects non-JSON output", () => {
    expect(validator.validate("Sure! Here is the JSON", KNOWN)).toEqual({
      valid: false,
      issues: ["Response is not a JSON object"],
      assessment: null,
    });
  });

  describe("risk_score", () => {
    it.each([101, -3, 50.5, "50", null])("rejects %s", (score) => {
      const result = validator.validate(makeResponse({ risk_score: score }), KNOWN);
      expect(result.valid).toBe(false);
      expect(result.issues[0]).toMatch(/^'risk_score' must be an integer between 0 and 100/);
    });

    it("reports a missing score", () => {
      const result = validator.validate(makeResponse({ risk_score: undefined }), KNOWN);
      expect(result.issues[0]).toBe("'risk_score' must be an integer between 0 and 100 (got nothing)");
    });
  });

  describe("classification", () => {
    it("derives the label from the score when the model's label disagrees", () => {
      const result = validator.validate(makeResponse({ risk_score: 50, classification: "high" }), KNOWN);
      expect(result.valid).toBe(true);
      expect(result.issues).toEqual([]);
      expect(result.assessment?.classification).toBe("medium");
    });

    it("rejects an unknown label", () => {
      const result = validator.validate(makeResponse({ classification: "severe" }), KNOWN);
      expect(result.issues).toEqual([`'classification' must be one of "low", "medium", "high" (got "severe")`]);
    });
  });

  describe("narrative", () => {
    it("rejects a blank narrative", () => {
      const result = validator.validate(makeResponse({ narrative: "   " }), KNOWN);
      expect(result.issues).toEqual(["'narrative' must be a non-empty string"]);
    });
  });

  describe("cited_entries", () => {
    it("rejects unknown and duplicate ids together", () => {
      const result = validator.validate(makeResponse({ cited_entries: ["e1", "e9", "e1"] }), KNOWN);
      expect(result.issues).toEqual([
        `'cited_entries' references unknown entry "e9"`,
        `'cited_entries' lists "e1" more than once`,
      ]);
    });

    it("requires at least one citation when the timeline has entries", () => {
      const result = validator.validate(makeResponse({ cited_entries: [] }), KNOWN);
      expect(result.issues).toEqual(["'cited_entries' must cite at least one timeline entry"]);
    });

    it("allows no citations for an empty timeline", () => {
      const result = validator.validate(makeResponse({ cited_entries: [] }), new Set());
      expect(result.valid).toBe(true);
    });

    it("rejects a non-array value", () => {
      const result = validator.validate(makeResponse({ cited_entries: "e1" }), KNOWN);
      expect(result.issues).toEqual(["'cited_entries' must be an array of timeline entry ids"]);
    });
  });

  describe("indicators", () => {
    it("rejects too many indicators", () => {
      const indicators = Array.from({ length: 11 }, (_, i) => `indicator ${i}`);
      const result = validator.validate(makeResponse({ indicators }), KNOWN);
      expect(result.issues).toEqual(["'indicators' must have at most 10 items (got 11)"]);
    });

    it("rejects non-string indicators", () => {
      const result = validator.validate(makeResponse({ indicators: ["ok", 4] }), KNOWN);
      expect(result.issues).toEqual(["'indicators' items must be non-empty strings of at most 80 characters"]);
    });
  });

  it("collects every issue in one pass", () => {
    const result = validator.validate(
      JSON.stringify({ risk_score: 200, classification: "high", narrative: "", cited_entries: ["x"] }),
      KNOWN,
    );
    expect(result.issues).toHaveLength(3);
  });
});
