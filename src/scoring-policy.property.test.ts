// Property-based tests for the scoring policy

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { CoverageWeightingPolicy, classify } from "./scoring-policy.js";
import type { ModalityStatus } from "./types.js";

describe("classify() properties", () => {
  it("maps every integer score in [0,100] to exactly its band", () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 100 }), (score) => {
        const expected = score <= 33 ? "low" : score <= 66 ? "medium" : "high";
        expect(classify(score)).toBe(expected);
      }),
    );
  });

  it("is monotonic in the score", () => {
    const rank = { low: 0, medium: 1, high: 2 } as const;
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 100 }), fc.integer({ min: 0, max: 100 }), (a, b) => {
        const [lo, hi] = a <= b ? [a, b] : [b, a];
        expect(rank[classify(lo)]).toBeLessThanOrEqual(rank[classify(hi)]);
      }),
    );
  });

  it("rejects scores outside [0,100] and non-integers", () => {
    fc.assert(
      fc.property(
        fc.oneof(
          fc.integer({ min: 101, max: 10_000 }),
          fc.integer({ min: -10_000, max: -1 }),
          fc.double({ min: 0.01, max: 99.99, noNaN: true }).filter((x) => !Number.isInteger(x)),
        ),
        (score) => {
          expect(() => classify(score)).toThrow("Risk score must be an integer between 0 and 100");
        },
      ),
    );
  });
});

describe("CoverageWeightingPolicy properties", () => {
  const status = fc.constantFrom<ModalityStatus>("available", "missing");

  it("gives missing modalities zero weight and keeps confidence in [0,1]", () => {
    const policy = new CoverageWeightingPolicy();
    fc.assert(
      fc.property(status, status, status, (visual, speech, sentiment) => {
        const coverage = { visual, speech, sentiment };
        const { weights, confidence } = policy.weigh(coverage);
        for (const modality of ["visual", "speech", "sentiment"] as const) {
          if (coverage[modality] === "missing") expect(weights[modality]).toBe(0);
        }
        expect(confidence).toBeGreaterThanOrEqual(0);
        expect(confidence).toBeLessThanOrEqual(1);
      }),
    );
  });
});
