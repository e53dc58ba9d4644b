// Shared utilities for the risk triage pipeline.
//
// Deterministic helpers used across the aggregator, the sentiment provider and
// the evidence selector: time-window arithmetic and word-level utterance
// segmentation.

import type { TimeWindow, TranscriptWord } from "./types.js";

// ─── Time windows ───────────────────────────────────────────────────────────────

/** True when the two windows overlap or are no more than `tolerance` seconds apart. */
export function windowsTouch(a: TimeWindow, b: TimeWindow, tolerance = 0): boolean {
  return a.start <= b.end + tolerance && b.start <= a.end + tolerance;
}

export function windowDuration(window: TimeWindow): number {
  return Math.max(0, window.end - window.start);
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Formats a number of seconds into `MM:SS` form.
 */
export function formatTimestamp(seconds: number): string {
  const totalSeconds = Math.max(0, Math.floor(seconds));
  const minutes = Math.floor(totalSeconds / 60);
  const secs = totalSeconds % 60;
  return `${String(minutes).padStart(2, "0")}:${String(secs).padStart(2, "0")}`;
}

// ─── Utterance segmentation ─────────────────────────────────────────────────────

/**
 * Common abbreviations (lowercase, without trailing period) whose period does
 * not end an utterance.
 */
const ABBREVIATIONS = new Set([
  "mr",
  "mrs",
  "ms",
  "dr",
  "prof",
  "sr",
  "jr",
  "st",
  "vs",
  "etc",
  "approx",
  "sra",
  "srta",
]);

export interface WordGroup {
  text: string;
  startTime: number;
  endTime: number;
  words: TranscriptWord[];
}

export interface SegmentationOptions {
  /** Silence gap (seconds) between two words that always starts a new utterance. */
  maxGapSeconds: number;
  /** Hard cap on utterance length in words. */
  maxWords: number;
}

const DEFAULT_SEGMENTATION: SegmentationOptions = {
  maxGapSeconds: 1.0,
  maxWords: 40,
};

function endsSentence(word: string): boolean {
  const stripped = word.trim().replace(/["')\]]+$/, "");
  if (!/[.!?]$/.test(stripped)) return false;
  if (/\.{3}$/.test(stripped)) return true;
  const bare = stripped.replace(/[.!?]+$/, "").toLowerCase();
  if (stripped.endsWith(".") && ABBREVIATIONS.has(bare)) return false;
  return true;
}

/**
 * Group timed words into utterances. An utterance ends at sentence-final
 * punctuation (abbreviations excepted), before a silence gap longer than
 * `maxGapSeconds`, or when it reaches `maxWords` words.
 */
export function segmentUtterances(
  words: readonly TranscriptWord[],
  options: Partial<SegmentationOptions> = {},
): WordGroup[] {
  const opts = { ...DEFAULT_SEGMENTATION, ...options };
  const groups: WordGroup[] = [];
  let current: TranscriptWord[] = [];

  const flush = () => {
    if (current.length === 0) return;
    groups.push({
      text: current.map((w) => w.word.trim()).filter((w) => w.length > 0).join(" "),
      startTime: current[0].startTime,
      endTime: current[current.length - 1].endTime,
      words: current,
    });
    current = [];
  };

  for (let i = 0; i < words.length; i++) {
    const word = words[i];
    if (current.length > 0) {
      const previous = current[current.length - 1];
      if (word.startTime - previous.endTime > opts.maxGapSeconds) {
        flush();
      }
    }

    current.push(word);

    if (endsSentence(word.word) || current.length >= opts.maxWords) {
      flush();
    }
  }

  flush();
  return groups;
}

// ─── Canonical JSON ─────────────────────────────────────────────────────────────

/**
 * JSON serialization with object keys sorted at every level, so equal values
 * always produce identical bytes.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeys(value), null, 2);
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (value !== null && typeof value === "object") {
    const entries: Array<[string, unknown]> = Object.entries(value);
    entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    const sorted: Record<string, unknown> = {};
    for (const [key, entry] of entries) {
      if (entry !== undefined) {
        sorted[key] = sortKeys(entry);
      }
    }
    return sorted;
  }
  return value;
}
