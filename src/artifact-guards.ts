// Multimodal Risk Triage - Artifact guards
// Results are read back from the store as plain JSON; these guards check the
// shape before the orchestrator hands them to the next stage.

import {
  EMOTION_LABELS,
  SENTIMENT_LABELS,
  type EmotionEvent,
  type EmotionLabel,
  type SentimentLabel,
  type TimeWindow,
  type Timeline,
  type Transcript,
  type TranscriptWord,
  type Utterance,
} from "./types.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function isTimeWindow(value: unknown): value is TimeWindow {
  return isRecord(value) && isFiniteNumber(value.start) && isFiniteNumber(value.end);
}

function isEmotionLabel(value: unknown): value is EmotionLabel {
  return EMOTION_LABELS.some((label) => label === value);
}

function isSentimentLabel(value: unknown): value is SentimentLabel {
  return SENTIMENT_LABELS.some((label) => label === value);
}

export function isEmotionEvents(value: unknown): value is EmotionEvent[] {
  return (
    Array.isArray(value) &&
    value.every(
      (item) =>
        isRecord(item) && isTimeWindow(item.window) && isEmotionLabel(item.emotion) && isFiniteNumber(item.confidence),
    )
  );
}

function isTranscriptWord(value: unknown): value is TranscriptWord {
  return (
    isRecord(value) &&
    typeof value.word === "string" &&
    isFiniteNumber(value.startTime) &&
    isFiniteNumber(value.endTime) &&
    isFiniteNumber(value.confidence)
  );
}

export function isTranscript(value: unknown): value is Transcript {
  return (
    isRecord(value) &&
    typeof value.text === "string" &&
    typeof value.language === "string" &&
    isFiniteNumber(value.durationSeconds) &&
    Array.isArray(value.words) &&
    value.words.every(isTranscriptWord)
  );
}

export function isUtterances(value: unknown): value is Utterance[] {
  return (
    Array.isArray(value) &&
    value.every(
      (item) =>
        isRecord(item) &&
        isTimeWindow(item.window) &&
        typeof item.text === "string" &&
        isSentimentLabel(item.sentiment) &&
        isFiniteNumber(item.sentimentScore) &&
        Array.isArray(item.entities) &&
        item.entities.every((entity) => typeof entity === "string"),
    )
  );
}

/** Entries are checked for id and window; the summary only for presence. */
export function isTimeline(value: unknown): value is Timeline {
  return (
    isRecord(value) &&
    isRecord(value.summary) &&
    Array.isArray(value.entries) &&
    value.entries.every(
      (entry) =>
        isRecord(entry) && typeof entry.id === "string" && isTimeWindow(entry.window) && typeof entry.label === "string",
    )
  );
}
