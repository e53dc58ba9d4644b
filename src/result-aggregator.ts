// Multimodal Risk Triage - Result Aggregator
// Merges the modality outputs into one time-ordered, provenance-tagged
// timeline plus a structured (numbers only) summary for the fusion prompt.
//
// Merge rule: entries of the same modality and label whose windows overlap or
// touch (within the kind's tolerance) are unioned into a single entry. Every
// source event lands in exactly one entry; mergedCount records how many.

import {
  EMOTION_LABELS,
  type EmotionEvent,
  type EmotionLabel,
  type Modality,
  type ModalityStatus,
  type SentimentLabel,
  type TimeWindow,
  type Timeline,
  type TimelineEntry,
  type TimelineEntryKind,
  type TimelineSummary,
  type Transcript,
  type TranscriptWord,
  type Utterance,
} from "./types.js";
import { roundTo, segmentUtterances, windowDuration, windowsTouch } from "./utils.js";

export interface AggregatorInputs {
  durationSeconds: number;
  visual: EmotionEvent[] | null;
  speech: Transcript | null;
  sentiment: Utterance[] | null;
}

export interface AggregatorOptions {
  /** Gap (seconds) across which same-label emotion events are still unioned. */
  emotionMergeToleranceSeconds: number;
  /** Gap across which same-label utterances are unioned. */
  utteranceMergeToleranceSeconds: number;
}

export const DEFAULT_AGGREGATOR_OPTIONS: AggregatorOptions = {
  emotionMergeToleranceSeconds: 0.5,
  utteranceMergeToleranceSeconds: 0,
};

// Pre-merge entry; `sources` counts the events absorbed so far.
interface Draft {
  window: TimeWindow;
  modality: Modality;
  kind: TimelineEntryKind;
  label: string;
  confidenceSum: number;
  sources: number;
  texts: string[];
  scoreSum: number | null;
  entities: string[];
}

function normalizeWindow(window: TimeWindow): TimeWindow {
  return { start: Math.min(window.start, window.end), end: Math.max(window.start, window.end) };
}

function meanConfidence(words: readonly TranscriptWord[]): number | null {
  if (words.length === 0) return null;
  return words.reduce((sum, w) => sum + w.confidence, 0) / words.length;
}

function wordsWithin(words: readonly TranscriptWord[], window: TimeWindow): TranscriptWord[] {
  return words.filter((w) => w.startTime < window.end && w.endTime > window.start);
}

/**
 * Union same-(modality, label) drafts whose windows touch within `tolerance`.
 * Drafts must be sorted by start time.
 */
function mergeDrafts(drafts: Draft[], tolerance: number): Draft[] {
  const open = new Map<string, Draft>();
  const merged: Draft[] = [];

  for (const draft of drafts) {
    const key = `${draft.modality}|${draft.label}`;
    const current = open.get(key);
    if (current && windowsTouch(current.window, draft.window, tolerance)) {
      current.window.end = Math.max(current.window.end, draft.window.end);
      current.confidenceSum += draft.confidenceSum;
      current.sources += draft.sources;
      current.texts.push(...draft.texts);
      if (current.scoreSum !== null && draft.scoreSum !== null) {
        current.scoreSum += draft.scoreSum;
      }
      for (const entity of draft.entities) {
        if (!current.entities.includes(entity)) current.entities.push(entity);
      }
    } else {
      const copy: Draft = { ...draft, window: { ...draft.window }, texts: [...draft.texts], entities: [...draft.entities] };
      open.set(key, copy);
      merged.push(copy);
    }
  }

  return merged;
}

function byStart(a: Draft, b: Draft): number {
  return a.window.start - b.window.start || a.window.end - b.window.end;
}

function emotionDrafts(events: EmotionEvent[]): Draft[] {
  return events
    .map((event) => ({
      window: normalizeWindow(event.window),
      modality: "visual" as const,
      kind: "emotion" as const,
      label: event.emotion,
      confidenceSum: event.confidence,
      sources: 1,
      texts: [],
      scoreSum: null,
      entities: [],
    }))
    .sort(byStart);
}

function utteranceDrafts(utterances: Utterance[], words: readonly TranscriptWord[]): Draft[] {
  return utterances
    .map((utterance) => {
      const window = normalizeWindow(utterance.window);
      return {
        window,
        modality: "sentiment" as const,
        kind: "utterance" as const,
        label: utterance.sentiment,
        confidenceSum: meanConfidence(wordsWithin(words, window)) ?? 1,
        sources: 1,
        texts: utterance.text ? [utterance.text] : [],
        scoreSum: utterance.sentimentScore,
        entities: [...new Set(utterance.entities.map((e) => e.trim()).filter((e) => e.length > 0))],
      };
    })
    .sort(byStart);
}

function speechDrafts(transcript: Transcript): Draft[] {
  return segmentUtterances(transcript.words).map((group) => ({
    window: { start: group.startTime, end: group.endTime },
    modality: "speech" as const,
    kind: "speech" as const,
    label: "speech",
    confidenceSum: group.words.reduce((sum, w) => sum + w.confidence, 0),
    sources: group.words.length,
    texts: [group.text],
    scoreSum: null,
    entities: [],
  }));
}

function finalize(draft: Draft, index: number): TimelineEntry {
  const entry: TimelineEntry = {
    id: `e${index + 1}`,
    window: { start: roundTo(draft.window.start, 3), end: roundTo(draft.window.end, 3) },
    modality: draft.modality,
    kind: draft.kind,
    label: draft.label,
    confidence: roundTo(draft.confidenceSum / draft.sources, 3),
    mergedCount: draft.sources,
  };
  if (draft.texts.length > 0) entry.text = draft.texts.join(" ");
  if (draft.scoreSum !== null) entry.sentimentScore = roundTo(draft.scoreSum / draft.sources, 3);
  if (draft.kind === "utterance") entry.entities = draft.entities;
  return entry;
}

const MODALITY_ORDER: Record<Modality, number> = { visual: 0, speech: 1, sentiment: 2 };

export class ResultAggregator {
  private readonly options: AggregatorOptions;

  constructor(options: Partial<AggregatorOptions> = {}) {
    this.options = { ...DEFAULT_AGGREGATOR_OPTIONS, ...options };
  }

  aggregate(inputs: AggregatorInputs): Timeline {
    const words = inputs.speech?.words ?? [];

    const drafts: Draft[] = [];
    if (inputs.visual) {
      drafts.push(...mergeDrafts(emotionDrafts(inputs.visual), this.options.emotionMergeToleranceSeconds));
    }
    if (inputs.sentiment) {
      drafts.push(
        ...mergeDrafts(utteranceDrafts(inputs.sentiment, words), this.options.utteranceMergeToleranceSeconds),
      );
    } else if (inputs.speech) {
      // Without sentiment, the transcript itself goes on the timeline (no union)
      drafts.push(...speechDrafts(inputs.speech));
    }

    drafts.sort(
      (a, b) =>
        byStart(a, b) ||
        MODALITY_ORDER[a.modality] - MODALITY_ORDER[b.modality] ||
        (a.label < b.label ? -1 : a.label > b.label ? 1 : 0),
    );

    return {
      entries: drafts.map(finalize),
      summary: this.summarize(inputs),
    };
  }

  private summarize(inputs: AggregatorInputs): TimelineSummary {
    const status = (present: boolean): ModalityStatus => (present ? "available" : "missing");
    const modalities: Record<Modality, ModalityStatus> = {
      visual: status(inputs.visual !== null),
      speech: status(inputs.speech !== null),
      sentiment: status(inputs.sentiment !== null),
    };

    const emotionSeconds: Partial<Record<EmotionLabel, number>> = {};
    for (const event of inputs.visual ?? []) {
      emotionSeconds[event.emotion] = (emotionSeconds[event.emotion] ?? 0) + windowDuration(normalizeWindow(event.window));
    }
    for (const label of EMOTION_LABELS) {
      const seconds = emotionSeconds[label];
      if (seconds !== undefined) emotionSeconds[label] = roundTo(seconds, 2);
    }

    const utterances = inputs.sentiment ?? [];
    const sentimentCounts: Partial<Record<SentimentLabel, number>> = {};
    const entityMentions: Record<string, number> = {};
    let scoreSum = 0;
    let negative = 0;
    for (const utterance of utterances) {
      sentimentCounts[utterance.sentiment] = (sentimentCounts[utterance.sentiment] ?? 0) + 1;
      scoreSum += utterance.sentimentScore;
      if (utterance.sentiment === "negative") negative++;
      for (const entity of utterance.entities) {
        const name = entity.trim().toLowerCase();
        if (name.length > 0) entityMentions[name] = (entityMentions[name] ?? 0) + 1;
      }
    }

    const words = inputs.speech?.words ?? [];
    const minutes = inputs.durationSeconds / 60;
    const wordConfidence = meanConfidence(words);

    return {
      durationSeconds: roundTo(inputs.durationSeconds, 3),
      modalities,
      emotionSeconds,
      sentimentCounts,
      meanSentimentScore: utterances.length > 0 ? roundTo(scoreSum / utterances.length, 3) : null,
      negativeUtteranceFraction: utterances.length > 0 ? roundTo(negative / utterances.length, 3) : null,
      wordCount: words.length,
      wordsPerMinute: minutes > 0 ? roundTo(words.length / minutes, 1) : 0,
      meanWordConfidence: wordConfidence === null ? null : roundTo(wordConfidence, 3),
      entityMentions,
    };
  }
}
