// Multimodal Risk Triage - Shared TypeScript interfaces and types

// ─── Request State Machine ──────────────────────────────────────────────────────

export enum RequestState {
  RECEIVED = "received",
  EXTRACTING = "extracting",
  ANALYZING_MODALITIES = "analyzing_modalities",
  AGGREGATING = "aggregating",
  FUSING = "fusing",
  SELECTING_EVIDENCE = "selecting_evidence",
  COMPLETED = "completed",
  FAILED = "failed",
  CANCELLED = "cancelled",
}

export enum JobState {
  PENDING = "pending",
  RUNNING = "running",
  SUCCEEDED = "succeeded",
  FAILED = "failed",
  TIMED_OUT = "timed_out",
}

export type Modality = "visual" | "speech" | "sentiment";

export const MODALITIES: readonly Modality[] = ["visual", "speech", "sentiment"];

export type FailureCode =
  | "INVALID_FORMAT"
  | "TOO_LARGE"
  | "EXTRACTION_FAILURE"
  | "SPEECH_UNAVAILABLE"
  | "SCHEMA_ERROR"
  | "RESOURCE_EXHAUSTED"
  | "INTERNAL_ERROR";

export interface FailureReason {
  code: FailureCode;
  message: string;
}

// ─── Media ──────────────────────────────────────────────────────────────────────

export interface MediaDescriptor {
  sourcePath: string;
  audioPath: string | null; // normalized mono 16kHz PCM WAV; null when extraction never ran
  originalFilename: string;
  container: string | null;
  videoCodec: string | null;
  audioCodec: string | null;
  durationSeconds: number;
  sizeBytes: number;
}

// ─── Modality Jobs ──────────────────────────────────────────────────────────────

export interface ModalityJob {
  modality: Modality;
  state: JobState;
  handle: string | null;
  /** Idempotency key of the current attempt; recorded before the external call. */
  submissionKey: string | null;
  /** Number of attempts started so far (the retry count is attempts - 1). */
  attempts: number;
  submittedAt: string | null;
  nextAttemptAt: string | null;
  lastError: string | null;
  /** True once the job is terminally failed and will not be retried. */
  permanent: boolean;
  resultRef: string | null;
}

// ─── Analysis Request ───────────────────────────────────────────────────────────

export interface StateHistoryEntry {
  state: RequestState;
  at: string;
}

export interface AnalysisRequest {
  id: string;
  version: number;
  createdAt: string;
  updatedAt: string;
  state: RequestState;
  media: MediaDescriptor;
  jobs: Record<Modality, ModalityJob>;
  failure: FailureReason | null;
  history: StateHistoryEntry[];
  /** Attempts spent on the fusion stage (transient reasoning failures). */
  stageAttempts: number;
  nextStageAttemptAt: string | null;
  timelineRef: string | null;
  assessment: FusedAssessment | null;
  missingModalities: Modality[];
}

// ─── Modality Results ───────────────────────────────────────────────────────────

export interface TimeWindow {
  start: number; // seconds from media start
  end: number; // seconds from media start
}

export type EmotionLabel =
  | "calm"
  | "happy"
  | "sad"
  | "angry"
  | "fear"
  | "surprised"
  | "disgusted"
  | "confused";

export const EMOTION_LABELS: readonly EmotionLabel[] = [
  "calm",
  "happy",
  "sad",
  "angry",
  "fear",
  "surprised",
  "disgusted",
  "confused",
];

export interface EmotionEvent {
  window: TimeWindow;
  emotion: EmotionLabel;
  confidence: number; // 0.0-1.0
}

export interface TranscriptWord {
  word: string;
  startTime: number;
  endTime: number;
  confidence: number;
}

export interface Transcript {
  text: string;
  language: string;
  durationSeconds: number;
  words: TranscriptWord[];
}

export type SentimentLabel = "positive" | "neutral" | "negative" | "mixed";

export const SENTIMENT_LABELS: readonly SentimentLabel[] = ["positive", "neutral", "negative", "mixed"];

export interface Utterance {
  window: TimeWindow;
  text: string;
  sentiment: SentimentLabel;
  sentimentScore: number; // -1.0 (negative) to 1.0 (positive)
  entities: string[];
}

// ─── Modality Inputs / Outputs ───────────────────────────────────────────────────

export interface VisualInput {
  sourcePath: string;
  durationSeconds: number;
  /** Scratch directory for frames sampled by the provider. */
  workDir: string;
}

export interface SpeechInput {
  audioPath: string;
  language: string;
}

export interface SentimentInput {
  transcript: Transcript;
}

export interface ModalityInputs {
  visual: VisualInput;
  speech: SpeechInput;
  sentiment: SentimentInput;
}

export interface ModalityOutputs {
  visual: EmotionEvent[];
  speech: Transcript;
  sentiment: Utterance[];
}

// ─── Timeline ───────────────────────────────────────────────────────────────────

export type TimelineEntryKind = "emotion" | "utterance" | "speech";

export interface TimelineEntry {
  id: string; // "e1", "e2", ... in timeline order
  window: TimeWindow;
  modality: Modality;
  kind: TimelineEntryKind;
  label: string; // emotion label, sentiment label, or "speech"
  confidence: number;
  /** Number of source events unioned into this entry. */
  mergedCount: number;
  text?: string;
  sentimentScore?: number;
  entities?: string[];
}

export type ModalityStatus = "available" | "missing";

export interface TimelineSummary {
  durationSeconds: number;
  modalities: Record<Modality, ModalityStatus>;
  emotionSeconds: Partial<Record<EmotionLabel, number>>;
  sentimentCounts: Partial<Record<SentimentLabel, number>>;
  meanSentimentScore: number | null;
  negativeUtteranceFraction: number | null;
  wordCount: number;
  wordsPerMinute: number;
  meanWordConfidence: number | null;
  entityMentions: Record<string, number>;
}

export interface Timeline {
  entries: TimelineEntry[];
  summary: TimelineSummary;
}

// ─── Fusion ─────────────────────────────────────────────────────────────────────

export type RiskClassification = "low" | "medium" | "high";

export interface FusedAssessment {
  riskScore: number; // integer 0-100
  classification: RiskClassification;
  narrative: string;
  citedWindows: TimeWindow[]; // ordered by start time
  citedEntryIds: string[];
  indicators: string[];
  confidence: number; // 0.0-1.0 modality coverage weight
  missingModalities: Modality[];
}

// ─── Evidence & Report ──────────────────────────────────────────────────────────

export interface EvidenceFrame {
  timestamp: number;
  imageRef: string;
  window: TimeWindow;
}

export interface ReportTranscript {
  text: string;
  language: string;
}

export interface Report {
  id: string;
  requestId: string;
  assessment: FusedAssessment;
  /** The timeline entries the assessment cites, in timeline order. */
  citedEntries: TimelineEntry[];
  transcript: ReportTranscript | null;
  evidence: EvidenceFrame[];
  modalityCoverage: Record<Modality, ModalityStatus>;
  disclaimer: string;
  completedAt: string;
}

// ─── Status push protocol ───────────────────────────────────────────────────────

export interface RequestStatus {
  id: string;
  state: RequestState;
  message: string;
  jobs: Record<Modality, { state: JobState; attempts: number; permanent: boolean }>;
  failure: FailureReason | null;
  updatedAt: string;
}

// Client → Server messages
export type ClientMessage =
  | { type: "subscribe"; requestId: string }
  | { type: "unsubscribe"; requestId: string };

// Server → Client messages
export type ServerMessage =
  | { type: "status"; status: RequestStatus }
  | { type: "error"; message: string };
