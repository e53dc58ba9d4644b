// Multimodal Risk Triage - Configuration
// Environment-driven settings with defaults. `.env` is loaded by the entry point
// through dotenv before loadConfig() runs.

import { ValidationError } from "./errors.js";
import { isLogLevel, type LogLevel } from "./logger.js";
import type { Modality } from "./types.js";

export interface IngestLimits {
  maxUploadBytes: number;
  maxDurationSeconds: number;
  allowedExtensions: string[];
  allowedContainers: string[];
  allowedVideoCodecs: string[];
  allowedAudioCodecs: string[];
}

export interface RetryPolicy {
  maxAttempts: number; // total attempts per modality job, first included
  backoffBaseMs: number;
  backoffMaxMs: number;
}

export interface OrchestratorConfig {
  retry: RetryPolicy;
  pollIntervalMs: number;
  jobTimeoutSeconds: Record<Modality, number>;
  language: string;
}

export interface FusionConfig {
  maxRepairAttempts: number; // corrective re-prompts after the first response
  maxStageAttempts: number; // attempts of the whole stage on transient reasoning failures
  reasoningTimeoutMs: number;
}

export interface EvidenceConfig {
  framesPerWindow: number;
  minSpacingSeconds: number;
}

export interface AppConfig {
  port: number;
  dataDir: string;
  openaiApiKey: string | null;
  deepgramApiKey: string | null;
  reasoningModel: string;
  visionModel: string;
  sentimentModel: string;
  speechModel: string;
  ffmpegPath: string;
  ffprobePath: string;
  logLevel: LogLevel;
  ingest: IngestLimits;
  orchestrator: OrchestratorConfig;
  fusion: FusionConfig;
  evidence: EvidenceConfig;
}

export const DEFAULT_INGEST_LIMITS: IngestLimits = {
  maxUploadBytes: 500 * 1024 * 1024,
  maxDurationSeconds: 1800,
  allowedExtensions: [".mp4", ".mov", ".avi", ".mkv"],
  // ffprobe reports format names as comma-separated aliases; any alias matching counts
  allowedContainers: ["mp4", "mov", "avi", "matroska", "webm"],
  allowedVideoCodecs: ["h264", "hevc", "mpeg4", "vp8", "vp9", "av1"],
  allowedAudioCodecs: ["aac", "mp3", "opus", "vorbis", "pcm_s16le", "ac3"],
};

export const DEFAULT_ORCHESTRATOR_CONFIG: OrchestratorConfig = {
  retry: { maxAttempts: 3, backoffBaseMs: 5000, backoffMaxMs: 60000 },
  pollIntervalMs: 5000,
  jobTimeoutSeconds: { visual: 900, speech: 900, sentiment: 900 },
  language: "en",
};

export const DEFAULT_FUSION_CONFIG: FusionConfig = {
  maxRepairAttempts: 2,
  maxStageAttempts: 3,
  reasoningTimeoutMs: 60000,
};

export const DEFAULT_EVIDENCE_CONFIG: EvidenceConfig = {
  framesPerWindow: 3,
  minSpacingSeconds: 2,
};

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number, min: number, max: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ValidationError(`${name} must be an integer between ${min} and ${max} (got "${raw}")`);
  }
  return value;
}

function readNumber(env: Env, name: string, fallback: number, min: number, max: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < min || value > max) {
    throw new ValidationError(`${name} must be a number between ${min} and ${max} (got "${raw}")`);
  }
  return value;
}

function readString(env: Env, name: string, fallback: string): string {
  const raw = env[name]?.trim();
  return raw ? raw : fallback;
}

function readOptional(env: Env, name: string): string | null {
  const raw = env[name]?.trim();
  return raw ? raw : null;
}

/**
 * Builds the application config from environment variables.
 * @throws ValidationError naming the offending variable.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const logLevel = readString(env, "LOG_LEVEL", "info");
  if (!isLogLevel(logLevel)) {
    throw new ValidationError(`LOG_LEVEL must be one of debug, info, warn, error, silent (got "${logLevel}")`);
  }

  const backoffBaseMs = readInt(env, "BACKOFF_BASE_MS", DEFAULT_ORCHESTRATOR_CONFIG.retry.backoffBaseMs, 0, 3_600_000);
  const backoffMaxMs = readInt(env, "BACKOFF_MAX_MS", DEFAULT_ORCHESTRATOR_CONFIG.retry.backoffMaxMs, 0, 3_600_000);
  if (backoffMaxMs < backoffBaseMs) {
    throw new ValidationError(`BACKOFF_MAX_MS (${backoffMaxMs}) must not be lower than BACKOFF_BASE_MS (${backoffBaseMs})`);
  }

  const jobTimeout = readInt(env, "JOB_TIMEOUT_SECONDS", 900, 1, 86_400);

  return {
    port: readInt(env, "PORT", 3000, 0, 65535),
    dataDir: readString(env, "DATA_DIR", "data"),
    openaiApiKey: readOptional(env, "OPENAI_API_KEY"),
    deepgramApiKey: readOptional(env, "DEEPGRAM_API_KEY"),
    reasoningModel: readString(env, "REASONING_MODEL", "gpt-4o"),
    visionModel: readString(env, "VISION_MODEL", "gpt-4o-mini"),
    sentimentModel: readString(env, "SENTIMENT_MODEL", "gpt-4o-mini"),
    speechModel: readString(env, "SPEECH_MODEL", "nova-2"),
    ffmpegPath: readString(env, "FFMPEG_PATH", "ffmpeg"),
    ffprobePath: readString(env, "FFPROBE_PATH", "ffprobe"),
    logLevel,
    ingest: {
      ...DEFAULT_INGEST_LIMITS,
      maxUploadBytes: readInt(env, "MAX_UPLOAD_BYTES", DEFAULT_INGEST_LIMITS.maxUploadBytes, 1, Number.MAX_SAFE_INTEGER),
      maxDurationSeconds: readNumber(env, "MAX_DURATION_SECONDS", DEFAULT_INGEST_LIMITS.maxDurationSeconds, 1, 86_400),
    },
    orchestrator: {
      retry: {
        maxAttempts: readInt(env, "JOB_MAX_ATTEMPTS", DEFAULT_ORCHESTRATOR_CONFIG.retry.maxAttempts, 1, 20),
        backoffBaseMs,
        backoffMaxMs,
      },
      pollIntervalMs: readInt(env, "POLL_INTERVAL_MS", DEFAULT_ORCHESTRATOR_CONFIG.pollIntervalMs, 10, 3_600_000),
      jobTimeoutSeconds: { visual: jobTimeout, speech: jobTimeout, sentiment: jobTimeout },
      language: readString(env, "SPEECH_LANGUAGE", DEFAULT_ORCHESTRATOR_CONFIG.language),
    },
    fusion: {
      maxRepairAttempts: readInt(env, "FUSION_MAX_REPAIRS", DEFAULT_FUSION_CONFIG.maxRepairAttempts, 0, 10),
      maxStageAttempts: readInt(env, "FUSION_MAX_STAGE_ATTEMPTS", DEFAULT_FUSION_CONFIG.maxStageAttempts, 1, 20),
      reasoningTimeoutMs: readInt(env, "REASONING_TIMEOUT_MS", DEFAULT_FUSION_CONFIG.reasoningTimeoutMs, 100, 600_000),
    },
    evidence: {
      framesPerWindow: readInt(env, "EVIDENCE_FRAMES_PER_WINDOW", DEFAULT_EVIDENCE_CONFIG.framesPerWindow, 1, 10),
      minSpacingSeconds: readNumber(env, "EVIDENCE_MIN_SPACING_SECONDS", DEFAULT_EVIDENCE_CONFIG.minSpacingSeconds, 0, 600),
    },
  };
}
