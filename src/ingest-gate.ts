// Multimodal Risk Triage - Ingest Gate
// Validates an uploaded video against the container/codec allowlists and the
// size/duration ceilings, extracts the normalized audio track and creates the
// tracked AnalysisRequest. Rejected uploads are recorded as already-Failed
// requests so the caller can still look up why.

import { mkdir, writeFile } from "node:fs/promises";
import { dirname, extname } from "node:path";
import { v4 as uuidv4 } from "uuid";
import type { IngestLimits } from "./config.js";
import { errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import { createLogger } from "./logger.js";
import type { MediaProbe, MediaToolkit } from "./media-toolkit.js";
import type { RequestStore } from "./request-store.js";
import {
  JobState,
  RequestState,
  type AnalysisRequest,
  type FailureReason,
  type MediaDescriptor,
  type Modality,
  type ModalityJob,
  type StateHistoryEntry,
} from "./types.js";

export interface IngestPayload {
  data: Buffer;
  originalFilename: string;
}

export interface IngestGateDeps {
  store: RequestStore;
  media: MediaToolkit;
  limits: IngestLimits;
  logger?: Logger;
  now?: () => Date;
  generateId?: () => string;
}

export function createPendingJob(modality: Modality): ModalityJob {
  return {
    modality,
    state: JobState.PENDING,
    handle: null,
    submissionKey: null,
    attempts: 0,
    submittedAt: null,
    nextAttemptAt: null,
    lastError: null,
    permanent: false,
    resultRef: null,
  };
}

function createJobSet(): Record<Modality, ModalityJob> {
  return {
    visual: createPendingJob("visual"),
    speech: createPendingJob("speech"),
    sentiment: createPendingJob("sentiment"),
  };
}

/** Returns the first format alias that is allowlisted, or null. */
function matchContainer(probe: MediaProbe, allowed: readonly string[]): string | null {
  return probe.formatNames.find((name) => allowed.includes(name)) ?? null;
}

/**
 * Check a probe result against the limits. Returns the failure reason, or
 * null when the media is acceptable.
 */
export function checkProbe(probe: MediaProbe, limits: IngestLimits): FailureReason | null {
  if (matchContainer(probe, limits.allowedContainers) === null) {
    return { code: "INVALID_FORMAT", message: `Unsupported container: ${probe.formatNames.join(",") || "unknown"}` };
  }
  if (probe.videoCodec === null) {
    return { code: "INVALID_FORMAT", message: "No video stream found" };
  }
  if (!limits.allowedVideoCodecs.includes(probe.videoCodec)) {
    return { code: "INVALID_FORMAT", message: `Unsupported video codec: ${probe.videoCodec}` };
  }
  if (probe.audioCodec === null) {
    return { code: "INVALID_FORMAT", message: "No audio stream found" };
  }
  if (!limits.allowedAudioCodecs.includes(probe.audioCodec)) {
    return { code: "INVALID_FORMAT", message: `Unsupported audio codec: ${probe.audioCodec}` };
  }
  if (probe.durationSeconds <= 0) {
    return { code: "INVALID_FORMAT", message: "Media has zero duration" };
  }
  if (probe.durationSeconds > limits.maxDurationSeconds) {
    return {
      code: "TOO_LARGE",
      message: `Duration ${probe.durationSeconds.toFixed(1)}s exceeds limit of ${limits.maxDurationSeconds}s`,
    };
  }
  return null;
}

export class IngestGate {
  private readonly store: RequestStore;
  private readonly media: MediaToolkit;
  private readonly limits: IngestLimits;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(deps: IngestGateDeps) {
    this.store = deps.store;
    this.media = deps.media;
    this.limits = deps.limits;
    this.logger = deps.logger ?? createLogger("IngestGate");
    this.now = deps.now ?? (() => new Date());
    this.generateId = deps.generateId ?? uuidv4;
  }

  /**
   * Validate and normalize the upload, then persist the request in Received,
   * or in Failed with INVALID_FORMAT / TOO_LARGE / EXTRACTION_FAILURE.
   */
  async ingest(payload: IngestPayload): Promise<AnalysisRequest> {
    const id = this.generateId();
    const extension = extname(payload.originalFilename).toLowerCase();
    const media: MediaDescriptor = {
      sourcePath: this.store.artifactPath(id, `source${extension}`),
      audioPath: null,
      originalFilename: payload.originalFilename,
      container: null,
      videoCodec: null,
      audioCodec: null,
      durationSeconds: 0,
      sizeBytes: payload.data.length,
    };

    const failure = await this.validateAndExtract(id, payload, extension, media);
    const request = this.buildRequest(id, media, failure);
    const created = await this.store.create(request);

    if (failure) {
      this.logger.warn(`Rejected upload "${payload.originalFilename}" as ${failure.code}: ${failure.message}`);
    } else {
      this.logger.info(
        `Accepted ${id} ("${payload.originalFilename}", ${media.durationSeconds.toFixed(1)}s, ${media.container}/${media.videoCodec}/${media.audioCodec})`,
      );
    }
    return created;
  }

  private async validateAndExtract(
    id: string,
    payload: IngestPayload,
    extension: string,
    media: MediaDescriptor,
  ): Promise<FailureReason | null> {
    if (!this.limits.allowedExtensions.includes(extension)) {
      return { code: "INVALID_FORMAT", message: `Unsupported file extension: "${extension || "(none)"}"` };
    }
    if (payload.data.length === 0) {
      return { code: "INVALID_FORMAT", message: "Upload is empty" };
    }
    if (payload.data.length > this.limits.maxUploadBytes) {
      return {
        code: "TOO_LARGE",
        message: `Upload of ${payload.data.length} bytes exceeds limit of ${this.limits.maxUploadBytes} bytes`,
      };
    }

    await mkdir(dirname(media.sourcePath), { recursive: true });
    await writeFile(media.sourcePath, payload.data);

    let probe: MediaProbe;
    try {
      probe = await this.media.probe(media.sourcePath);
    } catch (err) {
      return { code: "INVALID_FORMAT", message: `Media could not be probed: ${errorMessage(err)}` };
    }

    media.container = matchContainer(probe, this.limits.allowedContainers);
    media.videoCodec = probe.videoCodec;
    media.audioCodec = probe.audioCodec;
    media.durationSeconds = probe.durationSeconds;

    const rejection = checkProbe(probe, this.limits);
    if (rejection) return rejection;

    const audioPath = this.store.artifactPath(id, "audio.wav");
    try {
      await this.media.extractAudio(media.sourcePath, audioPath);
    } catch (err) {
      return { code: "EXTRACTION_FAILURE", message: `Audio extraction failed: ${errorMessage(err)}` };
    }
    media.audioPath = audioPath;
    return null;
  }

  private buildRequest(id: string, media: MediaDescriptor, failure: FailureReason | null): AnalysisRequest {
    const at = this.now().toISOString();
    const history: StateHistoryEntry[] = [{ state: RequestState.RECEIVED, at }];
    if (failure) {
      history.push({ state: RequestState.FAILED, at });
    }
    return {
      id,
      version: 0,
      createdAt: at,
      updatedAt: at,
      state: failure ? RequestState.FAILED : RequestState.RECEIVED,
      media,
      jobs: createJobSet(),
      failure,
      history,
      stageAttempts: 0,
      nextStageAttemptAt: null,
      timelineRef: null,
      assessment: null,
      missingModalities: [],
    };
  }
}
