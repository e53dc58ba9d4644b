// Multimodal Risk Triage - Deepgram speech provider
// Prerecorded transcription of the normalized audio track with per-word timings.

import { readFile } from "node:fs/promises";
import { PermanentServiceError, TransientServiceError } from "../errors.js";
import type { Logger } from "../logger.js";
import { createLogger } from "../logger.js";
import type { SpeechInput, Transcript, TranscriptWord } from "../types.js";
import { classifyProviderError } from "./provider-errors.js";

// ─── Deepgram client interface (for testability / dependency injection) ──────────

export interface DeepgramWord {
  word: string;
  start: number;
  end: number;
  confidence: number;
  punctuated_word?: string;
}

export interface DeepgramPrerecordedResult {
  metadata?: { duration?: number };
  results?: {
    channels?: Array<{
      detected_language?: string;
      alternatives?: Array<{
        transcript?: string;
        words?: DeepgramWord[];
      }>;
    }>;
  };
}

/**
 * Minimal interface for the Deepgram prerecorded API surface we use.
 * Mirrors `listen.prerecorded.transcribeFile()` of @deepgram/sdk v3, which
 * resolves to `{ result, error }` instead of throwing.
 */
export interface DeepgramPrerecordedClient {
  listen: {
    prerecorded: {
      transcribeFile(
        source: Buffer,
        options: {
          model: string;
          language: string;
          smart_format: boolean;
          punctuate: boolean;
        },
      ): Promise<{
        result: DeepgramPrerecordedResult | null;
        error: { message: string; status?: number } | null;
      }>;
    };
  };
}

export interface DeepgramSpeechOptions {
  model: string;
  logger?: Logger;
  readAudio?: (path: string) => Promise<Buffer>;
}

export class DeepgramSpeechProvider {
  private readonly client: DeepgramPrerecordedClient;
  private readonly model: string;
  private readonly logger: Logger;
  private readonly readAudio: (path: string) => Promise<Buffer>;

  constructor(client: DeepgramPrerecordedClient, options: DeepgramSpeechOptions) {
    this.client = client;
    this.model = options.model;
    this.logger = options.logger ?? createLogger("DeepgramSpeech");
    this.readAudio = options.readAudio ?? ((path) => readFile(path));
  }

  async transcribe(input: SpeechInput, signal?: AbortSignal): Promise<Transcript> {
    const audio = await this.readAudio(input.audioPath);
    if (signal?.aborted) {
      throw new TransientServiceError("Speech transcription aborted");
    }

    let response: Awaited<ReturnType<DeepgramPrerecordedClient["listen"]["prerecorded"]["transcribeFile"]>>;
    try {
      response = await this.client.listen.prerecorded.transcribeFile(audio, {
        model: this.model,
        language: input.language,
        smart_format: true,
        punctuate: true,
      });
    } catch (err) {
      throw classifyProviderError(err, "Deepgram");
    }

    if (response.error) {
      const status = response.error.status;
      const message = `Deepgram transcription failed: ${response.error.message}`;
      if (status !== undefined && status >= 400 && status < 500 && status !== 408 && status !== 429) {
        throw new PermanentServiceError(message);
      }
      throw new TransientServiceError(message);
    }
    if (!response.result) {
      throw new TransientServiceError("Deepgram returned neither a result nor an error");
    }

    const transcript = toTranscript(response.result, input.language);
    this.logger.info(
      `Transcribed ${transcript.words.length} words over ${transcript.durationSeconds.toFixed(1)}s`,
    );
    return transcript;
  }
}

/**
 * Converts a Deepgram prerecorded result into a Transcript.
 * @throws PermanentServiceError when the result has no transcript channel.
 */
export function toTranscript(result: DeepgramPrerecordedResult, language: string): Transcript {
  const channel = result.results?.channels?.[0];
  const alternative = channel?.alternatives?.[0];
  if (!alternative) {
    throw new PermanentServiceError("Deepgram result contains no transcript alternative");
  }

  const words: TranscriptWord[] = (alternative.words ?? []).map((w) => ({
    word: w.punctuated_word ?? w.word,
    startTime: w.start,
    endTime: w.end,
    confidence: w.confidence,
  }));

  const lastEnd = words.length > 0 ? words[words.length - 1].endTime : 0;

  return {
    text: alternative.transcript ?? words.map((w) => w.word).join(" "),
    language: channel?.detected_language ?? language,
    durationSeconds: result.metadata?.duration ?? lastEnd,
    words,
  };
}
