// Multimodal Risk Triage - Modality Adapters
// Uniform submit/poll/abort wrappers around the three analysis capabilities.
//
// submit() is idempotent per submission key: the key is looked up in the
// persisted ledger before any external call, and the capability receives the
// key as its client token, so a crash between the external call and the ledger
// write still resolves to the same external job.

import type { Logger } from "./logger.js";
import { createLogger } from "./logger.js";
import type { RequestStore } from "./request-store.js";
import type {
  EmotionEvent,
  Modality,
  ModalityInputs,
  ModalityOutputs,
  Transcript,
  Utterance,
} from "./types.js";
import type { AsyncJobCapability, PollResult } from "./utils/in-process-jobs.js";
import { clamp } from "./utils.js";

export type { PollResult } from "./utils/in-process-jobs.js";

export interface ModalityAdapterLike<M extends Modality> {
  readonly modality: M;
  submit(requestId: string, input: ModalityInputs[M], key: string): Promise<string>;
  poll(handle: string): Promise<PollResult<ModalityOutputs[M]>>;
  abort(handle: string): Promise<void>;
  /** Drop the capability's bookkeeping for a job whose outcome is persisted. */
  release(handle: string): void;
}

export type ModalityAdapters = { [M in Modality]: ModalityAdapterLike<M> };

export abstract class ModalityAdapter<M extends Modality> implements ModalityAdapterLike<M> {
  abstract readonly modality: M;
  protected readonly capability: AsyncJobCapability<ModalityInputs[M], ModalityOutputs[M]>;
  protected readonly store: RequestStore;
  protected readonly logger: Logger;

  constructor(
    capability: AsyncJobCapability<ModalityInputs[M], ModalityOutputs[M]>,
    store: RequestStore,
    logger?: Logger,
  ) {
    this.capability = capability;
    this.store = store;
    this.logger = logger ?? createLogger("ModalityAdapter");
  }

  async submit(requestId: string, input: ModalityInputs[M], key: string): Promise<string> {
    const recorded = await this.store.ledgerGet(requestId, key);
    if (recorded) {
      this.logger.debug(`${this.modality} submission ${key} already recorded as ${recorded}`);
      return recorded;
    }

    const handle = await this.capability.submit(input, key);
    const winner = await this.store.ledgerPut(requestId, key, handle);
    if (winner !== handle) {
      // Another submitter recorded this key first; its job is the one that counts
      await this.capability.abort(handle);
      this.capability.release?.(handle);
    }
    this.logger.info(`Submitted ${this.modality} job for ${requestId} (key ${key}, handle ${winner})`);
    return winner;
  }

  async poll(handle: string): Promise<PollResult<ModalityOutputs[M]>> {
    const outcome = await this.capability.fetch(handle);
    if (outcome.status !== "succeeded") return outcome;
    return { status: "succeeded", result: this.normalize(outcome.result) };
  }

  async abort(handle: string): Promise<void> {
    await this.capability.abort(handle);
  }

  release(handle: string): void {
    this.capability.release?.(handle);
  }

  /** Brings a raw capability result into canonical form. */
  protected abstract normalize(result: ModalityOutputs[M]): ModalityOutputs[M];
}

// ─── Visual ─────────────────────────────────────────────────────────────────────

export class VisualAdapter extends ModalityAdapter<"visual"> {
  readonly modality = "visual" as const;

  constructor(
    capability: AsyncJobCapability<ModalityInputs["visual"], EmotionEvent[]>,
    store: RequestStore,
    logger?: Logger,
  ) {
    super(capability, store, logger ?? createLogger("VisualAdapter"));
  }

  /** Ordered by start time, confidences clamped to [0, 1], inverted windows repaired. */
  protected normalize(events: EmotionEvent[]): EmotionEvent[] {
    return events
      .map((event) => ({
        window: {
          start: Math.min(event.window.start, event.window.end),
          end: Math.max(event.window.start, event.window.end),
        },
        emotion: event.emotion,
        confidence: clamp(event.confidence, 0, 1),
      }))
      .sort((a, b) => a.window.start - b.window.start || a.window.end - b.window.end);
  }
}

// ─── Speech ─────────────────────────────────────────────────────────────────────

export class SpeechAdapter extends ModalityAdapter<"speech"> {
  readonly modality = "speech" as const;

  constructor(
    capability: AsyncJobCapability<ModalityInputs["speech"], Transcript>,
    store: RequestStore,
    logger?: Logger,
  ) {
    super(capability, store, logger ?? createLogger("SpeechAdapter"));
  }

  protected normalize(transcript: Transcript): Transcript {
    return {
      ...transcript,
      words: [...transcript.words].sort((a, b) => a.startTime - b.startTime),
    };
  }
}

// ─── Sentiment ──────────────────────────────────────────────────────────────────

export class SentimentAdapter extends ModalityAdapter<"sentiment"> {
  readonly modality = "sentiment" as const;

  constructor(
    capability: AsyncJobCapability<ModalityInputs["sentiment"], Utterance[]>,
    store: RequestStore,
    logger?: Logger,
  ) {
    super(capability, store, logger ?? createLogger("SentimentAdapter"));
  }

  protected normalize(utterances: Utterance[]): Utterance[] {
    return utterances
      .map((utterance) => ({
        ...utterance,
        sentimentScore: clamp(utterance.sentimentScore, -1, 1),
      }))
      .sort((a, b) => a.window.start - b.window.start);
  }
}
