// Multimodal Risk Triage - OpenAI vision emotion provider
// Samples still frames at a fixed interval and asks a vision model for the
// dominant facial emotion in each. Frames without a visible face yield no event.

import { mkdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { TransientServiceError } from "../errors.js";
import type { Logger } from "../logger.js";
import { createLogger } from "../logger.js";
import type { MediaToolkit } from "../media-toolkit.js";
import { EMOTION_LABELS, type EmotionEvent, type EmotionLabel, type VisualInput } from "../types.js";
import { clamp, roundTo } from "../utils.js";
import {
  parseJsonObject,
  requestJsonCompletion,
  type ChatContentPart,
  type OpenAIClient,
} from "./openai-client.js";

export interface OpenAIVisionEmotionOptions {
  model: string;
  sampleIntervalSeconds?: number;
  maxFrames?: number;
  /** Frames sent per completion call. */
  batchSize?: number;
  logger?: Logger;
  readImage?: (path: string) => Promise<Buffer>;
}

const SYSTEM_PROMPT = `You classify the dominant facial emotion visible in numbered video frames.

## Output Format
Respond with a valid JSON object matching this exact structure:
{
  "frames": [
    {
      "index": number,
      "face_detected": boolean,
      "emotion": "${EMOTION_LABELS.join('" | "')}",
      "confidence": number (0.0 to 1.0)
    }
  ]
}

## Rules
- Return one entry per frame, using its index.
- Set face_detected to false when no human face is clearly visible; emotion and confidence are then ignored.
- Describe only the visible expression; do not identify the person.`;

export interface SampledFrame {
  index: number;
  timestamp: number;
  window: { start: number; end: number };
}

/**
 * Sample timestamps every `interval` seconds, widening the interval so that at
 * most `maxFrames` frames are taken. Each frame covers the window up to the next sample.
 */
export function planSampleFrames(durationSeconds: number, interval: number, maxFrames: number): SampledFrame[] {
  if (durationSeconds <= 0 || maxFrames <= 0) return [];
  const step = Math.max(interval, durationSeconds / maxFrames);
  const frames: SampledFrame[] = [];
  for (let t = 0, i = 0; t < durationSeconds && i < maxFrames; i++, t = roundTo(i * step, 3)) {
    frames.push({
      index: i,
      timestamp: t,
      window: { start: t, end: roundTo(Math.min(durationSeconds, t + step), 3) },
    });
  }
  return frames;
}

function isEmotionLabel(value: unknown): value is EmotionLabel {
  return typeof value === "string" && EMOTION_LABELS.some((label) => label === value);
}

/**
 * Parse the model's per-frame classification. Frames missing from the response
 * or without a detected face produce no event.
 */
export function parseVisionResponse(raw: string, frames: SampledFrame[]): EmotionEvent[] {
  const obj = parseJsonObject(raw);
  if (!obj) {
    throw new TransientServiceError(`Vision response is not a JSON object: ${raw.slice(0, 200)}`);
  }
  if (!Array.isArray(obj.frames)) {
    throw new TransientServiceError("Vision response missing or invalid 'frames' array");
  }

  const byIndex = new Map(frames.map((frame) => [frame.index, frame]));
  const events: EmotionEvent[] = [];
  for (const entry of obj.frames) {
    if (entry === null || typeof entry !== "object") continue;
    const index: unknown = "index" in entry ? entry.index : undefined;
    const faceDetected: unknown = "face_detected" in entry ? entry.face_detected : undefined;
    const emotion: unknown = "emotion" in entry ? entry.emotion : undefined;
    const confidence: unknown = "confidence" in entry ? entry.confidence : undefined;

    if (typeof index !== "number" || faceDetected !== true) continue;
    const frame = byIndex.get(index);
    if (!frame || !isEmotionLabel(emotion) || typeof confidence !== "number") continue;

    events.push({ window: { ...frame.window }, emotion, confidence: roundTo(clamp(confidence, 0, 1), 3) });
  }

  return events.sort((a, b) => a.window.start - b.window.start);
}

export class OpenAIVisionEmotionProvider {
  private readonly client: OpenAIClient;
  private readonly media: MediaToolkit;
  private readonly model: string;
  private readonly sampleIntervalSeconds: number;
  private readonly maxFrames: number;
  private readonly batchSize: number;
  private readonly logger: Logger;
  private readonly readImage: (path: string) => Promise<Buffer>;

  constructor(client: OpenAIClient, media: MediaToolkit, options: OpenAIVisionEmotionOptions) {
    this.client = client;
    this.media = media;
    this.model = options.model;
    this.sampleIntervalSeconds = options.sampleIntervalSeconds ?? 2;
    this.maxFrames = options.maxFrames ?? 60;
    this.batchSize = options.batchSize ?? 10;
    this.logger = options.logger ?? createLogger("OpenAIVisionEmotion");
    this.readImage = options.readImage ?? ((path) => readFile(path));
  }

  async detect(input: VisualInput, signal?: AbortSignal): Promise<EmotionEvent[]> {
    const frames = planSampleFrames(input.durationSeconds, this.sampleIntervalSeconds, this.maxFrames);
    if (frames.length === 0) return [];

    await mkdir(input.workDir, { recursive: true });

    const events: EmotionEvent[] = [];
    for (let offset = 0; offset < frames.length; offset += this.batchSize) {
      if (signal?.aborted) {
        throw new TransientServiceError("Visual analysis aborted");
      }
      const batch = frames.slice(offset, offset + this.batchSize);
      events.push(...(await this.classifyBatch(input, batch, signal)));
    }

    this.logger.info(`Classified ${frames.length} frames, ${events.length} with a visible face`);
    return events;
  }

  private async classifyBatch(input: VisualInput, batch: SampledFrame[], signal?: AbortSignal): Promise<EmotionEvent[]> {
    const content: ChatContentPart[] = [];
    for (const frame of batch) {
      const path = join(input.workDir, `sample-${String(frame.index).padStart(4, "0")}.jpg`);
      try {
        await this.media.extractFrame(input.sourcePath, frame.timestamp, path);
      } catch (err) {
        throw new TransientServiceError(`Frame extraction at ${frame.timestamp}s failed`, { cause: err });
      }
      const image = await this.readImage(path);
      content.push({ type: "text", text: `Frame ${frame.index} (t=${frame.timestamp.toFixed(1)}s):` });
      content.push({
        type: "image_url",
        image_url: { url: `data:image/jpeg;base64,${image.toString("base64")}`, detail: "low" },
      });
    }
    content.push({ type: "text", text: "Respond with ONLY the JSON object." });

    const raw = await requestJsonCompletion(
      this.client,
      { model: this.model, system: SYSTEM_PROMPT, user: content, signal },
      "OpenAI vision",
    );
    return parseVisionResponse(raw, batch);
  }
}
