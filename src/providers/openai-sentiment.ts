// Multimodal Risk Triage - OpenAI sentiment provider
// Segments the transcript into utterances and asks the model for a sentiment
// label, a score and entity mentions per utterance (JSON mode).

import { TransientServiceError } from "../errors.js";
import type { Logger } from "../logger.js";
import { createLogger } from "../logger.js";
import {
  SENTIMENT_LABELS,
  type SentimentInput,
  type SentimentLabel,
  type Utterance,
} from "../types.js";
import { clamp, roundTo, segmentUtterances, type SegmentationOptions, type WordGroup } from "../utils.js";
import { parseJsonObject, requestJsonCompletion, type OpenAIClient } from "./openai-client.js";

export interface OpenAISentimentOptions {
  model: string;
  /** Utterances sent per completion call. */
  batchSize?: number;
  segmentation?: Partial<SegmentationOptions>;
  logger?: Logger;
}

const SYSTEM_PROMPT = `You label the sentiment of numbered utterances from a spoken recording.

## Output Format
Respond with a valid JSON object matching this exact structure:
{
  "utterances": [
    {
      "index": number,
      "sentiment": "positive" | "neutral" | "negative" | "mixed",
      "score": number (from -1.0 very negative to 1.0 very positive),
      "entities": ["string (people, places or organisations mentioned, verbatim)"]
    }
  ]
}

## Rules
- Return exactly one entry per input utterance, using its index.
- Judge only what is said; do not speculate about the speaker.
- Use an empty entities array when nothing is named.`;

function isSentimentLabel(value: unknown): value is SentimentLabel {
  return typeof value === "string" && SENTIMENT_LABELS.some((label) => label === value);
}

interface ParsedSentiment {
  sentiment: SentimentLabel;
  score: number;
  entities: string[];
}

/**
 * Parse the model's response into a map of utterance index → sentiment.
 * Throws if the response doesn't match the expected shape.
 */
export function parseSentimentResponse(raw: string, expected: number[]): Map<number, ParsedSentiment> {
  const obj = parseJsonObject(raw);
  if (!obj) {
    throw new TransientServiceError(`Sentiment response is not a JSON object: ${raw.slice(0, 200)}`);
  }
  if (!Array.isArray(obj.utterances)) {
    throw new TransientServiceError("Sentiment response missing or invalid 'utterances' array");
  }

  const parsed = new Map<number, ParsedSentiment>();
  for (const entry of obj.utterances) {
    if (entry === null || typeof entry !== "object") continue;
    const index: unknown = "index" in entry ? entry.index : undefined;
    const sentiment: unknown = "sentiment" in entry ? entry.sentiment : undefined;
    const score: unknown = "score" in entry ? entry.score : undefined;
    const entities: unknown = "entities" in entry ? entry.entities : undefined;

    if (typeof index !== "number" || !isSentimentLabel(sentiment) || typeof score !== "number") {
      continue;
    }
    parsed.set(index, {
      sentiment,
      score: roundTo(clamp(score, -1, 1), 3),
      entities: Array.isArray(entities)
        ? entities.filter((e): e is string => typeof e === "string" && e.trim().length > 0).map((e) => e.trim())
        : [],
    });
  }

  const missing = expected.filter((index) => !parsed.has(index));
  if (missing.length > 0) {
    throw new TransientServiceError(`Sentiment response missing utterance(s) ${missing.join(", ")}`);
  }
  return parsed;
}

export class OpenAISentimentProvider {
  private readonly client: OpenAIClient;
  private readonly model: string;
  private readonly batchSize: number;
  private readonly segmentation: Partial<SegmentationOptions>;
  private readonly logger: Logger;

  constructor(client: OpenAIClient, options: OpenAISentimentOptions) {
    this.client = client;
    this.model = options.model;
    this.batchSize = options.batchSize ?? 40;
    this.segmentation = options.segmentation ?? {};
    this.logger = options.logger ?? createLogger("OpenAISentiment");
  }

  async analyze(input: SentimentInput, signal?: AbortSignal): Promise<Utterance[]> {
    const groups = segmentUtterances(input.transcript.words, this.segmentation);
    if (groups.length === 0) {
      this.logger.info("Transcript has no words; no utterances to score");
      return [];
    }

    const utterances: Utterance[] = [];
    for (let offset = 0; offset < groups.length; offset += this.batchSize) {
      const batch = groups.slice(offset, offset + this.batchSize);
      utterances.push(...(await this.analyzeBatch(batch, offset, signal)));
    }

    this.logger.info(`Scored ${utterances.length} utterances`);
    return utterances;
  }

  private async analyzeBatch(batch: WordGroup[], offset: number, signal?: AbortSignal): Promise<Utterance[]> {
    const indices = batch.map((_, i) => offset + i);
    const user = `## Utterances
${batch.map((group, i) => `[${offset + i}] ${group.text}`).join("\n")}

Respond with ONLY the JSON object.`;

    const raw = await requestJsonCompletion(
      this.client,
      { model: this.model, system: SYSTEM_PROMPT, user, signal },
      "OpenAI sentiment",
    );
    const parsed = parseSentimentResponse(raw, indices);

    return batch.map((group, i) => {
      const result = parsed.get(offset + i);
      if (!result) {
        throw new TransientServiceError(`Sentiment response missing utterance ${offset + i}`);
      }
      return {
        window: { start: group.startTime, end: group.endTime },
        text: group.text,
        sentiment: result.sentiment,
        sentimentScore: result.score,
        entities: result.entities,
      };
    });
  }
}
