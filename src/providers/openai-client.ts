// OpenAI client interface (for testability / dependency injection)
// plus the shared JSON-mode chat completion call used by the OpenAI providers.

import { classifyProviderError } from "./provider-errors.js";
import { TransientServiceError } from "../errors.js";

export type ChatContentPart =
  | { type: "text"; text: string }
  | { type: "image_url"; image_url: { url: string; detail?: "low" | "high" | "auto" } };

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string | ChatContentPart[];
}

/**
 * Minimal interface for the OpenAI chat completions API surface we use.
 * This allows injecting a mock client in tests without importing the full SDK.
 */
export interface OpenAIClient {
  chat: {
    completions: {
      create(
        params: {
          model: string;
          messages: ChatMessage[];
          response_format?: { type: "json_object" };
          temperature?: number;
        },
        options?: { signal?: AbortSignal },
      ): Promise<{
        choices: Array<{
          message: {
            content: string | null;
          };
        }>;
      }>;
    };
  };
}

export interface JsonCompletionRequest {
  model: string;
  system: string;
  user: string | ChatContentPart[];
  temperature?: number;
  signal?: AbortSignal;
}

/**
 * Calls chat completions in JSON mode and returns the raw message content.
 * @throws TransientServiceError on an empty response; SDK errors are classified by status.
 */
export async function requestJsonCompletion(
  client: OpenAIClient,
  request: JsonCompletionRequest,
  provider: string,
): Promise<string> {
  let content: string | null | undefined;
  try {
    const response = await client.chat.completions.create(
      {
        model: request.model,
        messages: [
          { role: "system", content: request.system },
          { role: "user", content: request.user },
        ],
        response_format: { type: "json_object" },
        temperature: request.temperature ?? 0,
      },
      request.signal ? { signal: request.signal } : undefined,
    );
    content = response.choices[0]?.message?.content;
  } catch (err) {
    throw classifyProviderError(err, provider);
  }

  if (!content) {
    throw new TransientServiceError(`${provider}: LLM returned empty response`);
  }
  return content;
}

/** Parses a JSON object out of model output; non-objects are reported as null. */
export function parseJsonObject(raw: string): Record<string, unknown> | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) {
    return null;
  }
  const record: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(parsed)) {
    record[key] = value;
  }
  return record;
}
