// Multimodal Risk Triage - OpenAI reasoning provider
// Generative reasoning capability used by the fusion engine.

import { requestJsonCompletion, type OpenAIClient } from "./openai-client.js";

export interface ReasoningPrompt {
  system: string;
  user: string;
}

/** Returns the raw JSON text produced for a structured prompt. */
export interface ReasoningCapability {
  complete(prompt: ReasoningPrompt, signal: AbortSignal): Promise<string>;
}

export class OpenAIReasoningProvider implements ReasoningCapability {
  private readonly client: OpenAIClient;
  private readonly model: string;

  constructor(client: OpenAIClient, model: string = "gpt-4o") {
    this.client = client;
    this.model = model;
  }

  async complete(prompt: ReasoningPrompt, signal: AbortSignal): Promise<string> {
    return requestJsonCompletion(
      this.client,
      { model: this.model, system: prompt.system, user: prompt.user, temperature: 0.2, signal },
      "OpenAI reasoning",
    );
  }
}
