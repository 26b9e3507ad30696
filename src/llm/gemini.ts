/**
 * Google Gemini LLM provider.
 */

import { GoogleGenAI, type Content } from "@google/genai";
import {
  type LLMProvider,
  type Message,
  type ProviderOptions,
  type StreamChunk,
  registerProvider,
} from "./provider.ts";

export const DEFAULT_MODEL = "gemini-2.5-flash";

export class GeminiProvider implements LLMProvider {
  readonly name = "gemini";
  readonly model: string;

  private client: GoogleGenAI;

  constructor(options: ProviderOptions = {}) {
    this.client = new GoogleGenAI({ apiKey: options.apiKey });
    this.model = options.model ?? DEFAULT_MODEL;
  }

  async *chat(
    messages: Message[],
    systemPrompt: string,
  ): AsyncIterable<StreamChunk> {
    const stream = await this.client.models.generateContentStream({
      model: this.model,
      contents: messagesToGeminiContents(messages),
      config: { systemInstruction: systemPrompt },
    });

    for await (const chunk of stream) {
      const candidate = chunk.candidates?.[0];
      if (!candidate) continue;

      for (const part of candidate.content?.parts ?? []) {
        if (part.text) {
          yield { type: "text_delta", text: part.text };
        }
      }

      const finishReason = candidate.finishReason;
      if (finishReason === "STOP" || finishReason === "MAX_TOKENS") {
        yield {
          type: "done",
          stopReason: finishReason === "MAX_TOKENS" ? "max_tokens" : "end_turn",
        };
      }
    }
  }
}

/**
 * Map internal messages to Gemini Content[] format.
 *
 * Gemini uses "user" and "model" roles (not "assistant").
 */
export function messagesToGeminiContents(messages: Message[]): Content[] {
  return messages.map((msg) => ({
    role: msg.role === "assistant" ? "model" : "user",
    parts: msg.content.map((c) => ({ text: c.text })),
  }));
}

// Register this provider
registerProvider("gemini", (options) => new GeminiProvider(options));
