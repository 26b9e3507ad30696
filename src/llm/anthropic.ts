/**
 * Anthropic (Claude) LLM provider.
 */

import Anthropic from "@anthropic-ai/sdk";
import {
  type LLMProvider,
  type Message,
  type ProviderOptions,
  type StreamChunk,
  registerProvider,
} from "./provider.ts";

export const DEFAULT_MODEL = "claude-sonnet-4-5-20250929";

export class AnthropicProvider implements LLMProvider {
  readonly name = "anthropic";
  readonly model: string;

  private client: Anthropic;

  constructor(options: ProviderOptions = {}) {
    this.client = new Anthropic(options.apiKey ? { apiKey: options.apiKey } : {});
    this.model = options.model ?? DEFAULT_MODEL;
  }

  async *chat(
    messages: Message[],
    systemPrompt: string,
  ): AsyncIterable<StreamChunk> {
    const anthropicMessages = messages.map((msg) => ({
      role: msg.role,
      content: msg.content.map((c) => ({ type: "text" as const, text: c.text })),
    }));

    const stream = this.client.messages.stream({
      model: this.model,
      max_tokens: 4096,
      system: systemPrompt,
      messages: anthropicMessages,
    });

    for await (const event of stream) {
      if (event.type === "content_block_delta") {
        if (event.delta.type === "text_delta") {
          yield { type: "text_delta", text: event.delta.text };
        }
      } else if (event.type === "message_stop") {
        const finalMessage = await stream.finalMessage();
        yield {
          type: "done",
          stopReason: finalMessage.stop_reason === "max_tokens" ? "max_tokens" : "end_turn",
        };
      }
    }
  }
}

// Register this provider
registerProvider("anthropic", (options) => new AnthropicProvider(options));
