/**
 * OpenAI LLM provider.
 */

import OpenAI from "openai";
import {
  type LLMProvider,
  type Message,
  type ProviderOptions,
  type StreamChunk,
  registerProvider,
} from "./provider.ts";

export const DEFAULT_MODEL = "gpt-4o";

export class OpenAIProvider implements LLMProvider {
  readonly name = "openai";
  readonly model: string;

  private client: OpenAI;

  constructor(options: ProviderOptions = {}) {
    this.client = new OpenAI(options.apiKey ? { apiKey: options.apiKey } : {});
    this.model = options.model ?? DEFAULT_MODEL;
  }

  async *chat(
    messages: Message[],
    systemPrompt: string,
  ): AsyncIterable<StreamChunk> {
    const openaiMessages: OpenAI.Chat.ChatCompletionMessageParam[] = [
      { role: "system", content: systemPrompt },
    ];

    for (const msg of messages) {
      const text = msg.content.map((c) => c.text).join("");
      if (msg.role === "assistant") {
        openaiMessages.push({ role: "assistant", content: text });
      } else {
        openaiMessages.push({ role: "user", content: text });
      }
    }

    const stream = await this.client.chat.completions.create({
      model: this.model,
      messages: openaiMessages,
      stream: true,
    });

    for await (const chunk of stream) {
      const choice = chunk.choices[0];
      if (!choice) continue;

      if (choice.delta?.content) {
        yield { type: "text_delta", text: choice.delta.content };
      }

      if (choice.finish_reason) {
        yield {
          type: "done",
          stopReason: choice.finish_reason === "length" ? "max_tokens" : "end_turn",
        };
      }
    }
  }
}

// Register this provider
registerProvider("openai", (options) => new OpenAIProvider(options));
