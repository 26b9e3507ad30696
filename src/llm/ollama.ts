/**
 * Ollama LLM provider for locally served models.
 */

import { Ollama } from "ollama";
import {
  type LLMProvider,
  type Message,
  type ProviderOptions,
  type StreamChunk,
  registerProvider,
} from "./provider.ts";

const DEFAULT_HOST = "http://localhost:11434";

/** Check if an error is an Ollama connection failure */
export function isConnectionError(err: unknown): boolean {
  const message = err instanceof Error ? err.message : String(err);
  const code = err instanceof Error && "code" in err ? err.code : undefined;
  return (
    code === "ConnectionRefused" ||
    code === "ECONNREFUSED" ||
    message.includes("ECONNREFUSED") ||
    message.includes("fetch failed") ||
    message.includes("Unable to connect")
  );
}

export interface ModelLister {
  list(): Promise<{ models: Array<{ name: string; size: number }> }>;
}

export function ollamaClient(host: string = DEFAULT_HOST): Ollama {
  return new Ollama({ host });
}

/**
 * List models available on the local Ollama server.
 *
 * @throws "not-running" if Ollama isn't reachable.
 */
export async function listLocalModels(
  client: ModelLister = ollamaClient(),
): Promise<Array<{ name: string; size: number }>> {
  try {
    const list = await client.list();
    return list.models.map((m) => ({ name: m.name, size: m.size }));
  } catch (err: unknown) {
    if (isConnectionError(err)) {
      throw new Error("not-running");
    }
    throw err;
  }
}

export class OllamaProvider implements LLMProvider {
  readonly name = "ollama";
  readonly model: string;

  private client: Ollama;

  constructor(model: string, host?: string) {
    this.client = ollamaClient(host);
    this.model = model;
  }

  async *chat(
    messages: Message[],
    systemPrompt: string,
  ): AsyncIterable<StreamChunk> {
    const ollamaMessages = [
      { role: "system", content: systemPrompt },
      ...messages.map((msg) => ({
        role: msg.role,
        content: msg.content.map((c) => c.text).join(""),
      })),
    ];

    const stream = await this.client.chat({
      model: this.model,
      messages: ollamaMessages,
      stream: true,
    });

    for await (const chunk of stream) {
      if (chunk.message?.content) {
        yield { type: "text_delta", text: chunk.message.content };
      }

      if (chunk.done) {
        yield {
          type: "done",
          stopReason: chunk.done_reason === "length" ? "max_tokens" : "end_turn",
        };
      }
    }
  }
}

// Register this provider
registerProvider("ollama", (options) => {
  if (!options.model) {
    throw new Error(
      "Ollama requires a model name. Pass --model or set RECIPE_MODEL.",
    );
  }
  return new OllamaProvider(options.model, options.host);
});
