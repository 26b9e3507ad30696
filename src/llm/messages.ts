/**
 * Helpers for single-turn requests: build the user message and fold the
 * provider's stream back into one reply.
 */

import type { LLMProvider, Message, StreamChunk } from "./provider.ts";

export interface Completion {
  text: string;
  stopReason: "end_turn" | "max_tokens";
}

export function userMessage(text: string): Message {
  return { role: "user", content: [{ type: "text", text }] };
}

/** Merge text deltas until the provider reports it is done. */
export async function collectCompletion(stream: AsyncIterable<StreamChunk>): Promise<Completion> {
  let text = "";
  let stopReason: Completion["stopReason"] = "end_turn";

  for await (const chunk of stream) {
    switch (chunk.type) {
      case "text_delta":
        text += chunk.text;
        break;
      case "done":
        stopReason = chunk.stopReason;
        break;
    }
  }

  return { text, stopReason };
}

/** Send one user prompt and wait for the whole reply. */
export async function complete(
  provider: LLMProvider,
  systemPrompt: string,
  prompt: string,
): Promise<Completion> {
  return collectCompletion(provider.chat([userMessage(prompt)], systemPrompt));
}
