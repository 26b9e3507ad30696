/**
 * Mock LLM provider for testing.
 *
 * Returns canned responses in order and records every call for
 * assertions. A response can also simulate a failed API call.
 */

import {
  type LLMProvider,
  type Message,
  type StreamChunk,
  registerProvider,
} from "./provider.ts";

/** A single canned response the mock will return */
export interface MockResponse {
  /** Text to stream back */
  text?: string;
  /** Throw this error instead of replying */
  error?: Error;
  /** Stop reason */
  stopReason?: "end_turn" | "max_tokens";
}

/** Picks a response from the request instead of the queue */
export type MockResponder = (prompt: string, systemPrompt: string) => MockResponse;

/** Record of a single chat() call for assertions */
export interface MockCall {
  messages: Message[];
  systemPrompt: string;
}

export class MockProvider implements LLMProvider {
  readonly name = "mock";
  readonly model: string;

  /** Queue of responses to return. Shifts one per chat() call. */
  private responses: MockResponse[];
  private responder: MockResponder | null;
  /** All calls made to chat() */
  readonly calls: MockCall[] = [];

  constructor(responses: MockResponse[] | MockResponder = [], model = "mock-model") {
    if (typeof responses === "function") {
      this.responses = [];
      this.responder = responses;
    } else {
      this.responses = [...responses];
      this.responder = null;
    }
    this.model = model;
  }

  /** Add more responses to the queue */
  enqueue(...responses: MockResponse[]) {
    this.responses.push(...responses);
  }

  /** Get the last call made to chat() */
  get lastCall(): MockCall | undefined {
    return this.calls[this.calls.length - 1];
  }

  async *chat(
    messages: Message[],
    systemPrompt: string,
  ): AsyncIterable<StreamChunk> {
    this.calls.push({ messages: [...messages], systemPrompt });

    const prompt = messages
      .flatMap((m) => m.content)
      .map((c) => c.text)
      .join("\n");
    const response = this.responder
      ? this.responder(prompt, systemPrompt)
      : this.responses.shift();

    if (!response) {
      yield { type: "text_delta", text: "(no more mock responses)" };
      yield { type: "done", stopReason: "end_turn" };
      return;
    }

    if (response.error) {
      throw response.error;
    }

    // Simulate streaming with small chunks
    if (response.text) {
      const chunkSize = 10;
      for (let i = 0; i < response.text.length; i += chunkSize) {
        yield { type: "text_delta", text: response.text.slice(i, i + chunkSize) };
      }
    }

    yield { type: "done", stopReason: response.stopReason ?? "end_turn" };
  }
}

// Register for use via createProvider("mock")
registerProvider("mock", (options) => new MockProvider([], options.model));
