/**
 * LLM Provider abstraction layer.
 *
 * Extraction and formatting both talk to a model through this interface,
 * so any back end (or the mock) can be swapped in without touching the
 * pipeline. Providers stream their reply; callers collect it.
 */

// --- Message types ---

export type Role = "user" | "assistant";

export interface TextContent {
  type: "text";
  text: string;
}

export type MessageContent = TextContent;

export interface Message {
  role: Role;
  content: MessageContent[];
}

// --- Streaming ---

export interface TextDelta {
  type: "text_delta";
  text: string;
}

export interface StreamDone {
  type: "done";
  stopReason: "end_turn" | "max_tokens";
}

export type StreamChunk = TextDelta | StreamDone;

// --- Provider interface ---

export interface LLMProvider {
  readonly name: string;
  readonly model: string;

  chat(
    messages: Message[],
    systemPrompt: string,
  ): AsyncIterable<StreamChunk>;
}

export interface ProviderOptions {
  model?: string;
  /** Credential resolved from config; SDKs fall back to their own env lookup when absent */
  apiKey?: string;
  /** Server URL for self-hosted back ends */
  host?: string;
}

// --- Provider registry ---

export type ProviderFactory = (options: ProviderOptions) => LLMProvider;

const providers = new Map<string, ProviderFactory>();

export function registerProvider(name: string, factory: ProviderFactory) {
  providers.set(name, factory);
}

export function hasProvider(name: string): boolean {
  return providers.has(name);
}

export function createProvider(name: string, options: ProviderOptions = {}): LLMProvider {
  const factory = providers.get(name);
  if (!factory) {
    const available = [...providers.keys()].join(", ");
    throw new Error(
      `Unknown LLM provider "${name}". Available: ${available}`,
    );
  }
  return factory(options);
}

export function listProviders(): string[] {
  return [...providers.keys()];
}
