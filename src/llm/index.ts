/**
 * LLM module: re-exports provider interface and registers all built-in providers.
 *
 * Import this module to ensure all providers are registered.
 */

// Register providers (side-effect imports)
import "./openai.ts";
import "./anthropic.ts";
import "./gemini.ts";
import "./ollama.ts";
import "./mock.ts";

// Re-export public API
export { createProvider, registerProvider, listProviders, hasProvider } from "./provider.ts";
export type {
  LLMProvider,
  Message,
  MessageContent,
  ProviderOptions,
  StreamChunk,
  TextDelta,
  StreamDone,
  Role,
} from "./provider.ts";
export { collectCompletion, complete, userMessage } from "./messages.ts";
export type { Completion } from "./messages.ts";
