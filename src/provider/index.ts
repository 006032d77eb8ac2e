/**
 * Provider layer, based on @mariozechner/pi-ai
 *
 * - LLM SDK adaptation (Anthropic/OpenAI/Gemini/Ollama) is delegated to pi-ai
 * - The router maps pi-ai's AssistantMessageEvent onto the StreamChunk union
 * - Error classification lives in errors.ts; there is no silent retry
 */

export type {
  Api,
  Model,
  Context,
  SimpleStreamOptions,
  AssistantMessageEvent,
  AssistantMessageEventStream,
  Tool as PiTool,
} from "@mariozechner/pi-ai";

export {
  ProviderRouter,
  createChunkStream,
  DEFAULT_FALLBACK_POLICY,
  type ChatRouter,
  type FallbackPolicy,
  type GenerateOptions,
  type GenerateResult,
  type ProviderRouterOptions,
  type StopReason,
  type StreamChunk,
  type StreamFn,
} from "./router.js";

export {
  PROVIDER_NAMES,
  OLLAMA_BASE_URL,
  configuredModelId,
  isProviderName,
  localModel,
  resolveModel,
  type ProviderName,
} from "./models.js";

export {
  ProviderError,
  classifyProviderFailure,
  isProviderError,
  isTransientProviderError,
  kindForReason,
  toProviderError,
  type FailureReason,
  type ProviderErrorKind,
} from "./errors.js";
