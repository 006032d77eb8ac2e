/**
 * Provider Router
 *
 * Architecture (EventStream pattern, same shape as runTurn):
 * - generateStream() synchronously returns EventStream<StreamChunk, GenerateResult>
 * - an IIFE drives pi-ai's streamSimple and maps AssistantMessageEvent → StreamChunk
 * - done / error are terminal chunks and carry everything the result needs
 *
 * Selection:
 * - walk settings.model.provider_preference in order
 * - skip unknown names and providers without a credential
 * - exhausted list → ProviderAuth error
 *
 * Tool protocol:
 * - only Anthropic gets structured tool definitions; every other provider
 *   streams plain text and the system prompt teaches it the XML tags
 */

import {
  EventStream,
  getEnvApiKey,
  streamSimple,
  type Api,
  type AssistantMessageEvent,
  type AssistantMessageEventStream,
  type Context,
  type Model,
  type SimpleStreamOptions,
  type Tool as PiTool,
} from "@mariozechner/pi-ai";
import type { Message } from "../session.js";
import type { ProviderAuth, Settings } from "../settings.js";
import { convertMessagesToPi, splitSystemPrompt } from "../message-convert.js";
import { ProviderError, isTransientProviderError, toProviderError } from "./errors.js";
import { isProviderName, resolveModel, type ProviderName } from "./models.js";

// ============== Stream chunks ==============

export type StopReason = "end_turn" | "tool_use" | "max_tokens" | "iteration_reset";

export type StreamChunk =
  | { type: "text"; delta: string }
  | { type: "tool_use_start"; id: string; name: string }
  | { type: "tool_input_delta"; id: string; delta: string }
  | { type: "tool_use_complete"; id: string; name: string; input: Record<string, unknown> }
  | { type: "done"; stopReason: StopReason; provider: string; model: string }
  | { type: "error"; error: ProviderError };

export type GenerateResult =
  | { ok: true; stopReason: StopReason; provider: string; model: string }
  | { ok: false; error: ProviderError };

export function createChunkStream(): EventStream<StreamChunk, GenerateResult> {
  return new EventStream<StreamChunk, GenerateResult>(
    (chunk) => chunk.type === "done" || chunk.type === "error",
    (chunk) => {
      if (chunk.type === "done") {
        return { ok: true, stopReason: chunk.stopReason, provider: chunk.provider, model: chunk.model };
      }
      if (chunk.type === "error") {
        return { ok: false, error: chunk.error };
      }
      return { ok: false, error: new ProviderError("Stream ended unexpectedly", { reason: "format" }) };
    },
  );
}

// ============== Router contract ==============

export interface GenerateOptions {
  /** Offer native tools when the provider supports them */
  enableTools: boolean;
  tools?: PiTool[];
  signal?: AbortSignal;
  maxTokens?: number;
  temperature?: number;
}

/** What the turn runner needs from a router; tests script their own */
export interface ChatRouter {
  activeProvider(): ProviderName | undefined;
  supportsNativeTools(name?: ProviderName): boolean;
  generateStream(messages: readonly Message[], options: GenerateOptions): EventStream<StreamChunk, GenerateResult>;
}

export interface FallbackPolicy {
  enabled: boolean;
  /** Extra providers tried after the first one fails */
  maxAttempts: number;
}

export const DEFAULT_FALLBACK_POLICY: FallbackPolicy = { enabled: false, maxAttempts: 1 };

export type StreamFn = (
  model: Model<Api>,
  context: Context,
  options?: SimpleStreamOptions,
) => AssistantMessageEventStream;

export interface ProviderRouterOptions {
  fallback?: FallbackPolicy;
  /** Defaults to pi-ai's streamSimple */
  streamFn?: StreamFn;
  /** Environment lookup for keys; defaults to pi-ai's getEnvApiKey */
  envApiKey?: (provider: string) => string | undefined;
  /** Override model resolution (e.g. a local model on a different port) */
  resolveModel?: (name: ProviderName, settings: Settings) => Model<Api>;
  now?: () => number;
}

const NO_PROVIDER_MESSAGE =
  "No AI provider is configured. Add an API key in Settings or start a local model.";

// ============== Implementation ==============

export class ProviderRouter implements ChatRouter {
  private readonly settings: Settings;
  private readonly fallback: FallbackPolicy;
  private readonly streamFn: StreamFn;
  private readonly envApiKey: (provider: string) => string | undefined;
  private readonly modelFor: (name: ProviderName, settings: Settings) => Model<Api>;
  private readonly now: () => number;

  constructor(settings: Settings, options: ProviderRouterOptions = {}) {
    this.settings = settings;
    this.fallback = options.fallback ?? DEFAULT_FALLBACK_POLICY;
    this.streamFn = options.streamFn ?? streamSimple;
    this.envApiKey = options.envApiKey ?? ((provider) => getEnvApiKey(provider));
    this.modelFor = options.resolveModel ?? resolveModel;
    this.now = options.now ?? Date.now;
  }

  /** Providers in preference order that could be called right now */
  candidates(): ProviderName[] {
    const seen = new Set<ProviderName>();
    for (const name of this.settings.model.provider_preference) {
      const normalized = name.trim().toLowerCase();
      if (!isProviderName(normalized) || seen.has(normalized)) continue;
      if (normalized !== "local" && !this.credentialFor(normalized)) continue;
      seen.add(normalized);
    }
    return [...seen];
  }

  activeProvider(): ProviderName | undefined {
    return this.candidates()[0];
  }

  /**
   * Credential lookup order: settings api_key, then a non-expired OAuth
   * access token, then the provider's environment variable.
   */
  credentialFor(name: ProviderName): string | undefined {
    if (name === "local") return undefined;
    const auth = this.authFor(name);
    const apiKey = auth.api_key?.trim();
    if (apiKey) return apiKey;
    const oauth = auth.oauth;
    if (oauth?.access_token) {
      const expiresAt = oauth.expires_at;
      if (expiresAt == null || expiresAt * 1000 > this.now()) return oauth.access_token;
    }
    return this.envApiKey(name === "gemini" ? "google" : name);
  }

  supportsNativeTools(name: ProviderName | undefined = this.activeProvider()): boolean {
    return name === "anthropic";
  }

  generateStream(messages: readonly Message[], options: GenerateOptions): EventStream<StreamChunk, GenerateResult> {
    const out = createChunkStream();

    void (async () => {
      const candidates = this.candidates();
      if (candidates.length === 0) {
        out.push({ type: "error", error: new ProviderError(NO_PROVIDER_MESSAGE, { reason: "auth" }) });
        out.end();
        return;
      }

      const attempts = this.fallback.enabled ? Math.min(candidates.length, 1 + Math.max(0, this.fallback.maxAttempts)) : 1;
      for (let i = 0; i < attempts; i++) {
        const provider = candidates[i];
        if (!provider) break;
        const outcome = await this.streamOnce(provider, messages, options, out);
        if (outcome.kind === "done") {
          out.end();
          return;
        }
        const canFallBack = !outcome.forwarded && isTransientProviderError(outcome.error) && !options.signal?.aborted;
        if (!canFallBack || i === attempts - 1) {
          out.push({ type: "error", error: outcome.error });
          out.end();
          return;
        }
      }
    })();

    return out;
  }

  // ============== Private ==============

  private authFor(name: Exclude<ProviderName, "local">): ProviderAuth {
    switch (name) {
      case "openai":
        return this.settings.model.openai_auth;
      case "anthropic":
        return this.settings.model.anthropic_auth;
      case "gemini":
        return this.settings.model.gemini_auth;
    }
  }

  /**
   * One provider call. Chunks are forwarded to `out` as they arrive; the
   * terminal chunk is left to the caller so a failure can fall back.
   */
  private async streamOnce(
    provider: ProviderName,
    messages: readonly Message[],
    options: GenerateOptions,
    out: EventStream<StreamChunk, GenerateResult>,
  ): Promise<{ kind: "done" } | { kind: "error"; error: ProviderError; forwarded: boolean }> {
    let forwarded = false;
    let modelId = "";
    try {
      const model = this.modelFor(provider, this.settings);
      modelId = model.id;
      const useTools = options.enableTools && this.supportsNativeTools(provider) && (options.tools?.length ?? 0) > 0;
      const context: Context = {
        systemPrompt: splitSystemPrompt(messages),
        messages: convertMessagesToPi(messages, model),
        ...(useTools ? { tools: options.tools } : {}),
      };
      const streamOptions: SimpleStreamOptions = {
        apiKey: this.credentialFor(provider),
        signal: options.signal,
        maxTokens: options.maxTokens ?? model.maxTokens,
        ...(options.temperature !== undefined ? { temperature: options.temperature } : {}),
      };

      // contentIndex → tool call id, for toolcall_delta
      const toolIds = new Map<number, string>();
      const events = this.streamFn(model, context, streamOptions);
      for await (const event of events) {
        const chunk = mapEvent(event, toolIds);
        if (chunk === "done") {
          out.push({ type: "done", stopReason: mapStopReason(event), provider, model: model.id });
          return { kind: "done" };
        }
        if (chunk instanceof ProviderError) {
          return { kind: "error", error: withMeta(chunk, provider, model.id), forwarded };
        }
        if (chunk) {
          forwarded = true;
          out.push(chunk);
        }
      }
      return {
        kind: "error",
        error: new ProviderError("Provider stream ended without a stop event", { reason: "format", provider, model: model.id }),
        forwarded,
      };
    } catch (err) {
      return { kind: "error", error: toProviderError(err, { provider, model: modelId }), forwarded };
    }
  }
}

// ============== Event mapping ==============

function mapEvent(
  event: AssistantMessageEvent,
  toolIds: Map<number, string>,
): StreamChunk | ProviderError | "done" | undefined {
  switch (event.type) {
    case "text_delta":
      return event.delta ? { type: "text", delta: event.delta } : undefined;

    case "toolcall_start": {
      const block = event.partial.content[event.contentIndex];
      if (!block || block.type !== "toolCall") return undefined;
      toolIds.set(event.contentIndex, block.id);
      return { type: "tool_use_start", id: block.id, name: block.name };
    }

    case "toolcall_delta": {
      const id = toolIds.get(event.contentIndex);
      return id ? { type: "tool_input_delta", id, delta: event.delta } : undefined;
    }

    case "toolcall_end": {
      const call = event.toolCall;
      const input: Record<string, unknown> = { ...call.arguments };
      return { type: "tool_use_complete", id: call.id, name: call.name, input };
    }

    case "done":
      return "done";

    case "error": {
      const text = event.error.errorMessage ?? (event.reason === "aborted" ? "Request aborted" : "Provider error");
      return toProviderError(text);
    }

    default:
      return undefined;
  }
}

function mapStopReason(event: AssistantMessageEvent): StopReason {
  if (event.type !== "done") return "end_turn";
  switch (event.reason) {
    case "toolUse":
      return "tool_use";
    case "length":
      return "max_tokens";
    default:
      return "end_turn";
  }
}

function withMeta(error: ProviderError, provider: string, model: string): ProviderError {
  if (error.provider) return error;
  return new ProviderError(error.message, { reason: error.reason, provider, model, details: error.details, cause: error.cause });
}
