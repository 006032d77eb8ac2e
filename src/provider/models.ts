/**
 * Model resolution for the four configurable providers.
 *
 * Settings names map onto pi-ai providers (gemini → google). Model ids come
 * from settings; an id pi-ai's registry does not know yet is cloned from the
 * provider's first registered model so new releases work without an upgrade.
 * The local provider talks to Ollama's OpenAI-compatible endpoint.
 */

import { getModels, type Api, type Model } from "@mariozechner/pi-ai";
import type { Settings } from "../settings.js";
import { ProviderError } from "./errors.js";

export type ProviderName = "openai" | "anthropic" | "gemini" | "local";

export const PROVIDER_NAMES: readonly ProviderName[] = ["openai", "anthropic", "gemini", "local"];

export function isProviderName(value: string): value is ProviderName {
  return PROVIDER_NAMES.some((p) => p === value);
}

export const OLLAMA_BASE_URL = "http://localhost:11434/v1";

export function localModel(id: string, baseUrl: string = OLLAMA_BASE_URL): Model<Api> {
  return {
    id,
    name: id,
    api: "openai-completions",
    provider: "ollama",
    baseUrl,
    reasoning: false,
    input: ["text"],
    cost: { input: 0, output: 0, cacheRead: 0, cacheWrite: 0 },
    contextWindow: 128_000,
    maxTokens: 4_096,
  };
}

function registryModels(name: Exclude<ProviderName, "local">): Model<Api>[] {
  switch (name) {
    case "openai":
      return getModels("openai");
    case "anthropic":
      return getModels("anthropic");
    case "gemini":
      return getModels("google");
  }
}

export function configuredModelId(name: ProviderName, settings: Settings): string {
  switch (name) {
    case "openai":
      return settings.model.openai_model;
    case "anthropic":
      return settings.model.anthropic_model;
    case "gemini":
      return settings.model.gemini_model;
    case "local":
      return settings.model.local_model;
  }
}

export function resolveModel(name: ProviderName, settings: Settings): Model<Api> {
  const id = configuredModelId(name, settings);
  if (name === "local") return localModel(id);

  const models = registryModels(name);
  const exact = models.find((m) => m.id === id);
  if (exact) return exact;

  const [template] = models;
  if (!template) {
    throw new ProviderError(`No models are registered for provider ${name}`, { reason: "format", provider: name, model: id });
  }
  return { ...template, id, name: id };
}
