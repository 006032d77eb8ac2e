/**
 * Settings snapshot
 *
 * settings.json lives in the OS config dir under little_helper/. The core reads
 * a fresh snapshot at the start of every turn; the host mutates it through
 * SettingsStore.update(), which writes atomically (temp file + rename).
 *
 * Every object level uses passthrough(), so fields this package does not know
 * about survive a load → save round trip.
 */

import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { z } from "zod";
import { describeError } from "./errors.js";

// ============== Schema ==============

const OAuthSchema = z
  .object({
    access_token: z.string(),
    refresh_token: z.string().nullish(),
    /** Unix timestamp (seconds) */
    expires_at: z.number().nullish(),
  })
  .passthrough();

const ProviderAuthSchema = z
  .object({
    api_key: z.string().nullish(),
    oauth: OAuthSchema.nullish(),
  })
  .passthrough();

export const DEFAULT_PROVIDER_PREFERENCE = ["anthropic", "openai", "gemini", "local"];
export const KNOWN_PROVIDERS: readonly string[] = DEFAULT_PROVIDER_PREFERENCE;

const ModelSettingsSchema = z
  .object({
    local_model: z.string().default("llama3.2:3b"),
    provider_preference: z.array(z.string()).default(() => [...DEFAULT_PROVIDER_PREFERENCE]),
    openai_model: z.string().default("gpt-4o-mini"),
    anthropic_model: z.string().default("claude-sonnet-4-20250514"),
    gemini_model: z.string().default("gemini-2.5-flash"),
    openai_auth: ProviderAuthSchema.default({}),
    anthropic_auth: ProviderAuthSchema.default({}),
    gemini_auth: ProviderAuthSchema.default({}),
  })
  .passthrough();

const UserProfileSchema = z
  .object({
    terminal_permission_granted: z.boolean().default(false),
  })
  .passthrough();

const BuildSettingsSchema = z
  .object({
    spec_kit_path: z.string().nullish(),
  })
  .passthrough();

export const SettingsSchema = z
  .object({
    allowed_dirs: z.array(z.string()).default(() => []),
    enable_internet_research: z.boolean().default(false),
    share_system_summary: z.boolean().default(false),
    model: ModelSettingsSchema.default({}),
    user_profile: UserProfileSchema.default({}),
    build: BuildSettingsSchema.default({}),
  })
  .passthrough();

export type Settings = z.infer<typeof SettingsSchema>;
export type ProviderAuth = z.infer<typeof ProviderAuthSchema>;

export function defaultSettings(): Settings {
  return SettingsSchema.parse({});
}

// ============== Paths ==============

export function configDir(env: NodeJS.ProcessEnv = process.env, platform: NodeJS.Platform = process.platform): string {
  if (platform === "win32") {
    return env.APPDATA ?? path.join(os.homedir(), "AppData", "Roaming");
  }
  if (platform === "darwin") {
    return path.join(os.homedir(), "Library", "Application Support");
  }
  return env.XDG_CONFIG_HOME ?? path.join(os.homedir(), ".config");
}

export function settingsPath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(configDir(env), "little_helper", "settings.json");
}

export function dataDir(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(configDir(env), "little_helper");
}

// ============== Load / Save ==============

export interface SettingsLoadResult {
  settings: Settings;
  /** false when defaults were used because the file was missing */
  fromFile: boolean;
  warnings: string[];
}

/**
 * Load settings, falling back to defaults. Never throws: parse and
 * validation problems come back as warnings.
 */
export function loadSettings(filePath: string = settingsPath()): SettingsLoadResult {
  const warnings: string[] = [];
  if (!fs.existsSync(filePath)) {
    return { settings: defaultSettings(), fromFile: false, warnings };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (err) {
    warnings.push(`${filePath}: failed to parse JSON: ${describeError(err)}`);
    return { settings: defaultSettings(), fromFile: false, warnings };
  }

  const result = SettingsSchema.safeParse(raw);
  if (result.success) {
    return { settings: result.data, fromFile: true, warnings };
  }
  for (const issue of result.error.issues) {
    const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    warnings.push(`settings validation: ${where}: ${issue.message}`);
  }
  return { settings: defaultSettings(), fromFile: false, warnings };
}

export function saveSettings(settings: Settings, filePath: string = settingsPath()): void {
  const dir = path.dirname(filePath);
  fs.mkdirSync(dir, { recursive: true });
  const tmp = path.join(dir, `.${path.basename(filePath)}.${process.pid}.${Date.now()}.tmp`);
  fs.writeFileSync(tmp, `${JSON.stringify(settings, null, 2)}\n`, { encoding: "utf-8", mode: 0o600 });
  fs.renameSync(tmp, filePath);
}

/**
 * Read-mostly handle passed to the core instead of a process-wide singleton.
 */
export class SettingsStore {
  readonly filePath: string;
  private readonly onWarning: (message: string) => void;

  constructor(filePath: string = settingsPath(), options?: { onWarning?: (message: string) => void }) {
    this.filePath = filePath;
    this.onWarning = options?.onWarning ?? ((message) => console.warn(`[settings] ${message}`));
  }

  snapshot(): Settings {
    const { settings, warnings } = loadSettings(this.filePath);
    for (const warning of warnings) this.onWarning(warning);
    return settings;
  }

  update(mutate: (settings: Settings) => void): Settings {
    const settings = this.snapshot();
    mutate(settings);
    saveSettings(SettingsSchema.parse(settings), this.filePath);
    return settings;
  }
}

// ============== Helpers ==============

/**
 * Put `name` first, then the remaining known providers in the fixed
 * fallback order local → anthropic → openai → gemini.
 */
export function setPrimaryProvider(settings: Settings, name: string): void {
  const order = [name, "local", "anthropic", "openai", "gemini"];
  settings.model.provider_preference = order.filter((p, i) => order.indexOf(p) === i);
}

/** LH_DISABLE_PRELOAD_OPENAI=1|true|yes turns off seeding a bundled OpenAI key */
export function preloadOpenAiEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env.LH_DISABLE_PRELOAD_OPENAI?.trim().toLowerCase();
  return !(value === "1" || value === "true" || value === "yes");
}

export function ensureAllowedDirs(settings: Settings, homeDir: string = os.homedir()): boolean {
  if (settings.allowed_dirs.length > 0) return false;
  settings.allowed_dirs.push(homeDir);
  return true;
}

export interface FirstRunOptions {
  homeDir?: string;
  env?: NodeJS.ProcessEnv;
  /** OpenAI key injected into bespoke builds; empty in public builds */
  bundledOpenAiKey?: string;
}

/**
 * Fill in what a fresh install needs: the home directory as the only allowed
 * dir, and the bundled OpenAI key unless LH_DISABLE_PRELOAD_OPENAI is set or a
 * key is already configured. Returns true when anything changed.
 */
export function applyFirstRunDefaults(settings: Settings, options: FirstRunOptions = {}): boolean {
  let changed = ensureAllowedDirs(settings, options.homeDir);
  const key = options.bundledOpenAiKey?.trim();
  if (key && preloadOpenAiEnabled(options.env) && !settings.model.openai_auth.api_key) {
    settings.model.openai_auth.api_key = key;
    changed = true;
  }
  return changed;
}
