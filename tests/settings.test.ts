import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  SettingsStore,
  configDir,
  defaultSettings,
  ensureAllowedDirs,
  loadSettings,
  applyFirstRunDefaults,
  preloadOpenAiEnabled,
  saveSettings,
  setPrimaryProvider,
} from "../src/settings.js";
import { makeTmpDir } from "./helpers.js";

let root: string;
let file: string;

beforeEach(() => {
  root = makeTmpDir("settings-");
  file = path.join(root, "little_helper", "settings.json");
});

afterEach(() => {
  fs.rmSync(root, { recursive: true, force: true });
});

describe("settings", () => {
  it("fills defaults", () => {
    const settings = defaultSettings();
    expect(settings.allowed_dirs).toEqual([]);
    expect(settings.enable_internet_research).toBe(false);
    expect(settings.user_profile.terminal_permission_granted).toBe(false);
    expect(settings.model.provider_preference).toEqual(["anthropic", "openai", "gemini", "local"]);
    expect(settings.model.local_model).toBe("llama3.2:3b");
  });

  it("uses defaults without warnings when the file is missing", () => {
    expect(loadSettings(file)).toEqual({ settings: defaultSettings(), fromFile: false, warnings: [] });
  });

  it("warns about broken JSON and falls back to defaults", () => {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, "{ nope");
    const result = loadSettings(file);
    expect(result.fromFile).toBe(false);
    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0]?.startsWith(`${file}: failed to parse JSON: `)).toBe(true);
  });

  it("reports the path of a field with the wrong type", () => {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, JSON.stringify({ enable_internet_research: "yes" }));
    const result = loadSettings(file);
    expect(result.settings).toEqual(defaultSettings());
    expect(result.warnings).toEqual(["settings validation: enable_internet_research: Expected boolean, received string"]);
  });

  it("keeps unknown fields through a save and load", () => {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, JSON.stringify({ theme: "dark", model: { anthropic_auth: { api_key: "test-secret", label: "mine" } } }));

    const loaded = loadSettings(file);
    expect(loaded.fromFile).toBe(true);
    saveSettings(loaded.settings, file);

    const raw: unknown = JSON.parse(fs.readFileSync(file, "utf-8"));
    expect(raw).toMatchObject({ theme: "dark", model: { anthropic_auth: { api_key: "test-secret", label: "mine" } } });
    expect(fs.readdirSync(path.dirname(file))).toEqual(["settings.json"]);
  });

  it("updates through the store", () => {
    const onWarning = vi.fn();
    const store = new SettingsStore(file, { onWarning });
    store.update((settings) => {
      settings.enable_internet_research = true;
      ensureAllowedDirs(settings, "/home/tester");
    });

    expect(store.snapshot().enable_internet_research).toBe(true);
    expect(store.snapshot().allowed_dirs).toEqual(["/home/tester"]);
    expect(onWarning).not.toHaveBeenCalled();
  });
});

describe("settings helpers", () => {
  it("only seeds allowed_dirs when empty", () => {
    const settings = defaultSettings();
    expect(ensureAllowedDirs(settings, "/home/tester")).toBe(true);
    expect(ensureAllowedDirs(settings, "/elsewhere")).toBe(false);
    expect(settings.allowed_dirs).toEqual(["/home/tester"]);
  });

  it("moves the chosen provider to the front", () => {
    const settings = defaultSettings();
    setPrimaryProvider(settings, "openai");
    expect(settings.model.provider_preference).toEqual(["openai", "local", "anthropic", "gemini"]);
  });

  it("reads the preload switch", () => {
    expect(preloadOpenAiEnabled({})).toBe(true);
    expect(preloadOpenAiEnabled({ LH_DISABLE_PRELOAD_OPENAI: " True " })).toBe(false);
    expect(preloadOpenAiEnabled({ LH_DISABLE_PRELOAD_OPENAI: "0" })).toBe(true);
  });

  it("seeds a fresh install with the home dir and the bundled key", () => {
    const settings = defaultSettings();
    expect(applyFirstRunDefaults(settings, { homeDir: "/home/tester", env: {}, bundledOpenAiKey: "test-secret" })).toBe(true);
    expect(settings.allowed_dirs).toEqual(["/home/tester"]);
    expect(settings.model.openai_auth.api_key).toBe("test-secret");
  });

  it("skips the bundled key when preloading is disabled or a key exists", () => {
    const disabled = defaultSettings();
    applyFirstRunDefaults(disabled, {
      homeDir: "/home/tester",
      env: { LH_DISABLE_PRELOAD_OPENAI: "yes" },
      bundledOpenAiKey: "test-secret",
    });
    expect(disabled.model.openai_auth.api_key).toBeUndefined();

    const configured = defaultSettings();
    configured.allowed_dirs.push("/work");
    configured.model.openai_auth.api_key = "own-key";
    expect(applyFirstRunDefaults(configured, { env: {}, bundledOpenAiKey: "test-secret" })).toBe(false);
    expect(configured.model.openai_auth.api_key).toBe("own-key");
  });

  it("does nothing with the key in a public build", () => {
    const settings = defaultSettings();
    applyFirstRunDefaults(settings, { homeDir: "/home/tester", env: {}, bundledOpenAiKey: "  " });
    expect(settings.model.openai_auth.api_key).toBeUndefined();
  });

  it("resolves the config dir per platform", () => {
    expect(configDir({ APPDATA: "C:\\Users\\t\\AppData\\Roaming" }, "win32")).toBe("C:\\Users\\t\\AppData\\Roaming");
    expect(configDir({ XDG_CONFIG_HOME: "/tmp/xdg" }, "linux")).toBe("/tmp/xdg");
  });
});
