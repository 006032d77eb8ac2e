/**
 * Little Helper core
 *
 * Module layers:
 *
 * [Core Layer] What every turn goes through
 *   - Agent (per-mode conversations, lanes, approvals, events)
 *   - Turn runner (bounded tool loop + EventStream)
 *   - Session (in-memory conversation + tool-result pairing)
 *   - Context budget (token estimate + oldest-first trimming)
 *   - Provider (pi-ai backed router for Anthropic / OpenAI / Gemini / Ollama)
 *
 * [Safety Layer] Gates in front of the shell
 *   - Classifier (Safe → Blocked danger levels)
 *   - Allow-list (canonical directory containment + path extraction)
 *   - Executor (timeouts, output caps, sudo / elevation)
 *
 * [Extension Layer] Mode capabilities
 *   - Tools (intents, dispatch, approval queue, web search)
 *   - Skills (registry, permission model, audit log, built-ins)
 *   - Prompts (per-mode persona system prompts)
 */

// =============================================
// [Core Layer]
// =============================================

export {
  Agent,
  type AgentConfig,
  type ApprovalResult,
  type CommandRunner,
  type CreateAgentOptions,
  type SettingsSource,
} from "./agent.js";

export {
  runTurn,
  DEFAULT_TURN_LIMITS,
  MAX_ITERATIONS,
  IDLE_TIMEOUT_MS,
  SUMMARY_REQUEST,
  CANCELLED_TOOL_RESULT,
  type TurnLimits,
  type TurnParams,
} from "./agent-loop.js";

export { type AgentEvent, type TurnEvent, type TurnResult, createTurnStream, emptyTurnResult } from "./agent-events.js";

export { CommandLanes, GLOBAL_LANE, resolveModeLane, type EnqueueOpts, type LaneStats } from "./command-queue.js";

export {
  Conversation,
  MODES,
  isMode,
  textMessage,
  type Mode,
  type Message,
  type Role,
  type ContentPart,
  type TextPart,
  type ToolUsePart,
  type ToolResultPart,
} from "./session.js";

export * from "./context/index.js";

export * from "./provider/index.js";

export { convertMessagesToPi, splitSystemPrompt } from "./message-convert.js";

export {
  CoreError,
  cancelledError,
  describeError,
  friendlyErrorMessage,
  isCoreError,
  toCoreError,
  type ErrorKind,
  type ErrorSuggestion,
  type FriendlyError,
} from "./errors.js";

export {
  SettingsStore,
  SettingsSchema,
  defaultSettings,
  loadSettings,
  saveSettings,
  settingsPath,
  dataDir,
  configDir,
  ensureAllowedDirs,
  applyFirstRunDefaults,
  preloadOpenAiEnabled,
  setPrimaryProvider,
  KNOWN_PROVIDERS,
  type FirstRunOptions,
  type Settings,
  type ProviderAuth,
} from "./settings.js";

// =============================================
// [Safety Layer]
// =============================================

export {
  classifyCommand,
  createCommandRules,
  loadCommandRules,
  describeDangerLevel,
  requiresApproval,
  type CommandRules,
  type DangerLevel,
} from "./safety/classifier.js";

export {
  createAllowList,
  canonicalizePath,
  isPathAllowed,
  validateCommandPaths,
  extractPathTokens,
  type AllowList,
  type GateOptions,
  type GateResult,
} from "./safety/allow-list.js";

export {
  executeCommand,
  executeWithSudo,
  executeWithElevation,
  DEFAULT_COMMAND_TIMEOUT_SEC,
  MAX_OUTPUT_BYTES,
  type CommandResult,
  type ExecuteOptions,
} from "./executor/executor.js";

export { summarizeResult } from "./executor/summary.js";

// =============================================
// [Extension Layer]
// =============================================

export { type ToolIntent, type ToolOutcome, type ToolContext, toolNameOf } from "./tools/types.js";
export { parseTextIntents, stripIntentTags, intentFromToolUse } from "./tools/intents.js";
export { ToolDispatcher, type ToolDispatcherDeps } from "./tools/dispatch.js";
export { ApprovalQueue, type PendingCommand } from "./tools/approval-queue.js";
export { BUILTIN_TOOLS } from "./tools/builtin.js";
export { webSearch, type WebSearchOptions, type WebSearchResult } from "./tools/web-search.js";

export { type ToolPolicy, filterToolsByPolicy, isToolAllowed, policyForCapabilities } from "./tool-policy.js";

export * from "./skills/index.js";

export { buildSystemPrompt, modeIntroduction, personaFor, type Persona, type SystemPromptOptions } from "./prompts.js";
