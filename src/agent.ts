/**
 * Agent session host
 *
 * Owns everything that outlives a single turn:
 * - settings source (re-read at the start of every turn)
 * - router factory (a fresh router per turn from that snapshot)
 * - per-mode conversations and approval queues
 * - skill registry and audit logger
 * - abort controllers and event listeners
 *
 * Turn path:
 *   send(mode, text)
 *   └─ mode lane (serial per mode)
 *      └─ global lane (one turn at a time; a waiting mode gets a "busy" event)
 *         └─ runTurn() → for await (event) → emit({ ...event, mode })
 *
 * Approved commands re-enter through approveCommand(): re-validated,
 * re-classified, executed, and posted as an assistant message.
 */

import os from "node:os";
import { describeError, friendlyErrorMessage } from "./errors.js";
import type { AgentEvent, TurnResult } from "./agent-events.js";
import { emptyTurnResult } from "./agent-events.js";
import { runTurn, DEFAULT_TURN_LIMITS, type TurnLimits } from "./agent-loop.js";
import { CommandLanes, GLOBAL_LANE, resolveModeLane } from "./command-queue.js";
import { executeCommand, executeWithElevation, executeWithSudo, DEFAULT_COMMAND_TIMEOUT_SEC, type CommandResult, type ExecuteOptions } from "./executor/executor.js";
import { buildSystemPrompt } from "./prompts.js";
import { ProviderRouter, type ChatRouter } from "./provider/router.js";
import { createAllowList, validateCommandPaths } from "./safety/allow-list.js";
import { classifyCommand, type DangerLevel } from "./safety/classifier.js";
import { Conversation, textMessage, type Message, type Mode } from "./session.js";
import { SettingsStore, dataDir as defaultDataDir, type Settings } from "./settings.js";
import type { AuditLogger } from "./skills/audit.js";
import type { SkillRegistry } from "./skills/registry.js";
import type { UserPermission } from "./skills/types.js";
import { createDefaultSkillRegistry, openAuditLogger } from "./skills/index.js";
import { ApprovalQueue, type PendingCommand } from "./tools/approval-queue.js";
import { BUILTIN_TOOLS } from "./tools/builtin.js";
import { ToolDispatcher, type ToolDispatcherDeps } from "./tools/dispatch.js";
import type { ToolContext } from "./tools/types.js";
import { filterToolsByPolicy, policyForCapabilities, type ToolPolicy } from "./tool-policy.js";

// ============== Type definitions ==============

/** Anything that can hand out a settings snapshot; SettingsStore in production */
export interface SettingsSource {
  snapshot(): Settings;
}

export interface CommandRunner {
  execute: (command: string, options: ExecuteOptions) => Promise<CommandResult>;
  executeWithSudo: (command: string, password: string, options: ExecuteOptions) => Promise<CommandResult>;
  executeWithElevation: (command: string, options: ExecuteOptions) => Promise<CommandResult>;
}

export interface AgentConfig extends Partial<TurnLimits> {
  /** Default: SettingsStore at the OS config path */
  settings?: SettingsSource;
  /** Default: a ProviderRouter over the snapshot */
  routerFactory?: (settings: Settings) => ChatRouter;
  skills?: SkillRegistry;
  auditor?: AuditLogger;
  /** Working directory for commands and relative paths */
  cwd?: string;
  homeDir?: string;
  platform?: NodeJS.Platform;
  commandTimeoutSec?: number;
  /** Extra allow/deny patterns over the native tool set */
  toolPolicy?: ToolPolicy;
  /** Overrides for search / execute / classify inside tool dispatch */
  dispatch?: Pick<ToolDispatcherDeps, "search" | "execute" | "classify">;
  /** Overrides for approved-command execution */
  runner?: Partial<CommandRunner>;
}

export interface CreateAgentOptions extends AgentConfig {
  /** Directory for the archive and audit log (default: OS config dir) */
  dataDir?: string;
  /** Directory scanned for SKILL.md instruction skills */
  skillsDir?: string;
}

export type ApprovalResult =
  | { status: "executed"; result: CommandResult }
  | { status: "failed"; reason: string }
  | { status: "refused"; reason: string }
  | { status: "needs_password" };

// ============== Agent core class ==============

export class Agent {
  private readonly settings: SettingsSource;
  private readonly routerFactory: (settings: Settings) => ChatRouter;
  private readonly skills?: SkillRegistry;
  private readonly auditor?: AuditLogger;
  private readonly cwd: string;
  private readonly homeDir: string;
  private readonly platform: NodeJS.Platform;
  private readonly commandTimeoutSec: number;
  private readonly limits: TurnLimits;
  private readonly toolPolicy?: ToolPolicy;
  private readonly dispatchDeps: Pick<ToolDispatcherDeps, "search" | "execute" | "classify">;
  private readonly runner: CommandRunner;
  private readonly classify: (command: string) => DangerLevel;

  private readonly lanes = new CommandLanes();
  private readonly conversations = new Map<Mode, Conversation>();
  private readonly approvals = new Map<Mode, ApprovalQueue>();

  /**
   * Abort controllers of running turns, by mode
   *
   * - cancel(mode) aborts one, cancel() aborts all
   */
  private readonly controllers = new Map<Mode, AbortController>();
  private runningMode?: Mode;

  /**
   * Event subscribers
   *
   * - subscribe() adds a listener, returns an unsubscribe function
   * - emit() iterates listeners and calls them synchronously
   */
  private readonly listeners = new Set<(event: AgentEvent) => void>();
  private readonly failedListeners = new WeakSet<(event: AgentEvent) => void>();

  constructor(config: AgentConfig = {}) {
    this.settings = config.settings ?? new SettingsStore();
    this.routerFactory = config.routerFactory ?? ((settings) => new ProviderRouter(settings));
    this.skills = config.skills;
    this.auditor = config.auditor;
    this.cwd = config.cwd ?? process.cwd();
    this.homeDir = config.homeDir ?? os.homedir();
    this.platform = config.platform ?? process.platform;
    this.commandTimeoutSec = config.commandTimeoutSec ?? DEFAULT_COMMAND_TIMEOUT_SEC;
    this.limits = {
      maxIterations: config.maxIterations ?? DEFAULT_TURN_LIMITS.maxIterations,
      idleTimeoutMs: config.idleTimeoutMs ?? DEFAULT_TURN_LIMITS.idleTimeoutMs,
      replyReserveTokens: config.replyReserveTokens ?? DEFAULT_TURN_LIMITS.replyReserveTokens,
      comfortWindowTokens: config.comfortWindowTokens ?? DEFAULT_TURN_LIMITS.comfortWindowTokens,
    };
    this.toolPolicy = config.toolPolicy;
    this.dispatchDeps = config.dispatch ?? {};
    this.runner = {
      execute: config.runner?.execute ?? executeCommand,
      executeWithSudo: config.runner?.executeWithSudo ?? executeWithSudo,
      executeWithElevation: config.runner?.executeWithElevation ?? executeWithElevation,
    };
    this.classify = config.dispatch?.classify ?? ((command) => classifyCommand(command));
  }

  /**
   * Agent with the built-in skills and an audit log under `dataDir`
   */
  static async create(options: CreateAgentOptions = {}): Promise<Agent> {
    const dir = options.dataDir ?? defaultDataDir();
    const skills = options.skills ?? (await createDefaultSkillRegistry({ dataDir: dir, libraryDir: options.skillsDir }));
    const auditor = options.auditor ?? (await openAuditLogger(dir));
    return new Agent({ ...options, skills, auditor });
  }

  // ============== Events ==============

  subscribe(fn: (event: AgentEvent) => void): () => void {
    this.listeners.add(fn);
    return () => this.listeners.delete(fn);
  }

  private emit(event: AgentEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        // Reported once per listener; the turn carries on
        if (this.failedListeners.has(listener)) continue;
        this.failedListeners.add(listener);
        console.warn(`[agent] listener failed on ${event.type}: ${describeError(err)}`);
      }
    }
  }

  // ============== Turns ==============

  /**
   * Run one user turn in `mode`. Resolves with the turn result; failures
   * are reported in result.error, never thrown.
   */
  async send(mode: Mode, text: string): Promise<TurnResult> {
    const running = this.runningMode;
    if (running && running !== mode) {
      this.emit({ type: "busy", mode: running, waitingMode: mode });
    }
    return this.lanes.enqueue(resolveModeLane(mode), () =>
      this.lanes.enqueue(GLOBAL_LANE, () => this.runTurnFor(mode, text)),
    );
  }

  isBusy(): boolean {
    return this.lanes.stats(GLOBAL_LANE).active > 0;
  }

  busyMode(): Mode | undefined {
    return this.runningMode;
  }

  cancel(mode?: Mode): void {
    if (mode) {
      this.controllers.get(mode)?.abort();
      return;
    }
    for (const controller of this.controllers.values()) {
      controller.abort();
    }
  }

  private async runTurnFor(mode: Mode, text: string): Promise<TurnResult> {
    const controller = new AbortController();
    this.controllers.set(mode, controller);
    this.runningMode = mode;

    try {
      const settings = this.settings.snapshot();
      const router = this.routerFactory(settings);
      const nativeTools = router.supportsNativeTools();
      const terminalEnabled = settings.user_profile.terminal_permission_granted;
      const internetEnabled = settings.enable_internet_research;
      const allowList = createAllowList(settings.allowed_dirs, { cwd: this.cwd, homeDir: this.homeDir });
      const modeSkills = this.skills?.forMode(mode) ?? [];

      const conversation = this.conversationFor(mode);
      conversation.setSystemPrompt(
        buildSystemPrompt(mode, {
          terminalEnabled,
          internetEnabled,
          allowedDirs: allowList,
          nativeTools,
          platform: this.platform,
          skills: modeSkills,
          shareSystemSummary: settings.share_system_summary,
          specKitPath: settings.build.spec_kit_path ?? undefined,
        }),
      );

      const basePolicy: ToolPolicy = { ...this.toolPolicy };
      if (modeSkills.length === 0) basePolicy.deny = [...(basePolicy.deny ?? []), "use_skill"];
      const policy = policyForCapabilities({ terminalEnabled, internetEnabled }, basePolicy);
      const toolCtx: ToolContext = {
        mode,
        cwd: this.cwd,
        homeDir: this.homeDir,
        allowList,
        terminalEnabled,
        internetEnabled,
        commandTimeoutSec: this.commandTimeoutSec,
        abortSignal: controller.signal,
      };
      const dispatcher = new ToolDispatcher({
        approvals: this.approvalsFor(mode),
        skills: this.skills,
        auditor: this.auditor,
        ...this.dispatchDeps,
      });

      const stream = runTurn({
        conversation,
        userText: text,
        router,
        dispatcher,
        toolCtx,
        tools: filterToolsByPolicy(BUILTIN_TOOLS, policy),
        limits: this.limits,
      });
      for await (const event of stream) {
        this.emit({ ...event, mode });
      }
      return await stream.result();
    } catch (err) {
      // Setup failed before the turn stream existed (settings, router, prompt)
      const result = emptyTurnResult();
      result.error = friendlyErrorMessage(err);
      this.emit({ type: "turn_error", error: result.error, result, mode });
      return result;
    } finally {
      this.controllers.delete(mode);
      this.runningMode = undefined;
    }
  }

  // ============== Approvals ==============

  pendingApprovals(mode: Mode): readonly PendingCommand[] {
    return this.approvalsFor(mode).list();
  }

  /**
   * Run a command the user approved. The allow-list and classifier are
   * consulted again; Blocked is refused whatever the queue said.
   *
   * NeedsSudo without a password returns needs_password and stays queued.
   */
  async approveCommand(mode: Mode, command: string, options: { password?: string } = {}): Promise<ApprovalResult> {
    return this.lanes.enqueue(resolveModeLane(mode), async () => {
      const settings = this.settings.snapshot();
      const queue = this.approvalsFor(mode);

      const refuse = (reason: string): ApprovalResult => {
        queue.remove(command);
        this.emit({ type: "approval_resolved", mode, command, outcome: "refused" });
        return { status: "refused", reason };
      };

      if (!settings.user_profile.terminal_permission_granted) return refuse("terminal disabled");
      const gateOptions = { cwd: this.cwd, homeDir: this.homeDir };
      const allowList = createAllowList(settings.allowed_dirs, gateOptions);
      const gate = validateCommandPaths(command, allowList, gateOptions);
      if (!gate.ok) return refuse(gate.reason);

      const level = this.classify(command);
      if (level === "Blocked") return refuse("blocked for safety");

      const execOptions: ExecuteOptions = { timeoutSec: this.commandTimeoutSec, cwd: this.cwd, platform: this.platform };
      let result: CommandResult;
      try {
        if (level === "NeedsSudo") {
          const inner = command.replace(/^\s*sudo\s+/i, "");
          if (this.platform === "win32") {
            result = await this.runner.executeWithElevation(inner, execOptions);
          } else if (options.password === undefined) {
            return { status: "needs_password" };
          } else {
            result = await this.runner.executeWithSudo(inner, options.password, execOptions);
          }
        } else {
          result = await this.runner.execute(command, execOptions);
        }
      } catch (err) {
        const reason = describeError(err);
        queue.remove(command);
        this.conversationFor(mode).append(textMessage("assistant", `Command \`${command}\` failed to run: ${reason}`));
        this.emit({ type: "approval_resolved", mode, command, outcome: "failed" });
        return { status: "failed", reason };
      }

      queue.remove(command);
      this.conversationFor(mode).append(
        textMessage("assistant", `Command \`${command}\` completed.\n\n\`\`\`\n${result.combinedOutput}\n\`\`\``),
      );
      this.emit({ type: "approval_resolved", mode, command, outcome: "executed", result });
      return { status: "executed", result };
    });
  }

  denyCommand(mode: Mode, command: string): boolean {
    const removed = this.approvalsFor(mode).remove(command);
    if (removed) {
      this.emit({ type: "approval_resolved", mode, command: removed.command, outcome: "denied" });
    }
    return removed !== undefined;
  }

  clearApprovals(mode: Mode): number {
    return this.approvalsFor(mode).clear();
  }

  // ============== Skills ==============

  /** Let an Ask skill run for the rest of this session */
  approveSkill(id: string): boolean {
    if (!this.skills?.get(id)) return false;
    this.skills.approveForSession(id);
    return true;
  }

  async setSkillPermission(id: string, permission: UserPermission): Promise<boolean> {
    if (!this.skills?.get(id)) return false;
    const previous = this.skills.setUserPermission(id, permission);
    await this.auditor?.log({ kind: "permission_change", skillId: id, from: previous, to: permission });
    return true;
  }

  getSkills(): SkillRegistry | undefined {
    return this.skills;
  }

  // ============== Sessions ==============

  reset(mode: Mode): void {
    this.conversations.get(mode)?.reset();
    this.approvals.get(mode)?.clear();
    this.skills?.clearSessionApprovals();
  }

  history(mode: Mode): readonly Message[] {
    return this.conversationFor(mode).messages;
  }

  private conversationFor(mode: Mode): Conversation {
    let conversation = this.conversations.get(mode);
    if (!conversation) {
      conversation = Conversation.create(mode, "");
      this.conversations.set(mode, conversation);
    }
    return conversation;
  }

  private approvalsFor(mode: Mode): ApprovalQueue {
    let queue = this.approvals.get(mode);
    if (!queue) {
      queue = new ApprovalQueue();
      this.approvals.set(mode, queue);
    }
    return queue;
  }
}
