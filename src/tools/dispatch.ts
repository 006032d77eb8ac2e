/**
 * Tool dispatch
 *
 * One intent in, one ToolOutcome out, sequentially in the order the model
 * asked. Every gate failure is an ordinary outcome the model can read.
 *
 * Command pipeline:
 *   terminal enabled? → allow-list gate → classifier →
 *     Blocked:  refused
 *     Safe:     executed now
 *     others:   approval queue
 */

import fs from "node:fs";
import { describeError } from "../errors.js";
import { canonicalizePath, isPathAllowed, isSensitivePath, validateCommandPaths } from "../safety/allow-list.js";
import { classifyCommand, requiresApproval, type DangerLevel } from "../safety/classifier.js";
import { executeCommand, type CommandResult, type ExecuteOptions } from "../executor/executor.js";
import type { AuditLogger } from "../skills/audit.js";
import type { SkillRegistry } from "../skills/registry.js";
import { renderSkillOutput } from "../skills/types.js";
import type { ApprovalQueue } from "./approval-queue.js";
import { webSearch, type WebSearchResult } from "./web-search.js";
import type { ToolContext, ToolIntent, ToolOutcome } from "./types.js";

export interface ToolDispatcherDeps {
  approvals: ApprovalQueue;
  skills?: SkillRegistry;
  auditor?: AuditLogger;
  search?: (query: string, signal?: AbortSignal) => Promise<WebSearchResult>;
  execute?: (command: string, options: ExecuteOptions) => Promise<CommandResult>;
  classify?: (command: string) => DangerLevel;
}

function blocked(content: string): ToolOutcome {
  return { content, isError: true };
}

export class ToolDispatcher {
  private readonly approvals: ApprovalQueue;
  private readonly skills?: SkillRegistry;
  private readonly auditor?: AuditLogger;
  private readonly search: (query: string, signal?: AbortSignal) => Promise<WebSearchResult>;
  private readonly execute: (command: string, options: ExecuteOptions) => Promise<CommandResult>;
  private readonly classify: (command: string) => DangerLevel;

  constructor(deps: ToolDispatcherDeps) {
    this.approvals = deps.approvals;
    this.skills = deps.skills;
    this.auditor = deps.auditor;
    this.search = deps.search ?? ((query, signal) => webSearch(query, { signal }));
    this.execute = deps.execute ?? executeCommand;
    this.classify = deps.classify ?? ((command) => classifyCommand(command));
  }

  async dispatch(intent: ToolIntent, ctx: ToolContext): Promise<ToolOutcome> {
    switch (intent.kind) {
      case "search":
        return this.dispatchSearch(intent.query, ctx);
      case "command":
        return this.dispatchCommand(intent.command, ctx);
      case "preview":
        return this.dispatchPreview(intent.path, ctx);
      case "skill":
        return this.dispatchSkill(intent.skillId, intent.query, intent.params, ctx);
    }
  }

  // ============== Search ==============

  private async dispatchSearch(query: string, ctx: ToolContext): Promise<ToolOutcome> {
    if (!ctx.internetEnabled) return blocked("[Search blocked]");
    try {
      const result = await this.search(query, ctx.abortSignal);
      return { label: `[Search Results for '${query}']`, content: result.output, isError: false };
    } catch (err) {
      return blocked(`[Search failed for '${query}']: ${describeError(err)}`);
    }
  }

  // ============== Command ==============

  private async dispatchCommand(command: string, ctx: ToolContext): Promise<ToolOutcome> {
    if (!ctx.terminalEnabled) return blocked("[Command blocked: terminal disabled]");

    const gate = validateCommandPaths(command, ctx.allowList, { cwd: ctx.cwd, homeDir: ctx.homeDir });
    if (!gate.ok) return blocked(`[Command blocked: ${gate.reason}]`);

    const level = this.classify(command);
    if (level === "Blocked") return blocked("[Command blocked for safety]");

    if (requiresApproval(level)) {
      this.approvals.enqueue(command, level);
      return { content: `[Command '${command}' queued for user approval]`, isError: false, queued: { command, level } };
    }

    let result: CommandResult;
    try {
      result = await this.execute(command, {
        timeoutSec: ctx.commandTimeoutSec,
        cwd: ctx.cwd,
        signal: ctx.abortSignal,
      });
    } catch (err) {
      return blocked(`[Command failed: ${describeError(err)}]`);
    }
    return {
      label: `[Command output]\n$ ${command}`,
      content: result.combinedOutput.trim() ? result.combinedOutput : "(no output)",
      isError: !result.success,
      executed: result,
    };
  }

  // ============== Preview ==============

  private async dispatchPreview(target: string, ctx: ToolContext): Promise<ToolOutcome> {
    const gate = { cwd: ctx.cwd, homeDir: ctx.homeDir };
    const canonical = canonicalizePath(target, gate);
    if (isSensitivePath(canonical)) {
      return blocked(`[Preview blocked: path ${target} is a sensitive location]`);
    }
    if (!isPathAllowed(target, ctx.allowList, gate)) {
      return blocked(`[Preview blocked: path ${target} not in allow-list]`);
    }
    let isFile: boolean;
    try {
      isFile = (await fs.promises.stat(canonical)).isFile();
    } catch {
      return blocked(`[Preview failed: file not found: ${target}]`);
    }
    if (!isFile) return blocked(`[Preview failed: ${target} is not a file]`);
    return { content: "File opened in preview panel.", isError: false, preview: canonical };
  }

  // ============== Skill ==============

  private async dispatchSkill(
    skillId: string,
    query: string,
    params: Record<string, unknown>,
    ctx: ToolContext,
  ): Promise<ToolOutcome> {
    if (!this.skills || !this.auditor) return blocked(`[Skill unavailable: ${skillId}]`);

    switch (this.skills.checkPermission(skillId, ctx.mode)) {
      case "not_found":
        return blocked(`[Skill not found: ${skillId}]`);
      case "wrong_mode":
        return blocked(`[Skill '${skillId}' is not available in ${ctx.mode} mode]`);
      case "denied":
        await this.auditor.log({ kind: "skill_exec", skillId, mode: ctx.mode, status: "denied", durationMs: 0 });
        return blocked(`[Skill '${skillId}' is disabled in settings]`);
      case "needs_approval":
        return blocked(`[Skill '${skillId}' needs your approval before it can run]`);
      case "needs_sudo":
        return blocked(`[Skill '${skillId}' needs administrator access]`);
      case "allowed":
        break;
    }

    const execution = await this.skills.execute(
      skillId,
      { query, params },
      {
        workingDir: ctx.cwd,
        allowList: ctx.allowList,
        auditor: this.auditor,
        mode: ctx.mode,
        homeDir: ctx.homeDir,
        signal: ctx.abortSignal,
      },
    );
    if (execution.status !== "completed" || !execution.output) {
      return blocked(`[Skill '${skillId}' failed: ${execution.error ?? execution.status}]`);
    }
    return { label: `[Skill ${skillId}]`, content: renderSkillOutput(execution.output), isError: false };
  }
}
