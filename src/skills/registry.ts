/**
 * Skill Registry
 *
 * Catalog of skills indexed by id and filtered by mode, plus the permission
 * state the host mutates:
 * - user permission per skill (Auto / Ask / Deny); defaults follow the
 *   permission level: Safe → Auto, Sensitive → Ask, Admin → Ask
 * - session approvals for Ask skills (cleared on reset)
 *
 * execute() checks nothing by itself beyond existence; callers run
 * checkPermission() first and decide how to ask the user.
 */

import { randomUUID } from "node:crypto";
import { describeError } from "../errors.js";
import type { Mode } from "../session.js";
import type {
  PermissionLevel,
  Skill,
  SkillContext,
  SkillDescriptor,
  SkillInput,
  SkillOutput,
  UserPermission,
} from "./types.js";

export const DEFAULT_SKILL_TIMEOUT_MS = 60_000;

export type PermissionCheck = "allowed" | "needs_approval" | "needs_sudo" | "denied" | "not_found" | "wrong_mode";

export interface SkillExecution {
  id: string;
  skillId: string;
  mode: Mode;
  timestamp: number;
  status: "running" | "completed" | "failed" | "timeout";
  durationMs: number;
  error?: string;
  output?: SkillOutput;
}

export interface SkillInfo extends SkillDescriptor {
  userPermission: UserPermission;
}

function defaultPermission(level: PermissionLevel): UserPermission {
  return level === "Safe" ? "Auto" : "Ask";
}

export class SkillRegistry {
  private skills = new Map<string, Skill>();
  private permissions = new Map<string, UserPermission>();
  private sessionApprovals = new Set<string>();

  register(skill: Skill): void {
    const { id, permissionLevel } = skill.descriptor;
    if (!this.permissions.has(id)) {
      this.permissions.set(id, defaultPermission(permissionLevel));
    }
    this.skills.set(id, skill);
  }

  get(id: string): Skill | undefined {
    return this.skills.get(id);
  }

  list(): SkillInfo[] {
    return [...this.skills.values()].map((skill) => this.info(skill));
  }

  forMode(mode: Mode): SkillInfo[] {
    return this.list().filter((info) => info.modes.includes(mode));
  }

  userPermission(id: string): UserPermission {
    return this.permissions.get(id) ?? "Ask";
  }

  /** Returns the previous permission */
  setUserPermission(id: string, permission: UserPermission): UserPermission {
    const previous = this.userPermission(id);
    this.permissions.set(id, permission);
    return previous;
  }

  approveForSession(id: string): void {
    this.sessionApprovals.add(id);
  }

  isSessionApproved(id: string): boolean {
    return this.sessionApprovals.has(id);
  }

  clearSessionApprovals(): void {
    this.sessionApprovals.clear();
  }

  checkPermission(id: string, mode: Mode, options: { hasSudoCredentials?: boolean } = {}): PermissionCheck {
    const skill = this.skills.get(id);
    if (!skill) return "not_found";
    if (!skill.descriptor.modes.includes(mode)) return "wrong_mode";

    const permission = this.userPermission(id);
    if (permission === "Deny") return "denied";

    const level = skill.descriptor.permissionLevel;
    if (level === "Safe") return "allowed";
    if (permission === "Ask" && !this.sessionApprovals.has(id)) return "needs_approval";
    if (level === "Admin" && !options.hasSudoCredentials) return "needs_sudo";
    return "allowed";
  }

  /**
   * Run a skill with a timeout and write an audit entry. Failures come back
   * as a failed execution, never as a rejection.
   */
  async execute(
    id: string,
    input: SkillInput,
    ctx: SkillContext,
    options: { timeoutMs?: number } = {},
  ): Promise<SkillExecution> {
    const execution: SkillExecution = {
      id: randomUUID(),
      skillId: id,
      mode: ctx.mode,
      timestamp: Date.now(),
      status: "running",
      durationMs: 0,
    };
    const skill = this.skills.get(id);
    if (!skill) {
      return { ...execution, status: "failed", error: `Skill not found: ${id}` };
    }

    const timeoutMs = options.timeoutMs ?? DEFAULT_SKILL_TIMEOUT_MS;
    const start = Date.now();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<"timeout">((resolve) => {
      timer = setTimeout(() => resolve("timeout"), timeoutMs);
    });

    let finished: SkillExecution;
    try {
      const outcome = await Promise.race([skill.execute(input, ctx), timeout]);
      const durationMs = Date.now() - start;
      if (outcome === "timeout") {
        finished = { ...execution, status: "timeout", durationMs, error: `Skill timed out after ${timeoutMs}ms` };
      } else if (outcome.resultType === "error") {
        finished = { ...execution, status: "failed", durationMs, error: outcome.text, output: outcome };
      } else {
        finished = { ...execution, status: "completed", durationMs, output: outcome };
      }
    } catch (err) {
      finished = { ...execution, status: "failed", durationMs: Date.now() - start, error: describeError(err) };
    } finally {
      clearTimeout(timer);
    }

    await ctx.auditor.log({
      kind: "skill_exec",
      skillId: id,
      mode: ctx.mode,
      status: finished.status === "running" ? "failed" : finished.status,
      durationMs: finished.durationMs,
      ...(finished.error ? { error: finished.error } : {}),
    });
    return finished;
  }

  private info(skill: Skill): SkillInfo {
    return { ...skill.descriptor, userPermission: this.userPermission(skill.descriptor.id) };
  }
}
