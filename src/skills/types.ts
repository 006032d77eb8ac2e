/**
 * Skill contract
 *
 * A skill is a named, mode-scoped capability with a typed execute(). The
 * registry gates it by permission level before it runs:
 * - Safe      → runs immediately
 * - Sensitive → needs per-session user approval unless set to Auto
 * - Admin     → additionally needs sudo credentials
 */

import path from "node:path";
import type { Mode } from "../session.js";
import { expandUserPath, type AllowList } from "../safety/allow-list.js";
import type { AuditLogger } from "./audit.js";

export type PermissionLevel = "Safe" | "Sensitive" | "Admin";

export type UserPermission = "Auto" | "Ask" | "Deny";

export interface SkillDescriptor {
  id: string;
  name: string;
  description: string;
  modes: readonly Mode[];
  permissionLevel: PermissionLevel;
}

export interface SkillInput {
  query: string;
  params: Record<string, unknown>;
  contextFiles?: string[];
}

export interface SkillContext {
  workingDir: string;
  allowList: AllowList;
  auditor: AuditLogger;
  mode: Mode;
  homeDir?: string;
  signal?: AbortSignal;
}

export type ResultType = "text" | "files" | "data" | "mixed" | "error";

export type FileAction =
  | { kind: "created" }
  | { kind: "modified" }
  | { kind: "moved"; from: string }
  | { kind: "archived"; to: string };

export interface FileResult {
  path: string;
  action: FileAction;
  preview?: string;
}

export interface Citation {
  text: string;
  url: string;
  accessedAt: string;
  verified: boolean;
}

export interface SuggestedAction {
  label: string;
  skillId: string;
  params: Record<string, unknown>;
}

export interface SkillOutput {
  resultType: ResultType;
  text?: string;
  files?: FileResult[];
  data?: unknown;
  citations?: Citation[];
  suggestedActions?: SuggestedAction[];
}

export interface Skill {
  readonly descriptor: SkillDescriptor;
  execute(input: SkillInput, ctx: SkillContext): Promise<SkillOutput>;
}

export function textOutput(text: string): SkillOutput {
  return { resultType: "text", text };
}

export function errorOutput(text: string): SkillOutput {
  return { resultType: "error", text };
}

export function stringParam(params: Record<string, unknown>, key: string): string | undefined {
  const value = params[key];
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

/** Absolute path for a user-supplied one, relative to the skill's working dir */
export function resolveSkillPath(ctx: SkillContext, input: string): string {
  return path.resolve(ctx.workingDir, expandUserPath(input, ctx.homeDir));
}

/** Flatten an output into tool-result text for the model */
export function renderSkillOutput(output: SkillOutput): string {
  const lines: string[] = [];
  if (output.text) lines.push(output.text);
  for (const file of output.files ?? []) {
    lines.push(`- ${file.path} (${describeFileAction(file.action)})`);
  }
  if (output.data !== undefined && !output.text) {
    lines.push(JSON.stringify(output.data, null, 2));
  }
  for (const citation of output.citations ?? []) {
    lines.push(`[source] ${citation.text}: ${citation.url}`);
  }
  return lines.join("\n");
}

function describeFileAction(action: FileAction): string {
  switch (action.kind) {
    case "created":
      return "created";
    case "modified":
      return "modified";
    case "moved":
      return `moved from ${action.from}`;
    case "archived":
      return `archived to ${action.to}`;
  }
}
