/**
 * Conversation model
 *
 * - Message.text is the plain text of the message; parts carries structured
 *   fragments for tool-use capable providers
 * - A Conversation begins with exactly one system message and is append-only;
 *   trimming produces a view for the provider and never mutates the conversation
 * - Tool results must answer earlier tool_use ids (enforced by ToolResultGuard)
 */

import { MISSING_TOOL_RESULT_TEXT, ToolResultGuard } from "./session-tool-result-guard.js";

export type Role = "system" | "user" | "assistant" | "tool";

export type Mode = "find" | "fix" | "research" | "data" | "content" | "build";

export const MODES: readonly Mode[] = ["find", "fix", "research", "data", "content", "build"];

export function isMode(value: string): value is Mode {
  return MODES.some((m) => m === value);
}

export type TextPart = { type: "text"; text: string };
export type ToolUsePart = { type: "tool_use"; id: string; name: string; input: Record<string, unknown> };
export type ToolResultPart = { type: "tool_result"; tool_use_id: string; content: string; is_error?: boolean };

export type ContentPart = TextPart | ToolUsePart | ToolResultPart;

export interface Message {
  role: Role;
  text: string;
  parts?: ContentPart[];
  timestamp: number;
}

export function textMessage(role: Role, text: string): Message {
  return { role, text, timestamp: Date.now() };
}

export function isToolResultMessage(msg: Message): boolean {
  return msg.role === "user" && !!msg.parts && msg.parts.length > 0 && msg.parts.every((p) => p.type === "tool_result");
}

export function toolUsesOf(msg: Message): ToolUsePart[] {
  if (msg.role !== "assistant" || !msg.parts) return [];
  return msg.parts.filter((p): p is ToolUsePart => p.type === "tool_use");
}

export function toolResultsOf(msg: Message): ToolResultPart[] {
  if (!msg.parts) return [];
  return msg.parts.filter((p): p is ToolResultPart => p.type === "tool_result");
}

// ============== Conversation ==============

export class Conversation {
  readonly mode: Mode;
  private readonly items: Message[];
  private readonly guard = new ToolResultGuard();

  private constructor(mode: Mode, system: Message) {
    this.mode = mode;
    this.items = [system];
  }

  static create(mode: Mode, systemPrompt: string): Conversation {
    return new Conversation(mode, textMessage("system", systemPrompt));
  }

  get messages(): readonly Message[] {
    return this.items;
  }

  get length(): number {
    return this.items.length;
  }

  get systemPrompt(): string {
    return this.items[0]?.text ?? "";
  }

  /** Replace the system message text; index 0 is the only slot ever rewritten */
  setSystemPrompt(text: string): void {
    this.items[0] = textMessage("system", text);
  }

  append(message: Message): void {
    if (message.role === "system") {
      throw new Error("Conversation already has a system message");
    }
    if (!isToolResultMessage(message) && this.guard.pendingIds().length > 0) {
      this.flushPendingToolResults(MISSING_TOOL_RESULT_TEXT);
    }
    this.guard.check(message);
    this.items.push(message);
    this.guard.record(message);
  }

  pendingToolUseIds(): string[] {
    return this.guard.pendingIds();
  }

  /**
   * Answer every unanswered tool_use with a synthetic error result so the
   * transcript stays valid for tool-use providers (e.g. after a cancel).
   */
  flushPendingToolResults(reason: string): void {
    const results = this.guard.syntheticResults(reason);
    if (results.length === 0) return;
    this.append({
      role: "user",
      text: results.map((r) => r.content).join("\n"),
      parts: results,
      timestamp: Date.now(),
    });
  }

  /** Drop everything but the system message */
  reset(): void {
    this.items.splice(1);
    this.guard.clear();
  }
}
