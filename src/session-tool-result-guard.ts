/**
 * Tool Result Guard
 *
 * Tracks tool_use ids emitted by assistant messages and checks that every
 * tool-result message answers one of them.
 *
 * - assistant message with tool_use parts → ids become pending
 * - user message with tool_result parts   → must reference pending ids only; clears them
 * - unanswered ids can be flushed as synthetic error results (cancelled turn)
 */

import { CoreError } from "./errors.js";
import type { Message, ToolResultPart } from "./session.js";

export const MISSING_TOOL_RESULT_TEXT = "[Tool result missing: the turn ended before this tool ran]";

export class ToolResultGuard {
  /** tool_use id → tool name */
  private pending = new Map<string, string>();
  private answered = new Set<string>();

  /**
   * Throws when a tool-result message is malformed or references an id that
   * was never issued (or was already answered).
   */
  check(message: Message): void {
    const parts = message.parts ?? [];
    const results = parts.filter((p): p is ToolResultPart => p.type === "tool_result");
    if (results.length === 0) return;

    if (message.role !== "user") {
      throw new CoreError("Internal", `tool results must be carried by a user message, got ${message.role}`);
    }
    if (results.length !== parts.length) {
      throw new CoreError("Internal", "a tool-result message may only carry tool_result parts");
    }
    for (const result of results) {
      if (!this.pending.has(result.tool_use_id)) {
        const state = this.answered.has(result.tool_use_id) ? "already answered" : "unknown";
        throw new CoreError("Internal", `tool result references ${state} tool_use id ${result.tool_use_id}`);
      }
    }
  }

  record(message: Message): void {
    for (const part of message.parts ?? []) {
      if (part.type === "tool_use" && message.role === "assistant") {
        this.pending.set(part.id, part.name);
      } else if (part.type === "tool_result") {
        this.pending.delete(part.tool_use_id);
        this.answered.add(part.tool_use_id);
      }
    }
  }

  pendingIds(): string[] {
    return Array.from(this.pending.keys());
  }

  syntheticResults(reason: string = MISSING_TOOL_RESULT_TEXT): ToolResultPart[] {
    return this.pendingIds().map((id) => ({
      type: "tool_result",
      tool_use_id: id,
      content: reason,
      is_error: true,
    }));
  }

  clear(): void {
    this.pending.clear();
    this.answered.clear();
  }
}
