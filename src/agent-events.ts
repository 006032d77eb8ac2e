/**
 * Turn event type definitions
 *
 * Based on the EventStream<T, R> generic from pi-ai: runTurn() returns a
 * stream synchronously and pushes typed events from an async IIFE.
 *
 * Event flow (three layers):
 *   Layer 1: agent-loop → stream.push(TurnEvent) → EventStream queue
 *   Layer 2: Agent.send() → for await (event of stream) → consume events
 *   Layer 3: Agent.emit(event) → listeners → subscribers (CLI, GUI shell)
 */

import { EventStream } from "@mariozechner/pi-ai";
import type { Mode } from "./session.js";
import type { BudgetReport } from "./context/budget.js";
import type { StopReason } from "./provider/router.js";
import type { CommandResult } from "./executor/executor.js";
import type { ToolIntent } from "./tools/types.js";
import type { DangerLevel } from "./safety/classifier.js";
import type { FriendlyError } from "./errors.js";

// ============== Event types (discriminated union) ==============

/**
 * Turn event
 *
 * - Lifecycle: turn_start → turn_end | turn_error
 * - Per model call: budget → text_delta* → done
 *   (done{iteration_reset} tells the UI to clear its partial buffer)
 * - Tools: tool_start → tool_result, plus approval_queued / preview
 */
export type TurnEvent =
  | { type: "turn_start"; mode: Mode; provider?: string }
  | { type: "budget"; iteration: number; report: BudgetReport }
  | { type: "text_delta"; delta: string }
  | { type: "done"; stopReason: StopReason }
  | { type: "tool_start"; tool: string; intent?: ToolIntent }
  | { type: "tool_result"; tool: string; content: string; isError: boolean }
  | { type: "approval_queued"; command: string; level: DangerLevel }
  | { type: "preview"; path: string }
  | { type: "turn_end"; result: TurnResult }
  | { type: "turn_error"; error: FriendlyError; result: TurnResult };

/**
 * Host-level events: everything a turn emits, plus lane and approval state
 */
export type AgentEvent =
  | (TurnEvent & { mode: Mode })
  | { type: "busy"; mode: Mode; waitingMode: Mode }
  | { type: "approval_resolved"; mode: Mode; command: string; outcome: "executed" | "denied" | "refused" | "failed"; result?: CommandResult };

// ============== Result type ==============

export interface TurnResult {
  finalText: string;
  /** Model calls made with tools enabled */
  iterations: number;
  /** The iteration cap forced a tools-off summary call */
  summarized: boolean;
  executedCommands: CommandResult[];
  queuedCommands: string[];
  previewPath?: string;
  budget?: BudgetReport;
  error?: FriendlyError;
}

export function emptyTurnResult(): TurnResult {
  return { finalText: "", iterations: 0, summarized: false, executedCommands: [], queuedCommands: [] };
}

// ============== Factory function ==============

/**
 * turn_end and turn_error are terminal and carry the full result
 */
export function createTurnStream(): EventStream<TurnEvent, TurnResult> {
  return new EventStream<TurnEvent, TurnResult>(
    (event) => event.type === "turn_end" || event.type === "turn_error",
    (event) => {
      if (event.type === "turn_end" || event.type === "turn_error") {
        return event.result;
      }
      return emptyTurnResult();
    },
  );
}
