/**
 * Tool surface types
 *
 * A ToolIntent is what the model asked for, whichever protocol carried it
 * (native tool_use or XML tags). A ToolOutcome is what goes back into the
 * transcript. Tool-level failures are outcomes, never exceptions.
 */

import type { Mode } from "../session.js";
import type { AllowList } from "../safety/allow-list.js";
import type { CommandResult } from "../executor/executor.js";
import type { DangerLevel } from "../safety/classifier.js";

export type ToolIntent =
  | { kind: "search"; query: string }
  | { kind: "command"; command: string }
  | { kind: "preview"; path: string }
  | { kind: "skill"; skillId: string; query: string; params: Record<string, unknown> };

export type ToolIntentKind = ToolIntent["kind"];

export interface ToolOutcome {
  /** Result body; for the native path this is the tool_result content */
  content: string;
  /** Header shown before content in the XML-path transcript text */
  label?: string;
  isError: boolean;
  /** Set when a command actually ran */
  executed?: CommandResult;
  /** Set when a command was put on the approval queue */
  queued?: { command: string; level: DangerLevel };
  /** Canonical path of a file marked for the preview panel */
  preview?: string;
}

/** Native tool name for an intent */
export function toolNameOf(intent: ToolIntent): string {
  switch (intent.kind) {
    case "search":
      return "web_search";
    case "command":
      return "run_command";
    case "preview":
      return "preview_file";
    case "skill":
      return "use_skill";
  }
}

/** Transcript text of an outcome on the XML path */
export function outcomeText(outcome: ToolOutcome): string {
  return outcome.label ? `${outcome.label}\n${outcome.content}` : outcome.content;
}

export interface ToolContext {
  mode: Mode;
  cwd: string;
  homeDir: string;
  allowList: AllowList;
  terminalEnabled: boolean;
  internetEnabled: boolean;
  commandTimeoutSec: number;
  /** Run-level abort signal */
  abortSignal?: AbortSignal;
}
