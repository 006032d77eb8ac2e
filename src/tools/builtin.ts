/**
 * Built-in Tool Set (native tool-use protocol)
 *
 * Four tools mirror the XML tags one to one:
 * - web_search:   search the web            (<search>)
 * - run_command:  propose a shell command   (<command>)
 * - preview_file: open a file in the panel  (<preview>)
 * - use_skill:    run a registered skill
 *
 * Schemas only: every call is turned into a ToolIntent and goes through the
 * same dispatcher and safety gates as the text protocol.
 */

import { Type, type Tool as PiTool } from "@mariozechner/pi-ai";

export const webSearchTool: PiTool = {
  name: "web_search",
  description: "Search the web and return the top results with titles, snippets and URLs",
  parameters: Type.Object({
    query: Type.String({ description: "Search query" }),
  }),
};

export const runCommandTool: PiTool = {
  name: "run_command",
  description:
    "Run one shell command on the user's machine. Read-only commands run immediately; anything that changes files or the system waits for the user's approval.",
  parameters: Type.Object({
    command: Type.String({ description: "A single command, no chaining with ; && or ||" }),
  }),
};

export const previewFileTool: PiTool = {
  name: "preview_file",
  description: "Open a file from an approved folder in the preview panel",
  parameters: Type.Object({
    path: Type.String({ description: "Absolute or ~/ path of the file" }),
  }),
};

export const useSkillTool: PiTool = {
  name: "use_skill",
  description: "Run one of the skills listed in the system prompt",
  parameters: Type.Object({
    skill_id: Type.String({ description: "Skill id" }),
    query: Type.Optional(Type.String({ description: "What the skill should do" })),
    params: Type.Optional(Type.Record(Type.String(), Type.Unknown(), { description: "Skill-specific parameters" })),
  }),
};

export const BUILTIN_TOOLS: readonly PiTool[] = [webSearchTool, runCommandTool, previewFileTool, useSkillTool];
