/**
 * Tool intent parsing
 *
 * Two ways in:
 * - text protocol: XML-shaped tags in streamed text (any provider)
 * - structured protocol: native tool_use calls (tool-capable providers)
 *
 * Text tags (case-sensitive names, non-greedy bodies, trimmed on use):
 *   <search>Q</search>
 *   <command>C</command>  <cmd>C</cmd>  <run>C</run>  <request>C</request>
 *   <preview>PATH</preview>  <preview type="file" path="PATH"></preview>
 */

import type { ToolIntent } from "./types.js";

const INTENT_TAG = /<(search|command|cmd|run|request|preview)(\s[^>]*)?>([\s\S]*?)<\/\1>/g;
const THINKING_TAG = /<thinking>[\s\S]*?<\/thinking>/g;
const PATH_ATTRIBUTE = /\bpath\s*=\s*("([^"]*)"|'([^']*)')/;

function intentKey(intent: ToolIntent): string {
  switch (intent.kind) {
    case "search":
      return `search:${intent.query}`;
    case "command":
      return `command:${intent.command}`;
    case "preview":
      return `preview:${intent.path}`;
    case "skill":
      return `skill:${intent.skillId}:${intent.query}:${JSON.stringify(intent.params)}`;
  }
}

function intentFromTag(tag: string, attributes: string, body: string): ToolIntent | undefined {
  const value = body.trim();
  switch (tag) {
    case "search":
      return value ? { kind: "search", query: value } : undefined;
    case "command":
    case "cmd":
    case "run":
    case "request":
      return value ? { kind: "command", command: value } : undefined;
    case "preview": {
      const attr = PATH_ATTRIBUTE.exec(attributes);
      const fromAttr = (attr?.[2] ?? attr?.[3] ?? "").trim();
      const target = fromAttr || value;
      return target ? { kind: "preview", path: target } : undefined;
    }
    default:
      return undefined;
  }
}

/**
 * Extract tool intents from text in document order, dropping exact repeats.
 */
export function parseTextIntents(text: string): ToolIntent[] {
  const intents: ToolIntent[] = [];
  const seen = new Set<string>();
  for (const match of text.matchAll(INTENT_TAG)) {
    const intent = intentFromTag(match[1] ?? "", match[2] ?? "", match[3] ?? "");
    if (!intent) continue;
    const key = intentKey(intent);
    if (seen.has(key)) continue;
    seen.add(key);
    intents.push(intent);
  }
  return intents;
}

/**
 * Remove every recognised tag (with its body) and <thinking> blocks.
 * Parsing the result yields no intents.
 */
export function stripIntentTags(text: string): string {
  return text
    .replace(INTENT_TAG, "")
    .replace(THINKING_TAG, "")
    .split("\n")
    .map((line) => line.trimEnd())
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

// ============== Structured tool calls ==============

export type ToolUseMapping = { ok: true; intent: ToolIntent } | { ok: false; reason: string };

function stringField(input: Record<string, unknown>, key: string): string | undefined {
  const value = input[key];
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Map a native tool call onto an intent; unknown names and malformed
 * inputs come back as a reason for a blocked result.
 */
export function intentFromToolUse(name: string, input: Record<string, unknown>): ToolUseMapping {
  switch (name) {
    case "web_search": {
      const query = stringField(input, "query");
      return query ? { ok: true, intent: { kind: "search", query } } : { ok: false, reason: "web_search needs a 'query' string" };
    }
    case "run_command": {
      const command = stringField(input, "command");
      return command
        ? { ok: true, intent: { kind: "command", command } }
        : { ok: false, reason: "run_command needs a 'command' string" };
    }
    case "preview_file": {
      const target = stringField(input, "path");
      return target
        ? { ok: true, intent: { kind: "preview", path: target } }
        : { ok: false, reason: "preview_file needs a 'path' string" };
    }
    case "use_skill": {
      const skillId = stringField(input, "skill_id");
      if (!skillId) return { ok: false, reason: "use_skill needs a 'skill_id' string" };
      const params = input.params;
      if (params !== undefined && !isRecord(params)) {
        return { ok: false, reason: "use_skill 'params' must be an object" };
      }
      return {
        ok: true,
        intent: { kind: "skill", skillId, query: stringField(input, "query") ?? "", params: params ?? {} },
      };
    }
    default:
      return { ok: false, reason: `unknown tool '${name}'` };
  }
}
