/**
 * Message format conversion: internal Message[] → pi-ai Context
 *
 * pi-ai uses three roles: "user" / "assistant" / "toolResult", and carries
 * the system prompt outside the message list.
 * Internal format: one system message at index 0; tool_result parts are
 * embedded in a user message.
 */

import type { Api, Model } from "@mariozechner/pi-ai";
import type {
  Message as PiMessage,
  TextContent as PiTextContent,
  ToolCall as PiToolCall,
} from "@mariozechner/pi-ai";
import type { Message } from "./session.js";

const EMPTY_USAGE = {
  input: 0,
  output: 0,
  cacheRead: 0,
  cacheWrite: 0,
  totalTokens: 0,
  cost: { input: 0, output: 0, cacheRead: 0, cacheWrite: 0, total: 0 },
};

export type ModelInfo = Pick<Model<Api>, "api" | "provider" | "id">;

/**
 * Convert internal Message[] to pi-ai Message[]
 *
 * Conversion rules:
 * - system → skipped (see splitSystemPrompt)
 * - user/tool without parts → PiUserMessage
 * - user + tool_result parts → one PiToolResultMessage per part
 * - assistant + parts → PiAssistantMessage (tool_use → ToolCall)
 */
export function convertMessagesToPi(messages: readonly Message[], modelInfo: ModelInfo): PiMessage[] {
  const result: PiMessage[] = [];
  // tool_use id → tool name, needed by pi-ai's toolResult message
  const toolNames = new Map<string, string>();

  for (const msg of messages) {
    if (msg.role === "system") continue;

    if (msg.role === "assistant") {
      const piContent: (PiTextContent | PiToolCall)[] = [];
      if (!msg.parts) {
        if (msg.text) piContent.push({ type: "text", text: msg.text });
      } else {
        for (const part of msg.parts) {
          if (part.type === "text" && part.text) {
            piContent.push({ type: "text", text: part.text });
          } else if (part.type === "tool_use") {
            toolNames.set(part.id, part.name);
            piContent.push({ type: "toolCall", id: part.id, name: part.name, arguments: part.input });
          }
        }
      }
      result.push({
        role: "assistant",
        content: piContent,
        api: modelInfo.api,
        provider: modelInfo.provider,
        model: modelInfo.id,
        usage: EMPTY_USAGE,
        stopReason: piContent.some((c) => c.type === "toolCall") ? "toolUse" : "stop",
        timestamp: msg.timestamp,
      });
      continue;
    }

    // user / tool
    if (!msg.parts) {
      result.push({ role: "user", content: msg.text, timestamp: msg.timestamp });
      continue;
    }

    const textParts: PiTextContent[] = [];
    for (const part of msg.parts) {
      if (part.type === "text" && part.text) {
        textParts.push({ type: "text", text: part.text });
      } else if (part.type === "tool_result") {
        result.push({
          role: "toolResult",
          toolCallId: part.tool_use_id,
          toolName: toolNames.get(part.tool_use_id) ?? "",
          content: [{ type: "text", text: part.content }],
          isError: part.is_error ?? false,
          timestamp: msg.timestamp,
        });
      }
    }
    if (textParts.length > 0) {
      result.push({ role: "user", content: textParts, timestamp: msg.timestamp });
    }
  }

  return result;
}

/** System prompt text of a conversation view (the leading system message) */
export function splitSystemPrompt(messages: readonly Message[]): string | undefined {
  const [head] = messages;
  return head && head.role === "system" ? head.text : undefined;
}
