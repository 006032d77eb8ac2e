/**
 * Context / token budget
 *
 * Cheap, monotone heuristic: one token per ~4 characters (minimum 1).
 *
 * Trimming policy:
 * - comfort window 8000 tokens, 2000 reserved for the reply → 6000 for the prompt
 * - the system message is always kept at index 0
 * - walk newest → oldest, stop at the first message that would overflow
 *   (never skip one and keep older ones)
 * - a leading tool-result message whose tool_use was trimmed away is dropped too
 */

import { isToolResultMessage, type Message } from "../session.js";

export const COMFORT_WINDOW_TOKENS = 8_000;
export const REPLY_RESERVE_TOKENS = 2_000;

export interface BudgetReport {
  totalTokensIn: number;
  droppedMessages: number;
  promptTokensEst: number;
  replyTokensEst: number;
}

export interface TrimResult {
  kept: Message[];
  droppedCount: number;
  usedTokens: number;
  report: BudgetReport;
}

export function estimateTokens(text: string): number {
  return Math.max(1, Math.ceil(text.length / 4));
}

export function estimateMessageTokens(message: Message): number {
  let total = estimateTokens(message.text);
  for (const part of message.parts ?? []) {
    if (part.type === "tool_use") {
      total += estimateTokens(`${part.name}${JSON.stringify(part.input)}`);
    }
  }
  return total;
}

export function estimateMessagesTokens(messages: readonly Message[]): number {
  return messages.reduce((sum, msg) => sum + estimateMessageTokens(msg), 0);
}

export function trimConversation(
  messages: readonly Message[],
  replyReserve: number = REPLY_RESERVE_TOKENS,
  comfortWindow: number = COMFORT_WINDOW_TOKENS,
): TrimResult {
  const budget = Math.max(0, comfortWindow - replyReserve);
  const totalTokensIn = estimateMessagesTokens(messages);

  const [head, ...rest] = messages;
  const system = head && head.role === "system" ? head : undefined;
  const history = system ? rest : [...messages];

  let used = system ? estimateMessageTokens(system) : 0;
  const tail: Message[] = [];
  for (let i = history.length - 1; i >= 0; i--) {
    const msg = history[i];
    if (!msg) break;
    const cost = estimateMessageTokens(msg);
    if (used + cost > budget) break;
    used += cost;
    tail.push(msg);
  }
  tail.reverse();

  // An orphaned tool result cannot be sent without its tool_use
  while (tail.length > 0 && tail[0] && isToolResultMessage(tail[0])) {
    used -= estimateMessageTokens(tail[0]);
    tail.shift();
  }

  const kept = system ? [system, ...tail] : tail;
  const droppedCount = messages.length - kept.length;
  return {
    kept,
    droppedCount,
    usedTokens: used,
    report: {
      totalTokensIn,
      droppedMessages: droppedCount,
      promptTokensEst: used,
      replyTokensEst: replyReserve,
    },
  };
}
