/**
 * Turn runner
 *
 * Pure function: receives every dependency, touches no Agent state.
 *
 * Architecture (EventStream pattern):
 * - Synchronously returns EventStream<TurnEvent, TurnResult>
 * - Internal IIFE drives the loop and pushes typed events via stream.push()
 * - Consumer iterates with for-await, or awaits stream.result()
 *
 * Loop:
 *
 * append user message
 * ├─ ITERATION (at most maxIterations, tools on)
 * │  ├─ budget trim → router.generateStream()
 * │  ├─ intents: structured tool_use chunks, else XML tags in the text
 * │  ├─ no intents → final reply, stop
 * │  ├─ append assistant message (parts on the structured path)
 * │  ├─ dispatch intents sequentially, in order
 * │  ├─ append results (tool_result parts, or joined text)
 * │  └─ done{iteration_reset}
 * └─ cap reached → summary request → one tools-off call → tags stripped
 *
 * Suspension points: each stream chunk (idle watchdog + abort) and each
 * dispatch. Provider errors end the turn; tool failures are results.
 */

import type { EventStream, Tool as PiTool } from "@mariozechner/pi-ai";
import { cancelledError, friendlyErrorMessage, toCoreError } from "./errors.js";
import { createTurnStream, emptyTurnResult, type TurnEvent, type TurnResult } from "./agent-events.js";
import { COMFORT_WINDOW_TOKENS, REPLY_RESERVE_TOKENS, trimConversation } from "./context/budget.js";
import type { ChatRouter, StopReason } from "./provider/router.js";
import { textMessage, type Conversation, type ContentPart, type ToolResultPart, type ToolUsePart } from "./session.js";
import { abortable, withIdleTimeout } from "./tools/abort.js";
import type { ToolDispatcher } from "./tools/dispatch.js";
import { intentFromToolUse, parseTextIntents, stripIntentTags } from "./tools/intents.js";
import { outcomeText, toolNameOf, type ToolContext, type ToolIntent, type ToolOutcome } from "./tools/types.js";

export const MAX_ITERATIONS = 5;
export const IDLE_TIMEOUT_MS = 30_000;
export const SUMMARY_REQUEST = "Summarize what you found so far in plain language. Don't include any command tags.";
export const CANCELLED_TOOL_RESULT = "[Cancelled before this tool ran]";

// ============== Type definitions ==============

export interface TurnLimits {
  maxIterations: number;
  idleTimeoutMs: number;
  replyReserveTokens: number;
  comfortWindowTokens: number;
}

export const DEFAULT_TURN_LIMITS: TurnLimits = {
  maxIterations: MAX_ITERATIONS,
  idleTimeoutMs: IDLE_TIMEOUT_MS,
  replyReserveTokens: REPLY_RESERVE_TOKENS,
  comfortWindowTokens: COMFORT_WINDOW_TOKENS,
};

export interface TurnParams {
  conversation: Conversation;
  userText: string;
  router: ChatRouter;
  dispatcher: ToolDispatcher;
  /** abortSignal here is the turn's cancel handle */
  toolCtx: ToolContext;
  /** Native tool definitions offered to tool-capable providers */
  tools: readonly PiTool[];
  limits?: Partial<TurnLimits>;
}

/** A planned dispatch: the intent, or why the native call could not be mapped */
type PlannedCall = { tool: string; intent: ToolIntent } | { tool: string; blockedReason: string };

interface ModelReply {
  text: string;
  toolUses: ToolUsePart[];
  stopReason: StopReason;
}

// ============== Main loop ==============

export function runTurn(params: TurnParams): EventStream<TurnEvent, TurnResult> {
  const stream = createTurnStream();

  void (async () => {
    const { conversation, userText, router, toolCtx } = params;
    const limits: TurnLimits = { ...DEFAULT_TURN_LIMITS, ...params.limits };
    const signal = toolCtx.abortSignal;
    const result = emptyTurnResult();

    const throwIfCancelled = () => {
      if (signal?.aborted) throw cancelledError();
    };

    /**
     * One model call: trim, stream, forward text deltas, collect tool uses.
     */
    const callModel = async (iteration: number, enableTools: boolean): Promise<ModelReply> => {
      throwIfCancelled();
      const trimmed = trimConversation(conversation.messages, limits.replyReserveTokens, limits.comfortWindowTokens);
      result.budget = trimmed.report;
      stream.push({ type: "budget", iteration, report: trimmed.report });

      const chunks = router.generateStream(trimmed.kept, {
        enableTools,
        tools: enableTools ? [...params.tools] : undefined,
        signal,
      });
      const iterator = chunks[Symbol.asyncIterator]();
      const idleMessage = `The AI service timed out (no data for ${Math.round(limits.idleTimeoutMs / 1000)}s)`;

      let text = "";
      const toolUses: ToolUsePart[] = [];
      while (true) {
        const next = await abortable(withIdleTimeout(iterator.next(), limits.idleTimeoutMs, idleMessage, signal), signal);
        if (next.done) break;
        const chunk = next.value;
        switch (chunk.type) {
          case "text":
            text += chunk.delta;
            stream.push({ type: "text_delta", delta: chunk.delta });
            break;
          case "tool_use_complete":
            toolUses.push({ type: "tool_use", id: chunk.id, name: chunk.name, input: chunk.input });
            break;
          case "done":
            stream.push({ type: "done", stopReason: chunk.stopReason });
            return { text, toolUses, stopReason: chunk.stopReason };
          case "error":
            throw chunk.error;
          default:
            // tool_use_start / tool_input_delta: progress only
            break;
        }
      }
      throwIfCancelled();
      const final = await chunks.result();
      if (!final.ok) throw final.error;
      return { text, toolUses, stopReason: final.stopReason };
    };

    try {
      conversation.append(textMessage("user", userText));
      stream.push({ type: "turn_start", mode: toolCtx.mode, provider: router.activeProvider() });

      for (let iteration = 1; iteration <= limits.maxIterations; iteration++) {
        if (iteration > 1) stream.push({ type: "done", stopReason: "iteration_reset" });

        const reply = await callModel(iteration, true);
        result.iterations = iteration;

        const structured = reply.toolUses.length > 0;
        const planned: PlannedCall[] = structured
          ? reply.toolUses.map((use) => {
              const mapped = intentFromToolUse(use.name, use.input);
              return mapped.ok
                ? { tool: use.name, intent: mapped.intent }
                : { tool: use.name, blockedReason: mapped.reason };
            })
          : parseTextIntents(reply.text).map((intent) => ({ tool: toolNameOf(intent), intent }));

        if (planned.length === 0) {
          conversation.append(textMessage("assistant", reply.text));
          result.finalText = reply.text;
          stream.push({ type: "turn_end", result });
          stream.end(result);
          return;
        }

        if (structured) {
          const parts: ContentPart[] = reply.text ? [{ type: "text", text: reply.text }] : [];
          conversation.append({ role: "assistant", text: reply.text, parts: [...parts, ...reply.toolUses], timestamp: Date.now() });
        } else {
          conversation.append(textMessage("assistant", reply.text));
        }

        const outcomes = await dispatchAll(planned, params, result, stream);

        if (structured) {
          const parts: ToolResultPart[] = reply.toolUses.map((use, i) => {
            const outcome = outcomes[i];
            return {
              type: "tool_result",
              tool_use_id: use.id,
              content: outcome ? outcome.content : CANCELLED_TOOL_RESULT,
              is_error: outcome ? outcome.isError : true,
            };
          });
          conversation.append({
            role: "user",
            text: outcomes.map(outcomeText).join("\n\n"),
            parts,
            timestamp: Date.now(),
          });
        } else if (outcomes.length > 0) {
          conversation.append(textMessage("user", outcomes.map(outcomeText).join("\n\n")));
        }

        // Results are in the transcript; now honour a cancel that arrived mid-dispatch
        throwIfCancelled();
      }

      // ===== Iteration cap: one tools-off summary call =====
      stream.push({ type: "done", stopReason: "iteration_reset" });
      conversation.append(textMessage("user", SUMMARY_REQUEST));
      const summary = await callModel(limits.maxIterations + 1, false);
      const finalText = stripIntentTags(summary.text);
      conversation.append(textMessage("assistant", finalText));
      result.summarized = true;
      result.finalText = finalText;
      stream.push({ type: "turn_end", result });
      stream.end(result);
    } catch (err) {
      const error = signal?.aborted ? cancelledError() : toCoreError(err);
      conversation.flushPendingToolResults(CANCELLED_TOOL_RESULT);
      result.error = friendlyErrorMessage(error);
      stream.push({ type: "turn_error", error: result.error, result });
      stream.end(result);
    }
  })();

  return stream;
}

// ============== Dispatch ==============

/**
 * Run planned calls one at a time, in order. Stops early on cancel; the
 * returned array then holds only the outcomes that were produced.
 */
async function dispatchAll(
  planned: readonly PlannedCall[],
  params: TurnParams,
  result: TurnResult,
  stream: EventStream<TurnEvent, TurnResult>,
): Promise<ToolOutcome[]> {
  const { dispatcher, toolCtx } = params;
  const outcomes: ToolOutcome[] = [];

  for (const call of planned) {
    if (toolCtx.abortSignal?.aborted) break;

    let outcome: ToolOutcome;
    if ("blockedReason" in call) {
      stream.push({ type: "tool_start", tool: call.tool });
      outcome = { content: `[blocked: ${call.blockedReason}]`, isError: true };
    } else {
      stream.push({ type: "tool_start", tool: call.tool, intent: call.intent });
      outcome = await dispatcher.dispatch(call.intent, toolCtx);
    }

    if (outcome.executed) result.executedCommands.push(outcome.executed);
    if (outcome.queued) {
      result.queuedCommands.push(outcome.queued.command);
      stream.push({ type: "approval_queued", command: outcome.queued.command, level: outcome.queued.level });
    }
    if (outcome.preview) {
      result.previewPath = outcome.preview;
      stream.push({ type: "preview", path: outcome.preview });
    }
    stream.push({ type: "tool_result", tool: call.tool, content: outcomeText(outcome), isError: outcome.isError });
    outcomes.push(outcome);
  }
  return outcomes;
}
