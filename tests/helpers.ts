/**
 * Shared test fixtures: temp dirs, canned command results and a scripted
 * ChatRouter that replays prepared replies instead of calling a provider.
 */

import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { EventStream } from "@mariozechner/pi-ai";
import type { CommandResult } from "../src/executor/executor.js";
import type { ProviderName } from "../src/provider/models.js";
import type { ProviderError } from "../src/provider/errors.js";
import {
  createChunkStream,
  type ChatRouter,
  type GenerateOptions,
  type GenerateResult,
  type StopReason,
  type StreamChunk,
} from "../src/provider/router.js";
import type { Message } from "../src/session.js";

export function makeTmpDir(prefix: string): string {
  return fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), prefix)));
}

export function commandResult(command: string, output: string, overrides: Partial<CommandResult> = {}): CommandResult {
  return {
    command,
    exitCode: 0,
    stdout: output,
    stderr: "",
    combinedOutput: output,
    durationMs: 1,
    success: true,
    summary: "Complete (1ms)",
    neededSudo: false,
    ...overrides,
  };
}

// ============== Scripted router ==============

export interface ScriptedReply {
  /** Streamed as separate text chunks */
  text?: string[];
  toolUses?: Array<{ id: string; name: string; input: Record<string, unknown> }>;
  stopReason?: StopReason;
  /** Ends the stream with this error instead of done */
  error?: ProviderError;
  /** Never sends anything (idle timeout / cancel tests) */
  hang?: boolean;
}

export interface RecordedCall {
  messages: Message[];
  options: GenerateOptions;
}

export class ScriptedRouter implements ChatRouter {
  readonly calls: RecordedCall[] = [];
  private readonly replies: ScriptedReply[];
  private readonly provider: ProviderName;

  constructor(replies: ScriptedReply[], options: { provider?: ProviderName } = {}) {
    this.replies = [...replies];
    this.provider = options.provider ?? "local";
  }

  activeProvider(): ProviderName | undefined {
    return this.provider;
  }

  supportsNativeTools(name: ProviderName | undefined = this.provider): boolean {
    return name === "anthropic";
  }

  generateStream(messages: readonly Message[], options: GenerateOptions): EventStream<StreamChunk, GenerateResult> {
    this.calls.push({ messages: [...messages], options });
    const out = createChunkStream();
    const reply = this.replies.shift() ?? { text: [""] };
    if (reply.hang) return out;

    for (const delta of reply.text ?? []) {
      if (delta) out.push({ type: "text", delta });
    }
    for (const use of reply.toolUses ?? []) {
      out.push({ type: "tool_use_start", id: use.id, name: use.name });
      out.push({ type: "tool_use_complete", ...use });
    }
    if (reply.error) {
      out.push({ type: "error", error: reply.error });
    } else {
      const stopReason = reply.stopReason ?? ((reply.toolUses?.length ?? 0) > 0 ? "tool_use" : "end_turn");
      out.push({ type: "done", stopReason, provider: this.provider, model: "scripted" });
    }
    out.end();
    return out;
  }
}
