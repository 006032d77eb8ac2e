#!/usr/bin/env node
/**
 * Little Helper terminal host
 *
 * A thin readline shell over the core, standing in for the desktop window.
 *
 * Event consumption:
 * - agent.subscribe() receives typed AgentEvents
 * - streaming text arrives as text_delta, tool activity as tool_start / tool_result
 * - queued commands are listed with /pending and run with /approve <n>
 *
 * Ctrl+C cancels the running turn, or exits when idle.
 */

import "dotenv/config";
import readline from "node:readline";
import { Agent } from "./agent.js";
import type { AgentEvent } from "./agent-events.js";
import { describeDangerLevel } from "./safety/classifier.js";
import { MODES, isMode, type Mode } from "./session.js";
import {
  KNOWN_PROVIDERS,
  SettingsStore,
  applyFirstRunDefaults,
  ensureAllowedDirs,
  loadSettings,
  setPrimaryProvider,
  settingsPath,
} from "./settings.js";
import { modeIntroduction } from "./prompts.js";

// ============== Color output ==============

const colors = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  cyan: "\x1b[36m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  magenta: "\x1b[35m",
};

function color(text: string, c: keyof typeof colors): string {
  return `${colors[c]}${text}${colors.reset}`;
}

function firstLine(text: string, max = 120): string {
  const line = text.split("\n").find((l) => l.trim()) ?? "";
  return line.length > max ? `${line.slice(0, max)}...` : line;
}

// ============== Event printing ==============

function printEvent(event: AgentEvent): void {
  switch (event.type) {
    case "text_delta":
      process.stdout.write(event.delta);
      break;
    case "done":
      if (event.stopReason === "iteration_reset") process.stdout.write("\n");
      break;
    case "tool_start": {
      const detail =
        event.intent?.kind === "command"
          ? event.intent.command
          : event.intent?.kind === "search"
            ? event.intent.query
            : event.intent?.kind === "preview"
              ? event.intent.path
              : event.intent?.kind === "skill"
                ? event.intent.skillId
                : "";
      console.error(color(`\n[tool] ${event.tool}${detail ? ` ${detail}` : ""}`, "yellow"));
      break;
    }
    case "tool_result":
      console.error(color(`[tool] ${event.isError ? "x" : "ok"} ${firstLine(event.content)}`, "dim"));
      break;
    case "approval_queued":
      console.error(color(`[approval needed] ${event.command} (${describeDangerLevel(event.level)})`, "yellow"));
      break;
    case "preview":
      console.error(color(`[preview] ${event.path}`, "cyan"));
      break;
    case "busy":
      console.error(color(`[busy] ${event.mode} is still working; your ${event.waitingMode} message runs next`, "magenta"));
      break;
    case "approval_resolved":
      console.error(color(`[approval] ${event.command}: ${event.outcome}`, event.outcome === "executed" ? "green" : "yellow"));
      break;
    case "turn_error":
      console.error(color(`\n${event.error.message}`, "yellow"));
      if (event.error.kind !== "Cancelled") console.error(color(`  details: ${event.error.details}`, "dim"));
      if (event.error.suggestion) console.error(color(`  suggestion: ${event.error.suggestion}`, "dim"));
      break;
    default:
      break;
  }
}

// ============== Main function ==============

async function main() {
  const args = process.argv.slice(2);
  const store = new SettingsStore(readFlag(args, "--settings") ?? settingsPath());
  const initialMode = readFlag(args, "--mode");
  let mode: Mode = initialMode && isMode(initialMode) ? initialMode : "find";

  if (!loadSettings(store.filePath).fromFile) {
    store.update((settings) => {
      applyFirstRunDefaults(settings, { bundledOpenAiKey: process.env.LH_BUNDLED_OPENAI_KEY });
    });
  } else if (store.snapshot().allowed_dirs.length === 0) {
    store.update((settings) => {
      ensureAllowedDirs(settings);
    });
  }

  const agent = await Agent.create({ settings: store, skillsDir: readFlag(args, "--skills") });
  const unsubscribe = agent.subscribe(printEvent);

  console.log(color("\n Little Helper", "cyan"));
  console.log(color(`Settings: ${store.filePath}`, "dim"));
  console.log(color(`Directory: ${process.cwd()}`, "dim"));
  printModeIntro(mode);
  console.log(color("Type /help for commands, Ctrl+C to cancel or exit\n", "dim"));

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });

  const quit = () => {
    console.log(color("\nGoodbye!", "cyan"));
    unsubscribe();
    rl.close();
    process.exit(0);
  };

  rl.on("SIGINT", () => {
    if (agent.isBusy()) {
      agent.cancel();
      return;
    }
    quit();
  });

  const ask = (question: string) => new Promise<string>((resolve) => rl.question(question, resolve));

  const handleCommand = async (line: string): Promise<void> => {
    const [command = "", ...rest] = line.slice(1).split(/\s+/);
    const arg = rest.join(" ").trim();

    switch (command) {
      case "help":
        console.log(`
Commands:
  /mode <name>   Switch mode (${MODES.join(", ")})
  /pending       List commands waiting for approval
  /approve <n>   Run pending command n
  /deny <n>      Drop pending command n
  /clear         Start this mode's conversation over
  /history       Show this mode's conversation
  /provider <p>  Try provider p first (${KNOWN_PROVIDERS.join(", ")})
  /skills        List skills available in this mode
  /quit          Exit
`);
        break;

      case "mode":
        if (!isMode(arg)) {
          console.log(color(`Unknown mode: ${arg || "(none)"}. Try one of: ${MODES.join(", ")}`, "yellow"));
          break;
        }
        mode = arg;
        printModeIntro(mode);
        break;

      case "pending": {
        const pending = agent.pendingApprovals(mode);
        if (pending.length === 0) {
          console.log(color("Nothing waiting for approval", "dim"));
          break;
        }
        pending.forEach((item, i) => {
          console.log(`  ${i + 1}. ${item.command} ${color(`(${describeDangerLevel(item.level)})`, "dim")}`);
        });
        break;
      }

      case "approve": {
        const item = pendingAt(agent, mode, arg);
        if (!item) {
          console.log(color("Usage: /approve <n> (see /pending)", "yellow"));
          break;
        }
        let outcome = await agent.approveCommand(mode, item.command);
        if (outcome.status === "needs_password") {
          const password = await ask("Password (sudo): ");
          // Hide the echoed password line
          readline.moveCursor(process.stdout, 0, -1);
          readline.clearLine(process.stdout, 0);
          outcome = await agent.approveCommand(mode, item.command, { password });
        }
        switch (outcome.status) {
          case "executed":
            console.log(color(outcome.result.summary, outcome.result.success ? "green" : "yellow"));
            if (outcome.result.combinedOutput.trim()) console.log(outcome.result.combinedOutput);
            break;
          case "failed":
          case "refused":
            console.log(color(`Not run: ${outcome.reason}`, "yellow"));
            break;
          case "needs_password":
            console.log(color("A password is needed to run this command", "yellow"));
            break;
        }
        break;
      }

      case "deny": {
        const item = pendingAt(agent, mode, arg);
        if (!item || !agent.denyCommand(mode, item.command)) {
          console.log(color("Usage: /deny <n> (see /pending)", "yellow"));
        }
        break;
      }

      case "provider": {
        if (!KNOWN_PROVIDERS.includes(arg)) {
          console.log(color(`Unknown provider: ${arg || "(none)"}. Try one of: ${KNOWN_PROVIDERS.join(", ")}`, "yellow"));
          break;
        }
        const updated = store.update((settings) => {
          setPrimaryProvider(settings, arg);
        });
        console.log(color(`Provider order: ${updated.model.provider_preference.join(" → ")}`, "green"));
        break;
      }

      case "clear":
        agent.reset(mode);
        console.log(color(`${mode} conversation cleared`, "green"));
        break;

      case "history": {
        const history = agent.history(mode).filter((m) => m.role !== "system");
        if (history.length === 0) {
          console.log(color("No history", "dim"));
          break;
        }
        for (const msg of history) {
          const role = msg.role === "user" ? "You" : "Helper";
          console.log(`${color(`${role}:`, role === "You" ? "green" : "blue")} ${firstLine(msg.text, 100)}`);
        }
        break;
      }

      case "skills": {
        const skills = agent.getSkills()?.forMode(mode) ?? [];
        if (skills.length === 0) {
          console.log(color(`No skills in ${mode} mode`, "dim"));
          break;
        }
        for (const s of skills) {
          console.log(`  ${s.id} ${color(`[${s.permissionLevel}, ${s.userPermission}]`, "dim")} ${s.description}`);
        }
        break;
      }

      case "quit":
      case "exit":
        quit();
        break;

      default:
        console.log(color(`Unknown command: ${command}`, "yellow"));
    }
  };

  while (true) {
    const input = (await ask(color(`${mode}> `, "green"))).trim();
    if (!input) continue;

    if (input.startsWith("/")) {
      await handleCommand(input);
      continue;
    }

    process.stdout.write(color("\nHelper: ", "blue"));
    const result = await agent.send(mode, input);
    const parts = [
      `iterations=${result.iterations}`,
      `ran=${result.executedCommands.length}`,
      `queued=${result.queuedCommands.length}`,
      result.summarized ? "summarized" : "",
      result.budget ? `tokens≈${result.budget.promptTokensEst}` : "",
    ].filter(Boolean);
    console.log(color(`\n\n  [${parts.join(", ")}]`, "dim"));
    if (result.queuedCommands.length > 0) {
      console.log(color("  Use /pending and /approve <n> to run queued commands", "dim"));
    }
    console.log();
  }
}

function printModeIntro(mode: Mode): void {
  const intro = modeIntroduction(mode);
  console.log(color(`${intro.name} (${intro.title} mode): ${intro.greeting}`, "cyan"));
}

function pendingAt(agent: Agent, mode: Mode, arg: string) {
  const index = Number.parseInt(arg, 10) - 1;
  return Number.isNaN(index) ? undefined : agent.pendingApprovals(mode)[index];
}

function readFlag(args: string[], name: string): string | undefined {
  const idx = args.findIndex((arg) => arg === name);
  if (idx === -1) {
    return undefined;
  }
  const next = args[idx + 1];
  if (!next || next.startsWith("--")) {
    return undefined;
  }
  return next.trim() || undefined;
}

main().catch((err) => {
  console.error("Startup failed:", err);
  process.exit(1);
});
