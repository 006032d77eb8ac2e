/**
 * Command Safety Classifier
 *
 * Static prefix/substring classification of a shell command string.
 * Evaluation order (first match wins):
 *   1. Blocked substring anywhere      → Blocked
 *   2. "sudo " prefix                  → NeedsSudo
 *   3. Dangerous prefix or " token "   → Dangerous
 *   4. NeedsConfirmation prefix        → NeedsConfirmation
 *   5. Safe prefix                     → Safe
 *   6. anything else                   → NeedsConfirmation
 *
 * Pattern tables live in data/command-rules.json and are lowercased on load,
 * so classification is case-insensitive on both sides.
 */

import fs from "node:fs";
import { z } from "zod";

export type DangerLevel = "Safe" | "NeedsConfirmation" | "Dangerous" | "NeedsSudo" | "Blocked";

const CommandRulesSchema = z.object({
  blocked: z.array(z.string()),
  dangerous: z.array(z.string()),
  needsConfirmation: z.array(z.string()),
  safe: z.array(z.string()),
});

export type CommandRules = z.infer<typeof CommandRulesSchema>;

const RULES_URL = new URL("../../data/command-rules.json", import.meta.url);

let defaultRules: CommandRules | undefined;

function normalizeRules(rules: CommandRules): CommandRules {
  const lower = (list: string[]) => list.map((p) => p.trim().toLowerCase()).filter(Boolean);
  return {
    blocked: lower(rules.blocked),
    dangerous: lower(rules.dangerous),
    needsConfirmation: lower(rules.needsConfirmation),
    safe: lower(rules.safe),
  };
}

export function loadCommandRules(): CommandRules {
  if (!defaultRules) {
    const raw: unknown = JSON.parse(fs.readFileSync(RULES_URL, "utf-8"));
    defaultRules = normalizeRules(CommandRulesSchema.parse(raw));
  }
  return defaultRules;
}

/** Build a rule set from custom tables (tests, embedders) */
export function createCommandRules(rules: CommandRules): CommandRules {
  return normalizeRules(CommandRulesSchema.parse(rules));
}

// ============== Matching ==============

/**
 * Prefix match on a token boundary.
 *
 * "ls" matches "ls", "ls -la" but not "lsblk"; patterns that already end in a
 * non-word character ("get-", `powershell -c "get-`) match as plain prefixes.
 */
function startsWithToken(cmd: string, prefix: string): boolean {
  if (!cmd.startsWith(prefix)) return false;
  if (cmd.length === prefix.length) return true;
  if (!/[a-z0-9_]$/.test(prefix)) return true;
  return /\s/.test(cmd.charAt(prefix.length));
}

/**
 * Whitespace-delimited occurrence: preceded by whitespace, followed by
 * whitespace or end of string.
 */
function containsToken(cmd: string, token: string): boolean {
  let from = 0;
  while (true) {
    const idx = cmd.indexOf(token, from);
    if (idx === -1) return false;
    const before = idx === 0 ? "" : cmd.charAt(idx - 1);
    const afterIdx = idx + token.length;
    const after = afterIdx >= cmd.length ? "" : cmd.charAt(afterIdx);
    if (/\s/.test(before) && (after === "" || /\s/.test(after))) return true;
    from = idx + 1;
  }
}

// ============== Public API ==============

export function classifyCommand(command: string, rules: CommandRules = loadCommandRules()): DangerLevel {
  const cmd = command.trim().toLowerCase();

  if (rules.blocked.some((p) => cmd.includes(p))) return "Blocked";
  if (cmd.startsWith("sudo ")) return "NeedsSudo";
  if (rules.dangerous.some((p) => startsWithToken(cmd, p) || containsToken(cmd, p))) return "Dangerous";
  if (rules.needsConfirmation.some((p) => startsWithToken(cmd, p))) return "NeedsConfirmation";
  if (rules.safe.some((p) => startsWithToken(cmd, p))) return "Safe";
  return "NeedsConfirmation";
}

export function requiresApproval(level: DangerLevel): boolean {
  return level === "NeedsConfirmation" || level === "Dangerous" || level === "NeedsSudo";
}

export function describeDangerLevel(level: DangerLevel): string {
  switch (level) {
    case "Safe":
      return "Read-only command";
    case "NeedsConfirmation":
      return "Changes files or settings; needs your OK";
    case "Dangerous":
      return "Can delete data or stop programs; review carefully";
    case "NeedsSudo":
      return "Needs administrator password";
    case "Blocked":
      return "Blocked for safety";
  }
}
