/**
 * Tool Policy
 *
 * Three-tier CompiledPattern design:
 * - "all"   → "*" matches everything, short-circuit return
 * - "exact" → no wildcards, direct string comparison, zero RegExp overhead
 * - "regex" → contains * wildcards, compiled into a safe RegExp
 *
 * Escape chain (regex branch only):
 *   1. First escape all regex special characters: "web*" → "web\*"
 *   2. Then replace "\*" (escaped wildcard) with ".*": "web\*" → "web.*"
 *   3. Add start/end anchors: "^web.*$"
 *   Effect: . ( ) etc. are literals; only * acts as wildcard
 *
 * Disabled capabilities (terminal off, internet off) become deny entries, so
 * the model is never offered a tool it cannot use.
 */

import type { Tool as PiTool } from "@mariozechner/pi-ai";

export type ToolPolicy = {
  allow?: string[];
  deny?: string[];
};

// ============== Three-tier compilation modes ==============

type CompiledPattern =
  | { kind: "all" }
  | { kind: "exact"; value: string }
  | { kind: "regex"; value: RegExp };

/**
 * Tool name normalization
 *
 * - bash / exec / shell → run_command
 * - search → web_search
 * - preview → preview_file
 */
function normalizeToolName(name: string): string {
  const trimmed = name.trim().toLowerCase().replaceAll("-", "_");
  if (trimmed === "bash" || trimmed === "exec" || trimmed === "shell") return "run_command";
  if (trimmed === "search") return "web_search";
  if (trimmed === "preview") return "preview_file";
  return trimmed;
}

function compilePattern(pattern: string): CompiledPattern {
  const normalized = normalizeToolName(pattern);
  if (!normalized) {
    return { kind: "exact", value: "" };
  }
  if (normalized === "*") {
    return { kind: "all" };
  }
  if (!normalized.includes("*")) {
    return { kind: "exact", value: normalized };
  }
  const escaped = normalized.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  const regex = `^${escaped.replaceAll("\\*", ".*")}$`;
  return { kind: "regex", value: new RegExp(regex) };
}

function compilePatterns(patterns: string[]): CompiledPattern[] {
  return patterns.map(compilePattern);
}

function matchesAny(name: string, patterns: CompiledPattern[]): boolean {
  for (const pattern of patterns) {
    if (pattern.kind === "all") return true;
    if (pattern.kind === "exact" && name === pattern.value) return true;
    if (pattern.kind === "regex" && pattern.value.test(name)) return true;
  }
  return false;
}

function isAllowedBy(normalized: string, deny: CompiledPattern[], allow: CompiledPattern[]): boolean {
  if (matchesAny(normalized, deny)) return false;
  if (allow.length === 0) return true;
  return matchesAny(normalized, allow);
}

// ============== Public API ==============

/**
 * Check if a tool is allowed by policy
 *
 * Evaluation order:
 * 1. deny takes priority
 * 2. allow is empty: allow everything
 * 3. allow matches: explicitly allowed
 * 4. Default: reject
 */
export function isToolAllowed(name: string, policy?: ToolPolicy): boolean {
  if (!policy) return true;
  return isAllowedBy(normalizeToolName(name), compilePatterns(policy.deny ?? []), compilePatterns(policy.allow ?? []));
}

export function filterToolsByPolicy(tools: readonly PiTool[], policy?: ToolPolicy): PiTool[] {
  if (!policy) return [...tools];
  // Pre-compile once for the whole list
  const deny = compilePatterns(policy.deny ?? []);
  const allow = compilePatterns(policy.allow ?? []);
  return tools.filter((tool) => isAllowedBy(normalizeToolName(tool.name), deny, allow));
}

/**
 * Merge a base policy with the deny entries implied by disabled capabilities.
 */
export function policyForCapabilities(
  capabilities: { terminalEnabled: boolean; internetEnabled: boolean },
  base?: ToolPolicy,
): ToolPolicy {
  const deny = [...(base?.deny ?? [])];
  if (!capabilities.terminalEnabled) deny.push("run_command");
  if (!capabilities.internetEnabled) deny.push("web_search");
  return { ...(base?.allow ? { allow: base.allow } : {}), deny };
}
