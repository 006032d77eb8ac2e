/**
 * Path Allow-List Gate
 *
 * Validates that every path-looking token of a proposed command lies inside
 * one of the user-approved directories.
 *
 * Checks, in order (first violation wins):
 * - shell chaining / substitution outside quotes (; && || & ` $( <<), pipes and 2>&1 are fine
 * - whole-environment dumps (env, printenv)
 * - per path token: sensitive credential locations, then allow-list ancestry
 *
 * Canonical form: "~" expanded, made absolute against the working dir, then the
 * nearest existing ancestor is realpath'd so symlinks cannot escape the list.
 */

import fs from "node:fs";
import os from "node:os";
import path from "node:path";

/** Ordered set of canonical directory paths */
export type AllowList = readonly string[];

export type GateResult = { ok: true } | { ok: false; reason: string };

export interface GateOptions {
  /** Base for relative paths (default: process.cwd()) */
  cwd?: string;
  /** Home directory used for "~" (default: os.homedir()) */
  homeDir?: string;
}

// ============== Path helpers ==============

export function expandUserPath(input: string, homeDir: string = os.homedir()): string {
  if (input === "~") return homeDir;
  if (input.startsWith("~/") || input.startsWith("~\\")) {
    return path.join(homeDir, input.slice(2));
  }
  return input;
}

/**
 * Canonicalize a possibly non-existent path: realpath the nearest existing
 * ancestor and re-append the missing tail.
 */
export function canonicalizePath(input: string, options?: GateOptions): string {
  const expanded = expandUserPath(input, options?.homeDir);
  const absolute = path.resolve(options?.cwd ?? process.cwd(), expanded);

  const tail: string[] = [];
  let current = absolute;
  while (true) {
    try {
      const real = fs.realpathSync.native(current);
      return tail.length > 0 ? path.join(real, ...tail.reverse()) : real;
    } catch {
      const parent = path.dirname(current);
      if (parent === current) return absolute;
      tail.push(path.basename(current));
      current = parent;
    }
  }
}

export function createAllowList(dirs: readonly string[], options?: GateOptions): AllowList {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const dir of dirs) {
    const trimmed = dir.trim();
    if (!trimmed) continue;
    const canonical = canonicalizePath(trimmed, options);
    if (seen.has(canonical)) continue;
    seen.add(canonical);
    result.push(canonical);
  }
  return result;
}

function isAncestor(ancestor: string, candidate: string): boolean {
  if (candidate === ancestor) return true;
  const rel = path.relative(ancestor, candidate);
  return rel !== "" && !rel.startsWith("..") && !path.isAbsolute(rel);
}

export function isPathAllowed(input: string, allowList: AllowList, options?: GateOptions): boolean {
  if (allowList.length === 0) return false;
  const canonical = canonicalizePath(input, options);
  return allowList.some((dir) => isAncestor(dir, canonical));
}

const SENSITIVE_SEGMENTS = ["/.ssh/", "/.aws/", "/.gnupg/", "/library/keychains"];
const SENSITIVE_SUFFIXES = ["/.ssh", "/.aws", "/.gnupg", "/.npmrc", "/.env"];

export function isSensitivePath(input: string): boolean {
  const s = input.replaceAll("\\", "/").toLowerCase();
  return (
    SENSITIVE_SEGMENTS.some((seg) => s.includes(seg)) ||
    SENSITIVE_SUFFIXES.some((suffix) => s.endsWith(suffix))
  );
}

// ============== Command scanning ==============

/**
 * Return the first shell operator that chains or substitutes commands,
 * ignoring anything inside single or double quotes.
 */
export function findForbiddenShellOperator(command: string): string | undefined {
  let inSingle = false;
  let inDouble = false;
  let prev = "";

  for (let i = 0; i < command.length; i++) {
    const c = command.charAt(i);
    const next = command.charAt(i + 1);

    if (c === "\\") {
      i++;
      prev = c;
      continue;
    }
    if (!inDouble && c === "'") {
      inSingle = !inSingle;
      prev = c;
      continue;
    }
    if (!inSingle && c === '"') {
      inDouble = !inDouble;
      prev = c;
      continue;
    }
    if (inSingle || inDouble) {
      prev = c;
      continue;
    }

    if (c === ";") return ";";
    if (c === "&") {
      if (next === "&") return "&&";
      // 2>&1 style descriptor duplication
      const isDup = prev === ">" || (/[0-9]/.test(prev) && next === ">");
      if (!isDup) return "&";
    }
    if (c === "|" && next === "|") return "||";
    if (c === "`") return "`";
    if (c === "$" && next === "(") return "$(";
    if (c === "<" && next === "<") return "<<";

    prev = c;
  }
  return undefined;
}

function isEnvironmentDump(command: string): boolean {
  const cmd = command.trim().toLowerCase();
  return cmd === "env" || cmd.startsWith("env ") || cmd === "printenv" || cmd === "set";
}

/**
 * Clean a raw whitespace token down to the path it names:
 * quotes, redirect prefixes and a key= prefix are stripped, globs are cut back
 * to their last directory.
 */
export function cleanPathToken(token: string): string {
  let t = token.trim().replace(/^['"`]+|['"`,;]+$/g, "");
  t = t.replace(/^\d?(>>|>|<)/, "");
  const eq = t.indexOf("=");
  if (eq > 0 && /^-{0,2}[A-Za-z_][\w.-]*$/.test(t.slice(0, eq))) {
    t = t.slice(eq + 1);
  }
  t = t.replace(/^['"]+|['"]+$/g, "");
  if (process.env.USERNAME && t.includes("%USERNAME%")) {
    t = t.replaceAll("%USERNAME%", process.env.USERNAME);
  }
  const wildcard = t.search(/[*?[\]]/);
  if (wildcard >= 0) {
    const prefix = t.slice(0, wildcard);
    const sep = Math.max(prefix.lastIndexOf("/"), prefix.lastIndexOf("\\"));
    t = sep > 0 ? prefix.slice(0, sep) : sep === 0 ? "/" : prefix;
  }
  return t;
}

export function looksLikePath(token: string): boolean {
  if (!token) return false;
  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(token)) return false;
  return (
    token === "~" ||
    token.startsWith("/") ||
    token.startsWith("~/") ||
    /^[a-z]:[\\/]/i.test(token) ||
    token.includes("/") ||
    token.includes("\\")
  );
}

const NULL_DEVICES = new Set(["/dev/null", "nul"]);

export function extractPathTokens(command: string): string[] {
  return command
    .split(/\s+/)
    .map(cleanPathToken)
    .filter(looksLikePath);
}

export function validateCommandPaths(
  command: string,
  allowList: AllowList,
  options?: GateOptions,
): GateResult {
  const op = findForbiddenShellOperator(command);
  if (op) {
    return { ok: false, reason: `shell operator '${op}' is not allowed; run one step at a time` };
  }
  if (isEnvironmentDump(command)) {
    return { ok: false, reason: "printing all environment variables is blocked for privacy" };
  }

  for (const token of extractPathTokens(command)) {
    if (NULL_DEVICES.has(token.toLowerCase())) continue;
    const expanded = expandUserPath(token, options?.homeDir);
    if (isSensitivePath(expanded) || isSensitivePath(canonicalizePath(token, options))) {
      return { ok: false, reason: `path ${token} is a sensitive location` };
    }
    if (!isPathAllowed(token, allowList, options)) {
      return { ok: false, reason: `path ${token} not in allow-list` };
    }
  }
  return { ok: true };
}
