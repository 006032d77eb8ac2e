/**
 * fuzzy_search: find files by approximate name below the working directory.
 *
 * Matching is a case-insensitive subsequence test; the score rewards
 * contiguous runs and shorter names. Walks at most 4 levels deep, skipping
 * dot entries and node_modules.
 */

import fs from "node:fs/promises";
import type { Dirent } from "node:fs";
import path from "node:path";
import { isPathAllowed } from "../safety/allow-list.js";
import { errorOutput, textOutput, type Skill, type SkillContext, type SkillDescriptor, type SkillInput, type SkillOutput } from "./types.js";

export const FUZZY_MAX_DEPTH = 4;
export const FUZZY_DEFAULT_LIMIT = 25;

export interface FuzzyMatch {
  name: string;
  path: string;
  score: number;
}

/**
 * Score `candidate` against `query` in [0, 1], or undefined when the query
 * is not a subsequence of the candidate.
 */
export function fuzzyScore(query: string, candidate: string): number | undefined {
  const q = query.trim().toLowerCase();
  const c = candidate.toLowerCase();
  if (!q || !c) return undefined;
  if (q === c) return 1;

  let from = 0;
  let previous = -2;
  let contiguous = 0;
  for (const ch of q) {
    const index = c.indexOf(ch, from);
    if (index < 0) return undefined;
    if (index === previous + 1) contiguous++;
    previous = index;
    from = index + 1;
  }

  const coverage = q.length / c.length;
  const runs = contiguous / q.length;
  const bonus = c.startsWith(q) ? 0.1 : 0;
  return Math.min(0.99, 0.5 * coverage + 0.4 * runs + bonus);
}

async function walk(dir: string, depth: number, visit: (entry: Dirent, full: string) => void): Promise<void> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch {
    // Unreadable directories are skipped
    return;
  }
  for (const entry of entries) {
    if (entry.name.startsWith(".") || entry.name === "node_modules") continue;
    const full = path.join(dir, entry.name);
    visit(entry, full);
    if (entry.isDirectory() && depth < FUZZY_MAX_DEPTH) {
      await walk(full, depth + 1, visit);
    }
  }
}

export async function fuzzyFindFiles(root: string, query: string, limit: number = FUZZY_DEFAULT_LIMIT): Promise<FuzzyMatch[]> {
  const matches: FuzzyMatch[] = [];
  await walk(root, 1, (entry, full) => {
    if (!entry.isFile()) return;
    const score = fuzzyScore(query, entry.name);
    if (score !== undefined) matches.push({ name: entry.name, path: full, score });
  });
  matches.sort((a, b) => b.score - a.score || a.path.localeCompare(b.path));
  return matches.slice(0, limit);
}

export class FuzzySearchSkill implements Skill {
  readonly descriptor: SkillDescriptor = {
    id: "fuzzy_search",
    name: "Fuzzy File Search",
    description: "Find files by approximate name in the current folder and its subfolders",
    modes: ["find"],
    permissionLevel: "Safe",
  };

  async execute(input: SkillInput, ctx: SkillContext): Promise<SkillOutput> {
    const query = input.query.trim();
    if (!query) return textOutput("Please provide a search query.");

    const root = ctx.workingDir;
    if (!isPathAllowed(root, ctx.allowList, { homeDir: ctx.homeDir })) {
      return errorOutput(`path ${root} not in allow-list`);
    }

    const rawLimit = input.params.limit;
    const limit = typeof rawLimit === "number" && rawLimit > 0 ? Math.floor(rawLimit) : FUZZY_DEFAULT_LIMIT;
    const results = await fuzzyFindFiles(root, query, limit);
    if (results.length === 0) {
      return { resultType: "text", text: `No files found matching '${query}'`, data: [] };
    }

    const lines = results.map((r, i) => `${i + 1}. ${r.name} (${Math.round(r.score * 100)}%)\n   ${r.path}`);
    return {
      resultType: "mixed",
      text: `Found ${results.length} files matching '${query}':\n\n${lines.join("\n")}`,
      data: results,
      suggestedActions: results.slice(0, 3).map((r) => ({
        label: `Preview ${r.name}`,
        skillId: "preview",
        params: { path: r.path },
      })),
    };
  }
}
