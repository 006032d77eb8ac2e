/**
 * Instruction skills (SKILL.md library)
 *
 * A directory containing SKILL.md becomes a Safe skill whose output is the
 * instruction body, so the model can pull in task-specific guidance.
 *
 * Discovery rules:
 * - every subdirectory (recursive) is checked for SKILL.md
 * - dotfiles and node_modules are skipped
 * - frontmatter: name, description (required), modes (comma list or [a, b])
 * - name priority: frontmatter > directory name
 */

import fs from "node:fs/promises";
import type { Dirent } from "node:fs";
import path from "node:path";
import { describeError } from "../errors.js";
import { MODES, isMode, type Mode } from "../session.js";
import type { Skill, SkillDescriptor, SkillOutput } from "./types.js";

// ============== Types ==============

export class InstructionSkill implements Skill {
  readonly descriptor: SkillDescriptor;
  /** Absolute path of SKILL.md */
  readonly filePath: string;
  readonly body: string;

  constructor(descriptor: SkillDescriptor, filePath: string, body: string) {
    this.descriptor = descriptor;
    this.filePath = filePath;
    this.body = body;
  }

  async execute(): Promise<SkillOutput> {
    return { resultType: "text", text: this.body };
  }
}

// ============== Directory scanning ==============

export interface LoadSkillsOptions {
  onWarning?: (message: string) => void;
}

export async function loadSkillsFromDir(dir: string, options: LoadSkillsOptions = {}): Promise<InstructionSkill[]> {
  const warn = options.onWarning ?? ((message: string) => console.warn(`[skills] ${message}`));
  const skills: InstructionSkill[] = [];
  await scanDir(dir, skills, warn);
  return skills;
}

async function scanDir(dir: string, skills: InstructionSkill[], warn: (message: string) => void): Promise<void> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (err) {
    if (!isNotFound(err)) warn(`cannot read skill directory ${dir}: ${describeError(err)}`);
    return;
  }
  for (const entry of entries) {
    if (entry.name.startsWith(".") || entry.name === "node_modules") continue;
    if (!entry.isDirectory()) continue;
    const fullPath = path.join(dir, entry.name);
    const skill = await loadSkillFromFile(path.join(fullPath, "SKILL.md"), fullPath);
    if (skill) skills.push(skill);
    await scanDir(fullPath, skills, warn);
  }
}

/**
 * Load a single SKILL.md
 *
 * - description is required; entries without one are skipped
 * - modes defaults to every mode
 */
async function loadSkillFromFile(filePath: string, baseDir: string): Promise<InstructionSkill | undefined> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch {
    // No SKILL.md in this directory
    return undefined;
  }

  const { fields, body } = extractFrontmatter(content);
  const name = fields.name?.trim() || path.basename(baseDir).toLowerCase();
  const description = fields.description?.trim() ?? "";
  if (!description) return undefined;

  return new InstructionSkill(
    {
      id: sanitizeSkillId(name),
      name,
      description,
      modes: parseModes(fields.modes),
      permissionLevel: "Safe",
    },
    path.resolve(filePath),
    body.trim(),
  );
}

/**
 * Simple YAML frontmatter extraction
 *
 * - Only handles single-line key: value format
 * - Strips quote wrapping ("value" → value)
 */
export function extractFrontmatter(content: string): { fields: Record<string, string>; body: string } {
  const match = content.match(/^---\r?\n([\s\S]*?)\r?\n---\r?\n?/);
  if (!match) return { fields: {}, body: content };
  const fields: Record<string, string> = {};
  for (const line of (match[1] ?? "").split("\n")) {
    const kv = line.match(/^([a-zA-Z][\w-]*):\s*(.+)$/);
    if (kv?.[1] && kv[2]) {
      fields[kv[1]] = kv[2].trim().replace(/^["']|["']$/g, "");
    }
  }
  return { fields, body: content.slice(match[0].length) };
}

function parseModes(value: string | undefined): Mode[] {
  if (!value) return [...MODES];
  const modes = value
    .replace(/^\[|\]$/g, "")
    .split(",")
    .map((m) => m.trim().replace(/^["']|["']$/g, "").toLowerCase())
    .filter(isMode);
  return modes.length > 0 ? modes : [...MODES];
}

export function sanitizeSkillId(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^a-z0-9_-]+/g, "_")
    .replace(/^_+|_+$/g, "");
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

// ============== Prompt formatting ==============

const XML_ESCAPE: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&apos;",
};

function escapeXml(str: string): string {
  return str.replace(/[&<>"']/g, (ch) => XML_ESCAPE[ch] ?? ch);
}

/**
 * Render the skills available in a mode for the system prompt.
 */
export function formatSkillsForPrompt(skills: readonly SkillDescriptor[]): string {
  if (skills.length === 0) return "";
  const lines = ["<available_skills>"];
  for (const s of skills) {
    lines.push("  <skill>");
    lines.push(`    <id>${escapeXml(s.id)}</id>`);
    lines.push(`    <description>${escapeXml(s.description)}</description>`);
    if (s.permissionLevel !== "Safe") {
      lines.push(`    <permission>${s.permissionLevel.toLowerCase()}</permission>`);
    }
    lines.push("  </skill>");
  }
  lines.push("</available_skills>");
  return lines.join("\n");
}
