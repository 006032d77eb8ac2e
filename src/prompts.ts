/**
 * System prompt builder
 *
 * Sections, in order:
 * 1. Persona: who the mode's helper is, expertise, example questions, tone
 * 2. Environment: OS-appropriate command hints (plus a device line when the
 *    user shares a system summary)
 * 3. Capabilities: what is switched on or off right now
 * 4. Tool protocol: XML tags for text-only providers, omitted for native tools
 * 5. Preview instructions
 * 6. Skills available in this mode
 * 7. Response guidelines
 *
 * Persona tables live in data/personas.json.
 */

import fs from "node:fs";
import os from "node:os";
import { z } from "zod";
import type { Mode } from "./session.js";
import type { SkillDescriptor } from "./skills/types.js";
import { formatSkillsForPrompt } from "./skills/library.js";

// ============== Persona tables ==============

const PersonaSchema = z.object({
  title: z.string(),
  name: z.string(),
  greeting: z.string(),
  personality: z.string(),
  expertise: z.array(z.string()),
  examples: z.array(z.string()),
  tools: z.array(z.string()),
  platformTools: z.record(z.array(z.string())).optional(),
  tone: z.string(),
});

const PersonasSchema = z.object({
  find: PersonaSchema,
  fix: PersonaSchema,
  research: PersonaSchema,
  data: PersonaSchema,
  content: PersonaSchema,
  build: PersonaSchema,
});

export type Persona = z.infer<typeof PersonaSchema>;

const PERSONAS_URL = new URL("../data/personas.json", import.meta.url);

let personas: z.infer<typeof PersonasSchema> | undefined;

export function personaFor(mode: Mode): Persona {
  if (!personas) {
    const raw: unknown = JSON.parse(fs.readFileSync(PERSONAS_URL, "utf-8"));
    personas = PersonasSchema.parse(raw);
  }
  return personas[mode];
}

/** Greeting shown when the user switches into a mode */
export function modeIntroduction(mode: Mode): { name: string; title: string; greeting: string; examples: string[] } {
  const persona = personaFor(mode);
  return { name: persona.name, title: persona.title, greeting: persona.greeting, examples: persona.examples };
}

// ============== Options ==============

export interface SystemPromptOptions {
  terminalEnabled: boolean;
  internetEnabled: boolean;
  allowedDirs: readonly string[];
  /** Provider receives structured tool definitions; skip the tag protocol */
  nativeTools: boolean;
  platform?: NodeJS.Platform;
  skills?: readonly SkillDescriptor[];
  shareSystemSummary?: boolean;
  /** build mode: a spec kit checkout the helper may point the user at */
  specKitPath?: string;
}

// ============== Sections ==============

function bulletList(items: readonly string[], indent = ""): string {
  return items.map((item) => `${indent}- ${item}`).join("\n");
}

function environmentSection(platform: NodeJS.Platform, shareSystemSummary: boolean): string {
  const lines =
    platform === "win32"
      ? [
          "- Running on Windows",
          "- Use Windows commands: dir, type, where, systeminfo",
          "- Paths use backslashes: C:\\Users\\name\\Documents",
        ]
      : [
          `- Running on ${platform === "darwin" ? "macOS" : "Linux"}`,
          "- Use Unix commands: ls, cat, grep, find",
          "- Paths use forward slashes: /home/user/documents",
        ];
  if (shareSystemSummary) {
    lines.push(`- Device: ${os.type()} ${os.release()} (${os.arch()}), ${os.cpus().length} CPUs, ${Math.round(os.totalmem() / 1024 ** 3)} GB memory`);
  }
  return `## Your Environment\n${lines.join("\n")}`;
}

function capabilitiesSection(mode: Mode, persona: Persona, options: SystemPromptOptions, platform: NodeJS.Platform): string {
  const lines: string[] = [];
  lines.push(
    options.terminalEnabled
      ? "- You CAN run shell commands. Read-only commands run right away; anything that changes files or the system waits for the user's approval."
      : "- Terminal access is DISABLED. Do not attempt to run commands.",
  );
  lines.push(
    options.internetEnabled
      ? "- You CAN search the web."
      : "- Web search is DISABLED. Answer from what you know and say so when you are unsure.",
  );
  if (options.allowedDirs.length > 0) {
    lines.push(`- You CAN access files in: ${options.allowedDirs.join(", ")}`);
  } else {
    lines.push("- No folders are approved yet, so file paths will be refused.");
  }
  lines.push("- Files are never deleted. Offer to archive or move them instead.");

  const tools = [...persona.tools, ...(persona.platformTools?.[platform] ?? [])];
  if (mode === "build" && options.specKitPath) {
    tools.push(`**Spec Kit location**: ${options.specKitPath}`);
  }
  if (tools.length > 0) {
    lines.push("", "### Mode-Specific Tools", bulletList(tools));
  }
  return `## Your Capabilities\n${lines.join("\n")}`;
}

function tagProtocolSection(options: SystemPromptOptions): string {
  const lines = ["## How To Use Tools", "Write a tag in your reply and the app runs it, then shows you the result:"];
  if (options.terminalEnabled) {
    lines.push("- <command>ls -la ~/Documents</command> runs one shell command (no ; && or || chaining)");
  }
  if (options.internetEnabled) {
    lines.push("- <search>your query</search> searches the web");
  }
  lines.push('- <preview type="file" path="/path/to/file"></preview> opens a file in the preview panel');
  lines.push(
    "",
    "Use at most a few tags per reply. After you see the results, answer in plain language without tags.",
  );
  return lines.join("\n");
}

const PREVIEW_SECTION = `## Preview System
The preview panel sits next to the chat. Open a file there when showing it helps more than describing it.
Only files inside the approved folders can be previewed.`;

const NATIVE_PREVIEW_HINT = "Use the preview_file tool to open a file in the panel.";

const GUIDELINES_SECTION = `## Response Guidelines
- Be conversational and match your personality
- Keep answers focused; explain your reasoning for technical topics
- When a command is waiting for approval, tell the user what it will do and why
- Never ask the user for passwords in chat`;

// ============== Builder ==============

export function buildSystemPrompt(mode: Mode, options: SystemPromptOptions): string {
  const persona = personaFor(mode);
  const platform = options.platform ?? process.platform;

  const sections = [
    `# ${persona.name} - Your ${persona.title} Helper`,
    `## Who You Are\nYou are ${persona.name}, part of the Little Helper team. ${persona.personality}`,
    `## Your Expertise\n${bulletList(persona.expertise)}`,
    `## Example Questions You Excel At\n${bulletList(persona.examples.map((q) => `"${q}"`), "  ")}`,
    `## Your Tone\n${persona.tone}`,
    environmentSection(platform, options.shareSystemSummary ?? false),
    capabilitiesSection(mode, persona, options, platform),
  ];

  if (!options.nativeTools) {
    sections.push(tagProtocolSection(options));
  }
  sections.push(options.nativeTools ? `${PREVIEW_SECTION}\n${NATIVE_PREVIEW_HINT}` : PREVIEW_SECTION);

  const skills = formatSkillsForPrompt(options.skills ?? []);
  if (skills) {
    const howTo = options.nativeTools
      ? "Run one with the use_skill tool."
      : "Suggest one when it fits; the user can run it from the app.";
    sections.push(`## Skills\n${howTo}\n${skills}`);
  }

  sections.push(GUIDELINES_SECTION);
  return `${sections.join("\n\n")}\n`;
}
