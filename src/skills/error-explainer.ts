/**
 * error_explainer: plain-language explanation and fixes for an error message.
 *
 * Patterns live in data/error-patterns.json and are tried in order; the first
 * whose keyword appears in the lowercased message wins.
 */

import fs from "node:fs";
import { z } from "zod";
import { stringParam, textOutput, type Skill, type SkillContext, type SkillDescriptor, type SkillInput, type SkillOutput } from "./types.js";

const ErrorPatternSchema = z.object({
  keywords: z.array(z.string()).min(1),
  category: z.string(),
  explanation: z.string(),
  suggestions: z.array(z.string()),
});

const ErrorPatternFileSchema = z.object({ patterns: z.array(ErrorPatternSchema) });

export type ErrorPattern = z.infer<typeof ErrorPatternSchema>;

export interface ErrorExplanation {
  category: string;
  explanation: string;
  suggestions: string[];
  matched: boolean;
}

const PATTERNS_URL = new URL("../../data/error-patterns.json", import.meta.url);

let defaultPatterns: ErrorPattern[] | undefined;

export function loadErrorPatterns(): ErrorPattern[] {
  if (!defaultPatterns) {
    const raw: unknown = JSON.parse(fs.readFileSync(PATTERNS_URL, "utf-8"));
    defaultPatterns = ErrorPatternFileSchema.parse(raw).patterns;
  }
  return defaultPatterns;
}

const UNKNOWN: ErrorExplanation = {
  category: "Unknown Error",
  explanation: "This message does not match an error I recognize.",
  suggestions: ["Search for the exact message online", "Check the application's logs", "Restart the application"],
  matched: false,
};

export function explainError(message: string, patterns: readonly ErrorPattern[] = loadErrorPatterns()): ErrorExplanation {
  const lower = message.toLowerCase();
  const hit = patterns.find((p) => p.keywords.some((k) => lower.includes(k.toLowerCase())));
  if (!hit) return UNKNOWN;
  return { category: hit.category, explanation: hit.explanation, suggestions: hit.suggestions, matched: true };
}

export function formatExplanation(explanation: ErrorExplanation): string {
  const lines = [`## ${explanation.category}`, "", explanation.explanation, "", "Things to try:"];
  explanation.suggestions.forEach((s, i) => lines.push(`${i + 1}. ${s}`));
  return lines.join("\n");
}

export class ErrorExplainerSkill implements Skill {
  readonly descriptor: SkillDescriptor = {
    id: "error_explainer",
    name: "Error Explainer",
    description: "Explain an error message in plain words with things to try",
    modes: ["fix"],
    permissionLevel: "Safe",
  };

  private readonly patterns?: readonly ErrorPattern[];

  constructor(patterns?: readonly ErrorPattern[]) {
    this.patterns = patterns;
  }

  async execute(input: SkillInput, _ctx?: SkillContext): Promise<SkillOutput> {
    const message = stringParam(input.params, "error") ?? input.query.trim();
    if (!message) {
      return textOutput("Paste the error message and I'll explain what it means.");
    }
    const explanation = explainError(message, this.patterns ?? loadErrorPatterns());
    return {
      resultType: "text",
      text: formatExplanation(explanation),
      data: { category: explanation.category, matched: explanation.matched },
      suggestedActions: explanation.matched
        ? undefined
        : [{ label: "Search online", skillId: "web_search", params: { query: `${message} fix` } }],
    };
  }
}
