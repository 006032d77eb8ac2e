/**
 * text_polisher: readability statistics and style suggestions for a passage.
 */

import { stringParam, textOutput, type Skill, type SkillContext, type SkillDescriptor, type SkillInput, type SkillOutput } from "./types.js";

export interface TextSuggestion {
  category: string;
  issue: string;
  suggestion: string;
}

export interface TextAnalysis {
  wordCount: number;
  sentenceCount: number;
  avgWordsPerSentence: number;
  suggestions: TextSuggestion[];
}

const PASSIVE_WORDS = new Set(["was", "were", "been", "being", "is", "are", "am"]);
const FILLER_WORDS = new Set(["very", "really", "just", "actually", "basically", "literally"]);
const WEAK_OPENINGS = ["there is", "there are", "it is", "it was"];

export function analyzeText(text: string): TextAnalysis {
  const words = text.split(/\s+/).filter(Boolean);
  const lowerWords = words.map((w) => w.toLowerCase());
  const wordCount = words.length;
  const sentenceCount = Math.max(1, text.split(/[.!?]/).filter((s) => s.trim() !== "").length);
  const avgWordsPerSentence = wordCount / sentenceCount;
  const suggestions: TextSuggestion[] = [];

  if (avgWordsPerSentence > 25) {
    suggestions.push({
      category: "Readability",
      issue: "Long sentences",
      suggestion: "Split long sentences into shorter ones.",
    });
  }

  const passive = lowerWords.filter((w) => PASSIVE_WORDS.has(w)).length;
  if (wordCount > 20 && passive > Math.floor(wordCount / 10)) {
    suggestions.push({
      category: "Style",
      issue: "Possible passive voice",
      suggestion: "Prefer active voice: say who does what.",
    });
  }

  const fillers = lowerWords.filter((w) => FILLER_WORDS.has(w)).length;
  if (fillers > 0) {
    suggestions.push({
      category: "Conciseness",
      issue: `Found ${fillers} filler word(s)`,
      suggestion: "Drop words like 'very', 'really' and 'just'.",
    });
  }

  const counts = new Map<string, number>();
  for (const w of lowerWords) {
    if (w.length > 4) counts.set(w, (counts.get(w) ?? 0) + 1);
  }
  if (wordCount > 50 && [...counts.values()].some((n) => n > 3)) {
    suggestions.push({
      category: "Variety",
      issue: "Repeated words",
      suggestion: "Swap some repeated words for synonyms.",
    });
  }

  const lowerText = text.toLowerCase();
  const weak = WEAK_OPENINGS.find((phrase) => lowerText.includes(phrase));
  if (weak) {
    suggestions.push({
      category: "Strength",
      issue: `Weak phrase: '${weak}'`,
      suggestion: "Lead with the subject and a strong verb.",
    });
  }

  return { wordCount, sentenceCount, avgWordsPerSentence, suggestions };
}

export function readabilityLabel(avgWordsPerSentence: number): string {
  if (avgWordsPerSentence < 15) return "Easy to read";
  if (avgWordsPerSentence < 20) return "Moderately readable";
  if (avgWordsPerSentence < 25) return "Somewhat complex";
  return "Complex, consider simplifying";
}

export function formatTextAnalysis(analysis: TextAnalysis): string {
  const lines = [
    "## Text Analysis",
    "",
    `- Words: ${analysis.wordCount}`,
    `- Sentences: ${analysis.sentenceCount}`,
    `- Avg. words/sentence: ${analysis.avgWordsPerSentence.toFixed(1)}`,
    `- Readability: ${readabilityLabel(analysis.avgWordsPerSentence)}`,
    "",
  ];
  if (analysis.suggestions.length === 0) {
    lines.push("No major issues found.");
  } else {
    lines.push("Suggestions:");
    for (const s of analysis.suggestions) {
      lines.push(`- ${s.category}: ${s.issue}. ${s.suggestion}`);
    }
  }
  return lines.join("\n");
}

export class TextPolisherSkill implements Skill {
  readonly descriptor: SkillDescriptor = {
    id: "text_polisher",
    name: "Text Polisher",
    description: "Check a passage for readability, filler words and passive voice",
    modes: ["content"],
    permissionLevel: "Safe",
  };

  async execute(input: SkillInput, _ctx?: SkillContext): Promise<SkillOutput> {
    const text = stringParam(input.params, "text") ?? input.query.trim();
    if (!text) {
      return textOutput("Paste the text you want checked and I'll suggest improvements.");
    }
    const analysis = analyzeText(text);
    return {
      resultType: "text",
      text: formatTextAnalysis(analysis),
      data: {
        wordCount: analysis.wordCount,
        sentenceCount: analysis.sentenceCount,
        avgWordsPerSentence: analysis.avgWordsPerSentence,
        suggestionCount: analysis.suggestions.length,
      },
    };
  }
}
