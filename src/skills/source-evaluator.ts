/**
 * source_evaluator: a heuristic credibility score for a URL.
 *
 * Starts at 50 and adjusts for domain type, known outlets, social media and
 * the scheme. Offline; nothing is fetched.
 */

import { stringParam, textOutput, type Skill, type SkillContext, type SkillDescriptor, type SkillInput, type SkillOutput } from "./types.js";

export type Impact = "positive" | "neutral" | "negative";

export interface SourceIndicator {
  category: string;
  finding: string;
  impact: Impact;
}

export interface SourceAnalysis {
  url: string;
  domain: string;
  score: number;
  indicators: SourceIndicator[];
}

const NEWS_DOMAINS = [
  "nytimes.com",
  "washingtonpost.com",
  "bbc.com",
  "bbc.co.uk",
  "reuters.com",
  "apnews.com",
  "npr.org",
  "theguardian.com",
  "wsj.com",
  "economist.com",
  "nature.com",
  "sciencemag.org",
];

const SOCIAL_DOMAINS = [
  "twitter.com",
  "x.com",
  "facebook.com",
  "instagram.com",
  "tiktok.com",
  "reddit.com",
  "youtube.com",
  "linkedin.com",
];

export function extractDomain(url: string): string {
  const rest = url.toLowerCase().replace(/^https?:\/\//, "");
  return rest.split("/")[0] ?? rest;
}

function matchesDomain(domain: string, known: string): boolean {
  return domain === known || domain.endsWith(`.${known}`);
}

export function evaluateSource(url: string): SourceAnalysis {
  const domain = extractDomain(url);
  const indicators: SourceIndicator[] = [];
  let score = 50;

  if (domain.endsWith(".edu") || domain.endsWith(".ac.uk") || domain.includes("university")) {
    indicators.push({ category: "Domain type", finding: "Academic domain", impact: "positive" });
    score += 20;
  } else if (domain.endsWith(".gov") || domain.endsWith(".gov.uk") || domain.endsWith(".gc.ca")) {
    indicators.push({ category: "Domain type", finding: "Government domain", impact: "positive" });
    score += 15;
  } else if (domain.endsWith(".org")) {
    indicators.push({ category: "Domain type", finding: "Organization domain", impact: "neutral" });
  }

  if (NEWS_DOMAINS.some((d) => matchesDomain(domain, d))) {
    indicators.push({ category: "Source type", finding: "Established news or science publisher", impact: "positive" });
    score += 10;
  }
  if (domain.includes("wikipedia")) {
    indicators.push({ category: "Source type", finding: "Wikipedia: follow its citations for primary sources", impact: "neutral" });
  }
  if (SOCIAL_DOMAINS.some((d) => matchesDomain(domain, d))) {
    indicators.push({ category: "Source type", finding: "Social media: verify claims elsewhere", impact: "negative" });
    score -= 15;
  }

  if (url.startsWith("https://")) {
    indicators.push({ category: "Security", finding: "Encrypted connection (HTTPS)", impact: "positive" });
    score += 5;
  } else if (url.startsWith("http://")) {
    indicators.push({ category: "Security", finding: "Unencrypted connection (HTTP)", impact: "negative" });
    score -= 5;
  }

  return { url, domain, score: Math.min(100, Math.max(0, score)), indicators };
}

export function credibilityLabel(score: number): string {
  if (score >= 75) return "High";
  if (score >= 50) return "Medium";
  return "Low";
}

const IMPACT_MARK: Record<Impact, string> = { positive: "+", neutral: "·", negative: "-" };

export function formatSourceAnalysis(analysis: SourceAnalysis): string {
  const lines = [
    "## Source Evaluation",
    "",
    `URL: ${analysis.url}`,
    `Domain: ${analysis.domain}`,
    `Credibility: ${credibilityLabel(analysis.score)} (${analysis.score}/100)`,
  ];
  if (analysis.indicators.length > 0) {
    lines.push("");
    for (const indicator of analysis.indicators) {
      lines.push(`${IMPACT_MARK[indicator.impact]} ${indicator.category}: ${indicator.finding}`);
    }
  }
  lines.push("", "Check the author and the date, and compare with other reliable sources.");
  return lines.join("\n");
}

/** First http(s) URL in `text`, without trailing punctuation */
export function findUrl(text: string): string | undefined {
  const match = /https?:\/\/\S+/.exec(text);
  return match?.[0].replace(/[)\]}>.,;:!?'"]+$/, "");
}

export class SourceEvaluatorSkill implements Skill {
  readonly descriptor: SkillDescriptor = {
    id: "source_evaluator",
    name: "Source Evaluator",
    description: "Rate how credible a web source is likely to be",
    modes: ["research"],
    permissionLevel: "Safe",
  };

  async execute(input: SkillInput, _ctx?: SkillContext): Promise<SkillOutput> {
    const url = stringParam(input.params, "url") ?? findUrl(input.query);
    if (!url) {
      return textOutput('Please give me a URL to evaluate.\n\nExample: "evaluate https://example.com/article"');
    }
    const analysis = evaluateSource(url);
    return {
      resultType: "text",
      text: formatSourceAnalysis(analysis),
      data: { url, domain: analysis.domain, score: analysis.score, indicatorCount: analysis.indicators.length },
    };
  }
}
