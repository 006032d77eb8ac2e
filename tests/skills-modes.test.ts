import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createAllowList } from "../src/safety/allow-list.js";
import { AuditLogger } from "../src/skills/audit.js";
import { CsvAnalyzerSkill, analyzeCsv, columnType, formatCsvAnalysis, parseCsvLine } from "../src/skills/csv-analyzer.js";
import { ErrorExplainerSkill, explainError, formatExplanation, loadErrorPatterns } from "../src/skills/error-explainer.js";
import { SourceEvaluatorSkill, credibilityLabel, evaluateSource, findUrl, formatSourceAnalysis } from "../src/skills/source-evaluator.js";
import { SpecCheckSkill } from "../src/skills/spec-check.js";
import { TextPolisherSkill, analyzeText, formatTextAnalysis, readabilityLabel } from "../src/skills/text-polisher.js";
import type { SkillContext } from "../src/skills/types.js";
import { VersionHistorySkill, archiveFolderTime, formatSize, formatVersions, listVersions } from "../src/skills/version-history.js";
import { makeTmpDir } from "./helpers.js";

let root: string;
let work: string;
let ctx: SkillContext;

beforeEach(() => {
  root = makeTmpDir("mode-skills-");
  work = path.join(root, "work");
  fs.mkdirSync(work);
  ctx = {
    workingDir: work,
    allowList: createAllowList([work]),
    auditor: new AuditLogger(path.join(root, "audit")),
    mode: "data",
  };
});

afterEach(() => {
  fs.rmSync(root, { recursive: true, force: true });
});

// ============== csv_analyzer ==============

const SALES_CSV = ["region,units,note", 'north,10,"big, early"', "south,5.5,", "north,,late", ""].join("\n");

describe("csv_analyzer", () => {
  it("keeps commas inside quoted cells", () => {
    expect(parseCsvLine('name,age,"city, state"')).toEqual(["name", "age", "city, state"]);
  });

  it("returns nothing for an empty file", () => {
    expect(analyzeCsv("\n\n")).toBeUndefined();
  });

  it("classifies columns by their values", () => {
    const analysis = analyzeCsv(SALES_CSV);
    expect(analysis?.rowCount).toBe(3);
    expect(analysis?.columns.map(columnType)).toEqual(["Categorical", "Numeric", "Categorical"]);
  });

  it("formats the column table and categorical values", () => {
    const analysis = analyzeCsv(SALES_CSV);
    if (!analysis) throw new Error("expected an analysis");
    expect(formatCsvAnalysis("sales.csv", analysis)).toBe(
      [
        "## CSV Analysis: sales.csv",
        "",
        "- Rows: 3",
        "- Columns: 3",
        "",
        "| Column | Type | Non-Empty | Unique | Min | Max | Avg |",
        "|--------|------|-----------|--------|-----|-----|-----|",
        "| region | Categorical | 3 | 2 | - | - | - |",
        "| units | Numeric | 2 | 2 | 5.50 | 10.00 | 7.75 |",
        "| note | Categorical | 2 | 2 | - | - | - |",
        "",
        "Categorical values:",
        '- region: "north", "south"',
        '- note: "big, early", "late"',
      ].join("\n"),
    );
  });

  it("analyzes the CSV file named in the request", async () => {
    fs.writeFileSync(path.join(work, "sales.csv"), SALES_CSV);
    const output = await new CsvAnalyzerSkill().execute({ query: "analyze sales.csv please", params: {} }, ctx);
    expect(output.resultType).toBe("data");
    expect(output.data).toEqual({
      file: path.join(work, "sales.csv"),
      rowCount: 3,
      columnCount: 3,
      columns: ["region", "units", "note"],
    });
  });

  it("refuses files outside the allowed folders", async () => {
    const output = await new CsvAnalyzerSkill().execute({ query: "", params: { path: "/etc/numbers.csv" } }, ctx);
    expect(output.resultType).toBe("error");
    expect(output.text).toBe("/etc/numbers.csv is outside the folders Little Helper may read.");
  });

  it("asks for a file when none is named", async () => {
    const output = await new CsvAnalyzerSkill().execute({ query: "look at my data", params: {} }, ctx);
    expect(output.text).toBe('Please specify a CSV file to analyze.\n\nExample: "analyze sales_data.csv"');
  });
});

// ============== text_polisher ==============

describe("text_polisher", () => {
  it("flags filler words and weak openings", () => {
    expect(formatTextAnalysis(analyzeText("It is very clear. We just ship it."))).toBe(
      [
        "## Text Analysis",
        "",
        "- Words: 8",
        "- Sentences: 2",
        "- Avg. words/sentence: 4.0",
        "- Readability: Easy to read",
        "",
        "Suggestions:",
        "- Conciseness: Found 2 filler word(s). Drop words like 'very', 'really' and 'just'.",
        "- Strength: Weak phrase: 'it is'. Lead with the subject and a strong verb.",
      ].join("\n"),
    );
  });

  it("reports clean text as having no issues", () => {
    expect(formatTextAnalysis(analyzeText("Cats sleep. Dogs bark."))).toBe(
      [
        "## Text Analysis",
        "",
        "- Words: 4",
        "- Sentences: 2",
        "- Avg. words/sentence: 2.0",
        "- Readability: Easy to read",
        "",
        "No major issues found.",
      ].join("\n"),
    );
  });

  it("flags long sentences", () => {
    const sentence = Array.from({ length: 26 }, (_, i) => `w${i}`).join(" ");
    const analysis = analyzeText(sentence);
    expect(analysis.suggestions.map((s) => s.category)).toEqual(["Readability"]);
    expect(readabilityLabel(analysis.avgWordsPerSentence)).toBe("Complex, consider simplifying");
  });

  it("labels readability by sentence length", () => {
    expect(readabilityLabel(14.9)).toBe("Easy to read");
    expect(readabilityLabel(15)).toBe("Moderately readable");
    expect(readabilityLabel(20)).toBe("Somewhat complex");
  });

  it("takes the text from params before the query", async () => {
    const output = await new TextPolisherSkill().execute({ query: "ignored", params: { text: "Cats sleep. Dogs bark." } }, ctx);
    expect(output.data).toEqual({ wordCount: 4, sentenceCount: 2, avgWordsPerSentence: 2, suggestionCount: 0 });
  });

  it("asks for text when given none", async () => {
    const output = await new TextPolisherSkill().execute({ query: "  ", params: {} }, ctx);
    expect(output.text).toBe("Paste the text you want checked and I'll suggest improvements.");
  });
});

// ============== source_evaluator ==============

describe("source_evaluator", () => {
  it("scores academic sites over HTTPS as high", () => {
    const analysis = evaluateSource("https://www.cs.example.edu/paper");
    expect(analysis.score).toBe(75);
    expect(credibilityLabel(analysis.score)).toBe("High");
    expect(analysis.indicators.map((i) => i.category)).toEqual(["Domain type", "Security"]);
  });

  it("keeps wikipedia neutral", () => {
    const analysis = evaluateSource("https://en.wikipedia.org/wiki/Tea");
    expect(analysis.domain).toBe("en.wikipedia.org");
    expect(analysis.score).toBe(55);
    expect(analysis.indicators.map((i) => i.category)).toEqual(["Domain type", "Source type", "Security"]);
  });

  it("formats a social media link over plain HTTP", () => {
    expect(formatSourceAnalysis(evaluateSource("http://twitter.com/someone/status/1"))).toBe(
      [
        "## Source Evaluation",
        "",
        "URL: http://twitter.com/someone/status/1",
        "Domain: twitter.com",
        "Credibility: Low (30/100)",
        "",
        "- Source type: Social media: verify claims elsewhere",
        "- Security: Unencrypted connection (HTTP)",
        "",
        "Check the author and the date, and compare with other reliable sources.",
      ].join("\n"),
    );
  });

  it("matches known domains on a dot boundary only", () => {
    expect(evaluateSource("https://box.com/file").score).toBe(55);
  });

  it("strips trailing punctuation from a URL in the query", () => {
    expect(findUrl("is https://example.com/a. legit?")).toBe("https://example.com/a");
    expect(findUrl("no link here")).toBeUndefined();
  });

  it("evaluates the URL found in the query", async () => {
    const output = await new SourceEvaluatorSkill().execute({ query: "check https://www.bbc.co.uk/news/x, please", params: {} }, ctx);
    expect(output.data).toEqual({ url: "https://www.bbc.co.uk/news/x", domain: "www.bbc.co.uk", score: 65, indicatorCount: 2 });
  });
});

// ============== error_explainer ==============

describe("error_explainer", () => {
  it("matches bundled patterns by keyword", () => {
    expect(loadErrorPatterns()).toHaveLength(16);
    expect(explainError("Error: EACCES: permission denied, open 'a.txt'").category).toBe("Permission Error");
    expect(explainError("connect ECONNREFUSED 127.0.0.1:3000").category).toBe("Connection Refused");
  });

  it("formats the first matching pattern", () => {
    const patterns = [
      { keywords: ["Widget Jam"], category: "Widget Jam", explanation: "The widget is stuck.", suggestions: ["Wiggle it", "Restart it"] },
    ];
    expect(formatExplanation(explainError("WIDGET JAM at line 3", patterns))).toBe(
      "## Widget Jam\n\nThe widget is stuck.\n\nThings to try:\n1. Wiggle it\n2. Restart it",
    );
  });

  it("offers a web search for unknown errors", async () => {
    const output = await new ErrorExplainerSkill([]).execute({ query: "the gizmo went sideways", params: {} }, ctx);
    expect(output.data).toEqual({ category: "Unknown Error", matched: false });
    expect(output.suggestedActions).toEqual([
      { label: "Search online", skillId: "web_search", params: { query: "the gizmo went sideways fix" } },
    ]);
  });

  it("suggests nothing extra for a recognized error", async () => {
    const output = await new ErrorExplainerSkill().execute({ query: "", params: { error: "No such file or directory" } }, ctx);
    expect(output.data).toEqual({ category: "File Not Found", matched: true });
    expect(output.suggestedActions).toBeUndefined();
  });
});

// ============== spec_check ==============

describe("spec_check", () => {
  it("lists the specs of a project folder", async () => {
    const proj = path.join(work, "proj");
    fs.mkdirSync(path.join(proj, "specs", "b-auth"), { recursive: true });
    fs.mkdirSync(path.join(proj, "specs", "a-login"), { recursive: true });
    fs.mkdirSync(path.join(proj, ".speckit"));
    fs.writeFileSync(path.join(proj, "CONSTITUTION.md"), "# Rules\n");
    fs.writeFileSync(path.join(proj, "specs", "b-auth", "spec.md"), "");
    fs.writeFileSync(path.join(proj, "specs", "b-auth", "plan.md"), "");
    fs.writeFileSync(path.join(proj, "specs", "a-login", "spec.md"), "");

    const output = await new SpecCheckSkill().execute({ query: "", params: { folder: "proj" } }, ctx);
    expect(output.resultType).toBe("mixed");
    expect(output.text).toBe(
      [
        `Project folder: ${proj}`,
        "",
        "CONSTITUTION.md: found",
        "Specs: 2 found",
        "  - a-login: [spec]",
        "  - b-auth: [spec, plan]",
        "",
        "Spec Kit config: found",
      ].join("\n"),
    );
  });

  it("explains what a plain folder is missing", async () => {
    const output = await new SpecCheckSkill().execute({ query: "", params: {} }, ctx);
    expect(output.resultType).toBe("text");
    expect(output.text).toBe(
      `This doesn't look like a spec-driven project.\n\nFolder: ${work}\n\nMissing:\n- specs/ directory\n- CONSTITUTION.md`,
    );
  });

  it("refuses folders outside the allowed ones", async () => {
    const output = await new SpecCheckSkill().execute({ query: "", params: { folder: "/" } }, ctx);
    expect(output.resultType).toBe("error");
    expect(output.text).toBe("/ is outside the folders Little Helper may read.");
  });
});

// ============== version_history ==============

describe("version_history", () => {
  let archive: string;

  beforeEach(() => {
    archive = path.join(root, "archive");
    const put = (rel: string, content: string) => {
      const file = path.join(archive, rel);
      fs.mkdirSync(path.dirname(file), { recursive: true });
      fs.writeFileSync(file, content);
    };
    put("20240102_030405/notes.txt", "v1");
    put("reports/20240105_101010/notes.txt", "v2!");
    put("20240103_000000/other.txt", "other");
    put("misc/notes.txt", "not an archive folder");
    fs.writeFileSync(path.join(work, "notes.txt"), "current");
  });

  it("reads the time from an archive folder name", () => {
    expect(archiveFolderTime("20240102_030405")).toBe("2024-01-02 03:04:05");
    expect(archiveFolderTime("misc")).toBeUndefined();
  });

  it("formats sizes", () => {
    expect(formatSize(12)).toBe("12 B");
    expect(formatSize(2048)).toBe("2.0 KB");
    expect(formatSize(3 * 1024 * 1024)).toBe("3.0 MB");
  });

  it("lists archived copies oldest first, then the live file", async () => {
    const versions = await listVersions(archive, path.join(work, "notes.txt"));
    expect(versions.map((v) => [v.version, v.sizeBytes, v.archivedAt, v.isCurrent])).toEqual([
      [1, 2, "2024-01-02 03:04:05", false],
      [2, 3, "2024-01-05 10:10:10", false],
      [3, 7, undefined, true],
    ]);
  });

  it("formats the history of the requested file", async () => {
    const output = await new VersionHistorySkill(archive).execute({ query: "notes.txt", params: {} }, ctx);
    expect(output.resultType).toBe("data");
    expect(output.text).toBe(
      [
        "Version history for 'notes.txt'",
        "3 versions",
        "",
        "  Version 1 (2024-01-02 03:04:05), 2 B",
        `    ${path.join(archive, "20240102_030405", "notes.txt")}`,
        "  Version 2 (2024-01-05 10:10:10), 3 B",
        `    ${path.join(archive, "reports", "20240105_101010", "notes.txt")}`,
        "  Version 3 (current), 7 B",
        `    ${path.join(work, "notes.txt")}`,
      ].join("\n"),
    );
  });

  it("says when a file has no saved versions", () => {
    expect(formatVersions("ghost.txt", [])).toBe("No saved versions of 'ghost.txt'.\n\nA version is kept whenever the file is archived.");
  });
});
