/**
 * csv_analyzer: structure and per-column statistics for a CSV file.
 *
 * Reads at most CSV_MAX_ROWS data rows. A column is Numeric when more than
 * half of its non-empty cells parse as numbers, Categorical when it has at
 * most 10 distinct values, Text otherwise.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { describeError } from "../errors.js";
import { isPathAllowed } from "../safety/allow-list.js";
import {
  errorOutput,
  resolveSkillPath,
  stringParam,
  textOutput,
  type Skill,
  type SkillContext,
  type SkillDescriptor,
  type SkillInput,
  type SkillOutput,
} from "./types.js";

export const CSV_MAX_ROWS = 10_000;
const UNIQUE_CAP = 100;
const NUMBER_RE = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export type ColumnType = "Numeric" | "Categorical" | "Text";

export interface ColumnStats {
  name: string;
  nonEmpty: number;
  numericCount: number;
  /** Distinct values in first-seen order, capped at 100 */
  uniqueValues: Map<string, number>;
  min: number;
  max: number;
  sum: number;
}

export interface CsvAnalysis {
  rowCount: number;
  headers: string[];
  columns: ColumnStats[];
}

/** Split one line on commas outside double quotes; quotes are dropped */
export function parseCsvLine(line: string): string[] {
  const cells: string[] = [];
  let current = "";
  let quoted = false;
  for (const ch of line) {
    if (ch === '"') {
      quoted = !quoted;
    } else if (ch === "," && !quoted) {
      cells.push(current.trim());
      current = "";
    } else {
      current += ch;
    }
  }
  cells.push(current.trim());
  return cells;
}

export function analyzeCsv(content: string): CsvAnalysis | undefined {
  const lines = content.split(/\r?\n/).filter((line) => line.trim() !== "");
  const [headerLine, ...rows] = lines;
  if (headerLine === undefined) return undefined;

  const headers = parseCsvLine(headerLine);
  const columns: ColumnStats[] = headers.map((name) => ({
    name,
    nonEmpty: 0,
    numericCount: 0,
    uniqueValues: new Map(),
    min: Number.POSITIVE_INFINITY,
    max: Number.NEGATIVE_INFINITY,
    sum: 0,
  }));

  const sample = rows.slice(0, CSV_MAX_ROWS);
  for (const row of sample) {
    parseCsvLine(row).forEach((value, i) => {
      const stat = columns[i];
      if (!stat || value === "") return;
      stat.nonEmpty++;
      if (stat.uniqueValues.size < UNIQUE_CAP || stat.uniqueValues.has(value)) {
        stat.uniqueValues.set(value, (stat.uniqueValues.get(value) ?? 0) + 1);
      }
      if (NUMBER_RE.test(value)) {
        const num = Number(value);
        stat.numericCount++;
        stat.sum += num;
        stat.min = Math.min(stat.min, num);
        stat.max = Math.max(stat.max, num);
      }
    });
  }

  return { rowCount: sample.length, headers, columns };
}

export function columnType(stat: ColumnStats): ColumnType {
  if (stat.numericCount > Math.floor(stat.nonEmpty / 2)) return "Numeric";
  if (stat.uniqueValues.size <= 10) return "Categorical";
  return "Text";
}

export function formatCsvAnalysis(fileName: string, analysis: CsvAnalysis): string {
  const lines = [
    `## CSV Analysis: ${fileName}`,
    "",
    `- Rows: ${analysis.rowCount}`,
    `- Columns: ${analysis.headers.length}`,
    "",
    "| Column | Type | Non-Empty | Unique | Min | Max | Avg |",
    "|--------|------|-----------|--------|-----|-----|-----|",
  ];

  for (const stat of analysis.columns) {
    const unique = stat.uniqueValues.size >= UNIQUE_CAP ? `${UNIQUE_CAP}+` : String(stat.uniqueValues.size);
    const [min, max, avg] =
      stat.numericCount > 0
        ? [stat.min.toFixed(2), stat.max.toFixed(2), (stat.sum / stat.numericCount).toFixed(2)]
        : ["-", "-", "-"];
    const name = stat.name.length > 20 ? `${stat.name.slice(0, 17)}...` : stat.name;
    lines.push(`| ${name} | ${columnType(stat)} | ${stat.nonEmpty} | ${unique} | ${min} | ${max} | ${avg} |`);
  }

  const categoricals = analysis.columns
    .filter((stat) => columnType(stat) === "Categorical" && stat.uniqueValues.size > 0)
    .slice(0, 3);
  if (categoricals.length > 0) {
    lines.push("", "Categorical values:");
    for (const stat of categoricals) {
      const values = [...stat.uniqueValues.keys()].slice(0, 5).map((v) => `"${v}"`);
      lines.push(`- ${stat.name}: ${values.join(", ")}`);
    }
  }

  return lines.join("\n");
}

const GUIDANCE = 'Please specify a CSV file to analyze.\n\nExample: "analyze sales_data.csv"';

export class CsvAnalyzerSkill implements Skill {
  readonly descriptor: SkillDescriptor = {
    id: "csv_analyzer",
    name: "CSV Analyzer",
    description: "Show the structure and column statistics of a CSV file",
    modes: ["data"],
    permissionLevel: "Safe",
  };

  async execute(input: SkillInput, ctx: SkillContext): Promise<SkillOutput> {
    const requested = stringParam(input.params, "path") ?? input.query.split(/\s+/).find((word) => word.toLowerCase().endsWith(".csv"));
    if (!requested) return textOutput(GUIDANCE);

    const file = resolveSkillPath(ctx, requested);
    if (!isPathAllowed(file, ctx.allowList, { cwd: ctx.workingDir, homeDir: ctx.homeDir })) {
      return errorOutput(`${file} is outside the folders Little Helper may read.`);
    }

    let content: string;
    try {
      content = await fs.readFile(file, "utf-8");
    } catch (err) {
      return errorOutput(`Could not read ${file}: ${describeError(err)}`);
    }

    const analysis = analyzeCsv(content);
    if (!analysis) return errorOutput(`${path.basename(file)} is empty.`);

    return {
      resultType: "data",
      text: formatCsvAnalysis(path.basename(file), analysis),
      data: {
        file,
        rowCount: analysis.rowCount,
        columnCount: analysis.headers.length,
        columns: analysis.headers,
      },
    };
  }
}
