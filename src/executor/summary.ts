/**
 * One-line human summaries for command results.
 *
 * Advisory only: the raw CommandResult stays the authority. Rules are tried in
 * table order; the first whose head matches and returns a value wins.
 */

export interface SummaryInput {
  command: string;
  output: string;
  stderr: string;
  success: boolean;
  durationMs: number;
}

type SummaryRule = {
  heads: string[];
  summarize: (input: SummaryInput) => string | undefined;
};

function countNonEmptyLines(text: string): number {
  return text.split("\n").filter((line) => line.trim().length > 0).length;
}

function countLines(text: string): number {
  return text.length === 0 ? 0 : text.split("\n").length;
}

const SUMMARY_RULES: SummaryRule[] = [
  {
    heads: ["ls", "find", "tree", "dir"],
    summarize: ({ output, durationMs }) => `Found ${countNonEmptyLines(output)} items (${durationMs}ms)`,
  },
  {
    heads: ["grep", "rg", "ag", "findstr"],
    summarize: ({ output, durationMs }) => {
      const matches = countNonEmptyLines(output);
      return matches === 0 ? "No matches found" : `Found ${matches} matches (${durationMs}ms)`;
    },
  },
  {
    heads: ["cat", "head", "tail", "type"],
    summarize: ({ output, durationMs }) => `Displayed ${countLines(output)} lines (${durationMs}ms)`,
  },
  { heads: ["cp", "mv", "copy", "move"], summarize: () => "File operation complete" },
  { heads: ["mkdir", "md"], summarize: () => "Directory created" },
  { heads: ["rm", "rmdir", "del"], summarize: () => "Deleted successfully" },
  {
    heads: ["git status"],
    summarize: ({ output }) => (output.includes("nothing to commit") ? "Working tree clean" : "Changes detected"),
  },
  { heads: ["git commit"], summarize: () => "Committed successfully" },
  { heads: ["git push"], summarize: () => "Pushed to remote" },
  { heads: ["git"], summarize: ({ durationMs }) => `Git operation complete (${durationMs}ms)` },
  {
    heads: ["cargo build"],
    summarize: ({ output }) => (output.includes("Finished") ? "Build complete" : "Build in progress..."),
  },
  {
    heads: ["cargo test"],
    summarize: ({ output }) => (output.includes("passed") ? "Tests passed" : "Tests complete"),
  },
];

function matchesHead(command: string, head: string): boolean {
  return command === head || command.startsWith(`${head} `);
}

function summarizeFailure(input: SummaryInput): string {
  const { stderr, command, durationMs } = input;
  if (stderr.includes("command not found") || stderr.includes("not recognized as")) {
    const program = command.trim().split(/\s+/)[0] ?? command;
    return `'${program}' is not installed`;
  }
  if (stderr.includes("No such file")) return "File or directory not found";
  if (stderr.includes("Permission denied")) return "Permission denied - may need admin access";
  return `Command failed (${durationMs}ms)`;
}

export function summarizeResult(input: SummaryInput): string {
  if (!input.success) return summarizeFailure(input);

  const command = input.command.trim().toLowerCase();
  for (const rule of SUMMARY_RULES) {
    if (!rule.heads.some((head) => matchesHead(command, head))) continue;
    const summary = rule.summarize(input);
    if (summary) return summary;
  }
  return `Complete (${input.durationMs}ms)`;
}
