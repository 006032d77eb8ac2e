/**
 * file_organize: archive, move, copy and sort files. Never deletes.
 *
 * Deletion requests are detected by keyword and refused with a structured
 * "deletion_refused" result that offers archive / move instead.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { describeError } from "../errors.js";
import { SafeFileOps } from "./safe-file-ops.js";
import {
  errorOutput,
  resolveSkillPath,
  stringParam,
  textOutput,
  type FileResult,
  type Skill,
  type SkillContext,
  type SkillDescriptor,
  type SkillInput,
  type SkillOutput,
} from "./types.js";

const DELETE_PATTERNS = [
  "delete",
  "remove",
  "erase",
  "trash",
  "get rid of",
  "throw away",
  "eliminate",
  "destroy",
  "wipe",
  "clear out",
  "purge",
  "discard",
  "dispose",
  "rm ",
  "rm -",
  "unlink",
];

export function isDeletionRequest(query: string): boolean {
  const lower = query.toLowerCase();
  return DELETE_PATTERNS.some((pattern) => lower.includes(pattern));
}

type OrganizeAction = "archive" | "move" | "copy" | "organize" | "unknown";

export function parseOrganizeAction(query: string): OrganizeAction {
  const lower = query.toLowerCase();
  if (lower.includes("archive")) return "archive";
  if (lower.includes("move") || lower.includes("rename")) return "move";
  if (lower.includes("copy") || lower.includes("duplicate")) return "copy";
  if (lower.includes("organize") || lower.includes("sort")) return "organize";
  return "unknown";
}

/**
 * First quoted span, else the first word that looks like a file name.
 */
export function extractFilePath(query: string): string | undefined {
  const start = query.indexOf('"');
  const end = query.lastIndexOf('"');
  if (start >= 0 && end > start) return query.slice(start + 1, end);

  for (const word of query.split(/\s+/)) {
    const clean = word.replace(/^[^\w./\\~-]+|[^\w./\\-]+$/g, "");
    if (clean.includes(".") && !clean.startsWith(".") && clean.length > 2) return clean;
  }
  return undefined;
}

function refusal(filePath: string): SkillOutput {
  const text = [
    "I can't delete files. That's a safety feature to protect your data.",
    "",
    "Instead, I can:",
    "- **Archive** the file (moves it to a dated archive folder)",
    "- **Move** it to a different location",
    "",
    filePath ? `Would you like me to archive '${filePath}' instead?` : "Tell me which file to archive instead.",
  ].join("\n");
  return {
    resultType: "text",
    text,
    data: { action: "deletion_refused", reason: "no_delete_policy", alternative: "archive", file_path: filePath },
    suggestedActions: filePath
      ? [
          { label: "Archive instead", skillId: "file_organize", params: { path: filePath, action: "archive" } },
          { label: "Move to different folder", skillId: "file_organize", params: { path: filePath, action: "move" } },
        ]
      : [],
  };
}

const GUIDANCE = [
  "How would you like to organize your files?",
  "",
  "- **Archive** files (stored safely with a timestamp)",
  "- **Move** files to different folders",
  "- **Copy** files to backup locations",
  "- **Organize** a folder into subfolders by file type",
  "",
  'Examples: "archive old_report.pdf", "move report.pdf to ~/Documents/2024/"',
].join("\n");

export class FileOrganizeSkill implements Skill {
  readonly descriptor: SkillDescriptor = {
    id: "file_organize",
    name: "Organize Files",
    description: "Safely organize, move, copy and archive files (no deletion; files are always preserved)",
    modes: ["find", "fix"],
    permissionLevel: "Sensitive",
  };

  private readonly archiveRoot: string;

  constructor(archiveRoot: string) {
    this.archiveRoot = archiveRoot;
  }

  async execute(input: SkillInput, ctx: SkillContext): Promise<SkillOutput> {
    const { query, params } = input;
    if (!query.trim() && Object.keys(params).length === 0) {
      return textOutput(GUIDANCE);
    }

    if (isDeletionRequest(query)) {
      return refusal(stringParam(params, "path") ?? extractFilePath(query) ?? "");
    }

    const requested = stringParam(params, "action");
    const action: OrganizeAction =
      requested === "archive" || requested === "move" || requested === "copy" || requested === "organize"
        ? requested
        : parseOrganizeAction(query);
    const source = stringParam(params, "path") ?? extractFilePath(query);
    const destination = stringParam(params, "destination");
    const ops = new SafeFileOps(this.archiveRoot, ctx.allowList, {
      auditor: ctx.auditor,
      cwd: ctx.workingDir,
      homeDir: ctx.homeDir,
    });
    const resolve = (p: string) => resolveSkillPath(ctx, p);

    try {
      switch (action) {
        case "archive": {
          if (!source) return textOutput('Please specify which file to archive.\n\nExample: "archive old_report.pdf"');
          const from = resolve(source);
          const result = await ops.archive(from);
          const to = result.kind === "archived" ? result.to : from;
          return {
            resultType: "files",
            text: `Archived '${path.basename(from)}'\n\nThe file has been moved to:\n${to}\n\nYou can restore it anytime from the archive.`,
            files: [{ path: to, action: result }],
            data: { action: "archived", original_path: from, archive_path: to },
          };
        }

        case "move":
        case "copy": {
          const verb = action === "move" ? "move" : "copy";
          if (!source) return textOutput(`Please specify the file to ${verb} and where it should go.`);
          if (!destination) return textOutput(`Where would you like to ${verb} '${path.basename(source)}'?`);
          const from = resolve(source);
          const target = await intoDirectory(resolve(destination), path.basename(from));
          const result = action === "move" ? await ops.moveFile(from, target) : await ops.copyFile(from, target);
          const past = action === "move" ? "Moved" : "Copied";
          return {
            resultType: "files",
            text: `${past} '${path.basename(from)}'\n\nFrom: ${from}\nTo: ${target}`,
            files: [{ path: target, action: result }],
            data: { action: action === "move" ? "moved" : "copied", from, to: target },
          };
        }

        case "organize": {
          const folder = resolve(source ?? ".");
          const files = await organizeByExtension(ops, folder);
          if (files.length === 0) return textOutput(`Nothing to organize in ${folder}.`);
          return {
            resultType: "files",
            text: `Organized ${files.length} file${files.length === 1 ? "" : "s"} in ${folder} into folders by type.`,
            files,
          };
        }

        case "unknown":
          return textOutput(GUIDANCE);
      }
    } catch (err) {
      return errorOutput(`Failed to ${action} file: ${describeError(err)}`);
    }
  }
}

async function intoDirectory(dest: string, fileName: string): Promise<string> {
  try {
    const stat = await fs.stat(dest);
    return stat.isDirectory() ? path.join(dest, fileName) : dest;
  } catch {
    return dest;
  }
}

/** Move top-level files of `folder` into <folder>/<ext>/ subfolders */
async function organizeByExtension(ops: SafeFileOps, folder: string): Promise<FileResult[]> {
  const entries = await fs.readdir(folder, { withFileTypes: true });
  const results: FileResult[] = [];
  for (const entry of entries) {
    if (!entry.isFile() || entry.name.startsWith(".")) continue;
    const ext = path.extname(entry.name).slice(1).toLowerCase() || "other";
    const target = path.join(folder, ext, entry.name);
    const action = await ops.moveFile(path.join(folder, entry.name), target);
    results.push({ path: target, action });
  }
  return results;
}
