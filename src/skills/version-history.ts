/**
 * version_history: earlier copies of a file kept in the archive.
 *
 * Every archive made through SafeFileOps lands in
 * <archiveRoot>[/<subdir>]/YYYYMMDD_HHMMSS/<name>, so the versions of a file
 * are the archived files with the same name. Available in every mode.
 */

import fs from "node:fs/promises";
import type { Dirent } from "node:fs";
import path from "node:path";
import { MODES } from "../session.js";
import {
  resolveSkillPath,
  stringParam,
  textOutput,
  type Skill,
  type SkillContext,
  type SkillDescriptor,
  type SkillInput,
  type SkillOutput,
} from "./types.js";

const ARCHIVE_FOLDER_RE = /^(\d{4})(\d{2})(\d{2})_(\d{2})(\d{2})(\d{2})$/;
const MAX_DEPTH = 4;

export interface FileVersion {
  version: number;
  path: string;
  sizeBytes: number;
  /** "YYYY-MM-DD HH:MM:SS" from the archive folder; absent for the live file */
  archivedAt?: string;
  isCurrent: boolean;
}

export function archiveFolderTime(folderName: string): string | undefined {
  const m = ARCHIVE_FOLDER_RE.exec(folderName);
  if (!m) return undefined;
  return `${m[1]}-${m[2]}-${m[3]} ${m[4]}:${m[5]}:${m[6]}`;
}

export function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

async function collectArchived(dir: string, name: string, depth: number, found: { path: string; folder: string }[]): Promise<void> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch {
    // No archive yet, or an unreadable folder
    return;
  }
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isFile() && entry.name === name && archiveFolderTime(path.basename(dir))) {
      found.push({ path: full, folder: path.basename(dir) });
    } else if (entry.isDirectory() && depth < MAX_DEPTH) {
      await collectArchived(full, name, depth + 1, found);
    }
  }
}

/** Archived copies oldest first, then the live file when it still exists */
export async function listVersions(archiveRoot: string, file: string): Promise<FileVersion[]> {
  const found: { path: string; folder: string }[] = [];
  await collectArchived(archiveRoot, path.basename(file), 1, found);
  found.sort((a, b) => a.folder.localeCompare(b.folder) || a.path.localeCompare(b.path));

  const versions: FileVersion[] = [];
  for (const item of found) {
    const stat = await fs.stat(item.path);
    versions.push({
      version: versions.length + 1,
      path: item.path,
      sizeBytes: stat.size,
      archivedAt: archiveFolderTime(item.folder),
      isCurrent: false,
    });
  }

  try {
    const stat = await fs.stat(file);
    if (stat.isFile()) {
      versions.push({ version: versions.length + 1, path: file, sizeBytes: stat.size, isCurrent: true });
    }
  } catch {
    // The live file may itself have been archived
  }
  return versions;
}

export function formatVersions(fileName: string, versions: readonly FileVersion[]): string {
  if (versions.length === 0) {
    return `No saved versions of '${fileName}'.\n\nA version is kept whenever the file is archived.`;
  }
  const lines = [`Version history for '${fileName}'`, `${versions.length} version${versions.length === 1 ? "" : "s"}`, ""];
  for (const v of versions) {
    const when = v.isCurrent ? "current" : v.archivedAt;
    lines.push(`  Version ${v.version} (${when}), ${formatSize(v.sizeBytes)}`, `    ${v.path}`);
  }
  return lines.join("\n");
}

export class VersionHistorySkill implements Skill {
  readonly descriptor: SkillDescriptor = {
    id: "version_history",
    name: "Version History",
    description: "List the archived versions of a file",
    modes: MODES,
    permissionLevel: "Safe",
  };

  private readonly archiveRoot: string;

  constructor(archiveRoot: string) {
    this.archiveRoot = archiveRoot;
  }

  async execute(input: SkillInput, ctx: SkillContext): Promise<SkillOutput> {
    const requested = stringParam(input.params, "path") ?? input.query.trim();
    if (!requested) {
      return textOutput('Which file? Example: "show versions of report.docx"');
    }
    const file = resolveSkillPath(ctx, requested);
    const fileName = path.basename(file);
    const versions = await listVersions(this.archiveRoot, file);
    return {
      resultType: "data",
      text: formatVersions(fileName, versions),
      data: { filePath: file, fileName, versionCount: versions.length, versions },
    };
  }
}
