/**
 * spec_check: report the state of a spec-kit project folder.
 *
 * A folder counts as spec-driven when it has a specs/ directory or a
 * CONSTITUTION.md. Each entry under specs/ is listed with the documents it
 * has so far (spec, plan, tasks).
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

export interface SpecEntry {
  name: string;
  documents: string[];
}

export interface SpecProjectStatus {
  folder: string;
  hasConstitution: boolean;
  hasSpecsDir: boolean;
  hasConfig: boolean;
  specs: SpecEntry[];
}

const SPEC_DOCUMENTS = ["spec", "plan", "tasks"] as const;

async function exists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}

export async function inspectSpecProject(folder: string): Promise<SpecProjectStatus> {
  const specsDir = path.join(folder, "specs");
  const [hasConstitution, hasSpecsDir, hasConfig] = await Promise.all([
    exists(path.join(folder, "CONSTITUTION.md")),
    exists(specsDir),
    exists(path.join(folder, ".speckit")),
  ]);

  const specs: SpecEntry[] = [];
  if (hasSpecsDir) {
    const entries = await fs.readdir(specsDir, { withFileTypes: true });
    for (const entry of entries.filter((e) => e.isDirectory()).sort((a, b) => a.name.localeCompare(b.name))) {
      const documents: string[] = [];
      for (const doc of SPEC_DOCUMENTS) {
        if (await exists(path.join(specsDir, entry.name, `${doc}.md`))) documents.push(doc);
      }
      specs.push({ name: entry.name, documents });
    }
  }

  return { folder, hasConstitution, hasSpecsDir, hasConfig, specs };
}

export function formatSpecStatus(status: SpecProjectStatus): string {
  if (!status.hasSpecsDir && !status.hasConstitution) {
    return [
      "This doesn't look like a spec-driven project.",
      "",
      `Folder: ${status.folder}`,
      "",
      "Missing:",
      "- specs/ directory",
      "- CONSTITUTION.md",
    ].join("\n");
  }

  const lines = [`Project folder: ${status.folder}`, ""];
  lines.push(status.hasConstitution ? "CONSTITUTION.md: found" : "CONSTITUTION.md: missing (recommended)");
  if (status.hasSpecsDir) {
    lines.push(`Specs: ${status.specs.length} found`);
    for (const spec of status.specs) {
      lines.push(`  - ${spec.name}: [${spec.documents.join(", ")}]`);
    }
  } else {
    lines.push("Specs: none (create a specs/ directory)");
  }
  if (status.hasConfig) lines.push("", "Spec Kit config: found");
  return lines.join("\n");
}

export class SpecCheckSkill implements Skill {
  readonly descriptor: SkillDescriptor = {
    id: "spec_check",
    name: "Spec Check",
    description: "Show which specs, plans and task lists a project folder has",
    modes: ["build"],
    permissionLevel: "Safe",
  };

  async execute(input: SkillInput, ctx: SkillContext): Promise<SkillOutput> {
    const requested = stringParam(input.params, "folder") ?? stringParam(input.params, "directory");
    const folder = requested ? resolveSkillPath(ctx, requested) : ctx.workingDir;
    if (!isPathAllowed(folder, ctx.allowList, { cwd: ctx.workingDir, homeDir: ctx.homeDir })) {
      return errorOutput(`${folder} is outside the folders Little Helper may read.`);
    }

    let status: SpecProjectStatus;
    try {
      status = await inspectSpecProject(folder);
    } catch (err) {
      return errorOutput(`Could not inspect ${folder}: ${describeError(err)}`);
    }
    if (!status.hasSpecsDir && !status.hasConstitution) return textOutput(formatSpecStatus(status));
    return { resultType: "mixed", text: formatSpecStatus(status), data: status };
  }
}
