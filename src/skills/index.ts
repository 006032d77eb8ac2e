import path from "node:path";
import { AuditLogger } from "./audit.js";
import { CsvAnalyzerSkill } from "./csv-analyzer.js";
import { DeviceInfoSkill } from "./device-info.js";
import { ErrorExplainerSkill } from "./error-explainer.js";
import { FileOrganizeSkill } from "./file-organize.js";
import { FuzzySearchSkill } from "./fuzzy-search.js";
import { loadSkillsFromDir, type LoadSkillsOptions } from "./library.js";
import { SkillRegistry } from "./registry.js";
import { SourceEvaluatorSkill } from "./source-evaluator.js";
import { SpecCheckSkill } from "./spec-check.js";
import { TextPolisherSkill } from "./text-polisher.js";
import { VersionHistorySkill } from "./version-history.js";

export * from "./types.js";
export * from "./audit.js";
export * from "./registry.js";
export * from "./safe-file-ops.js";
export * from "./file-organize.js";
export * from "./fuzzy-search.js";
export * from "./device-info.js";
export * from "./error-explainer.js";
export * from "./source-evaluator.js";
export * from "./csv-analyzer.js";
export * from "./text-polisher.js";
export * from "./spec-check.js";
export * from "./version-history.js";
export * from "./library.js";

/**
 * Registry with the built-in skills, plus instruction skills from
 * `libraryDir` when given.
 */
export async function createDefaultSkillRegistry(params: {
  dataDir: string;
  libraryDir?: string;
  onWarning?: LoadSkillsOptions["onWarning"];
}): Promise<SkillRegistry> {
  const archiveRoot = path.join(params.dataDir, "archive");
  const registry = new SkillRegistry();
  registry.register(new FileOrganizeSkill(archiveRoot));
  registry.register(new FuzzySearchSkill());
  registry.register(new DeviceInfoSkill());
  registry.register(new ErrorExplainerSkill());
  registry.register(new SourceEvaluatorSkill());
  registry.register(new CsvAnalyzerSkill());
  registry.register(new TextPolisherSkill());
  registry.register(new SpecCheckSkill());
  registry.register(new VersionHistorySkill(archiveRoot));
  if (params.libraryDir) {
    for (const skill of await loadSkillsFromDir(params.libraryDir, { onWarning: params.onWarning })) {
      if (!registry.get(skill.descriptor.id)) registry.register(skill);
    }
  }
  return registry;
}

export async function openAuditLogger(dataDir: string): Promise<AuditLogger> {
  return AuditLogger.open(path.join(dataDir, "audit"));
}
