import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createAllowList } from "../src/safety/allow-list.js";
import { MODES } from "../src/session.js";
import { createDefaultSkillRegistry } from "../src/skills/index.js";
import { AuditLogger } from "../src/skills/audit.js";
import { DeviceInfoSkill, formatDeviceInfo, type DeviceInfo } from "../src/skills/device-info.js";
import { FileOrganizeSkill, extractFilePath, isDeletionRequest, parseOrganizeAction } from "../src/skills/file-organize.js";
import { FuzzySearchSkill, fuzzyFindFiles, fuzzyScore } from "../src/skills/fuzzy-search.js";
import { extractFrontmatter, formatSkillsForPrompt, loadSkillsFromDir, sanitizeSkillId } from "../src/skills/library.js";
import type { SkillContext } from "../src/skills/types.js";
import { makeTmpDir } from "./helpers.js";

let root: string;
let work: string;
let ctx: SkillContext;

beforeEach(() => {
  root = makeTmpDir("skills-");
  work = path.join(root, "work");
  fs.mkdirSync(work);
  ctx = {
    workingDir: work,
    allowList: createAllowList([work]),
    auditor: new AuditLogger(path.join(root, "audit")),
    mode: "find",
  };
});

afterEach(() => {
  fs.rmSync(root, { recursive: true, force: true });
});

// ============== file_organize ==============

describe("file_organize helpers", () => {
  it("spots deletion wording", () => {
    expect(isDeletionRequest("please get rid of old.txt")).toBe(true);
    expect(isDeletionRequest("Trash this")).toBe(true);
    expect(isDeletionRequest("archive old.txt")).toBe(false);
  });

  it("parses the requested action", () => {
    expect(parseOrganizeAction("archive the report")).toBe("archive");
    expect(parseOrganizeAction("rename a.txt")).toBe("move");
    expect(parseOrganizeAction("duplicate a.txt")).toBe("copy");
    expect(parseOrganizeAction("sort my downloads")).toBe("organize");
    expect(parseOrganizeAction("hello")).toBe("unknown");
  });

  it("extracts quoted paths first, then file-like words", () => {
    expect(extractFilePath('move "my notes.txt" somewhere')).toBe("my notes.txt");
    expect(extractFilePath("archive report.pdf, please")).toBe("report.pdf");
    expect(extractFilePath("archive .bashrc")).toBeUndefined();
  });
});

describe("FileOrganizeSkill", () => {
  const skill = () => new FileOrganizeSkill(path.join(root, "archive"));

  it("explains itself when asked nothing", async () => {
    const output = await skill().execute({ query: "", params: {} }, ctx);
    expect(output.resultType).toBe("text");
    expect(output.text?.split("\n")[0]).toBe("How would you like to organize your files?");
  });

  it("refuses deletion and offers archive or move", async () => {
    fs.writeFileSync(path.join(work, "report.pdf"), "x");
    const output = await skill().execute({ query: "delete report.pdf", params: {} }, ctx);

    expect(output.data).toEqual({
      action: "deletion_refused",
      reason: "no_delete_policy",
      alternative: "archive",
      file_path: "report.pdf",
    });
    expect(output.suggestedActions?.map((a) => a.label)).toEqual(["Archive instead", "Move to different folder"]);
    expect(output.text?.split("\n").at(-1)).toBe("Would you like me to archive 'report.pdf' instead?");
    expect(fs.existsSync(path.join(work, "report.pdf"))).toBe(true);
  });

  it("archives into the archive root", async () => {
    fs.writeFileSync(path.join(work, "old.txt"), "old");
    const output = await skill().execute({ query: "", params: { action: "archive", path: "old.txt" } }, ctx);

    expect(output.resultType).toBe("files");
    const archivePath = output.files?.[0]?.path ?? "";
    expect(archivePath.startsWith(path.join(root, "archive") + path.sep)).toBe(true);
    expect(path.basename(archivePath)).toBe("old.txt");
    expect(fs.readFileSync(archivePath, "utf-8")).toBe("old");
    expect(fs.existsSync(path.join(work, "old.txt"))).toBe(false);
  });

  it("moves into an existing folder", async () => {
    fs.writeFileSync(path.join(work, "a.txt"), "a");
    fs.mkdirSync(path.join(work, "dest"));
    const output = await skill().execute({ query: "", params: { action: "move", path: "a.txt", destination: "dest" } }, ctx);

    expect(output.text).toBe(`Moved 'a.txt'\n\nFrom: ${path.join(work, "a.txt")}\nTo: ${path.join(work, "dest", "a.txt")}`);
    expect(fs.existsSync(path.join(work, "dest", "a.txt"))).toBe(true);
  });

  it("asks for a destination when none is given", async () => {
    const output = await skill().execute({ query: "move a.txt", params: {} }, ctx);
    expect(output.text).toBe("Where would you like to move 'a.txt'?");
  });

  it("sorts a folder into subfolders by extension", async () => {
    for (const name of ["a.pdf", "b.txt", "README"]) {
      fs.writeFileSync(path.join(work, name), name);
    }
    const output = await skill().execute({ query: "", params: { action: "organize", path: "." } }, ctx);

    expect(output.text).toBe(`Organized 3 files in ${work} into folders by type.`);
    expect(fs.existsSync(path.join(work, "pdf", "a.pdf"))).toBe(true);
    expect(fs.existsSync(path.join(work, "txt", "b.txt"))).toBe(true);
    expect(fs.existsSync(path.join(work, "other", "README"))).toBe(true);
  });

  it("reports failures as error output", async () => {
    const output = await skill().execute({ query: "", params: { action: "archive", path: "missing.txt" } }, ctx);
    expect(output).toEqual({
      resultType: "error",
      text: `Failed to archive file: Source does not exist: ${path.join(work, "missing.txt")}`,
    });
  });
});

// ============== fuzzy_search ==============

describe("fuzzyScore", () => {
  it("scores exact names as 1", () => {
    expect(fuzzyScore("notes.md", "Notes.md")).toBe(1);
  });

  it("rejects names that do not contain the query in order", () => {
    expect(fuzzyScore("xyz", "report.pdf")).toBeUndefined();
    expect(fuzzyScore("", "report.pdf")).toBeUndefined();
  });

  it("rewards coverage, contiguous runs and prefixes", () => {
    expect(fuzzyScore("REP", "report.pdf")).toBeCloseTo(0.3 * 0.5 + (2 / 3) * 0.4 + 0.1, 6);
  });
});

describe("fuzzy file search", () => {
  beforeEach(() => {
    fs.mkdirSync(path.join(work, "docs"));
    fs.mkdirSync(path.join(work, ".hidden"));
    fs.mkdirSync(path.join(work, "node_modules"));
    fs.writeFileSync(path.join(work, "report.pdf"), "");
    fs.writeFileSync(path.join(work, "docs", "report-old.pdf"), "");
    fs.writeFileSync(path.join(work, ".hidden", "report.pdf"), "");
    fs.writeFileSync(path.join(work, "node_modules", "report.js"), "");
  });

  it("walks subfolders and skips dot entries and node_modules", async () => {
    const matches = await fuzzyFindFiles(work, "report");
    expect(matches.map((m) => m.path)).toEqual([path.join(work, "report.pdf"), path.join(work, "docs", "report-old.pdf")]);
  });

  it("lists matches with rounded scores", async () => {
    const output = await new FuzzySearchSkill().execute({ query: "report", params: {} }, ctx);
    expect(output.text).toBe(
      [
        "Found 2 files matching 'report':",
        "",
        "1. report.pdf (73%)",
        `   ${path.join(work, "report.pdf")}`,
        "2. report-old.pdf (65%)",
        `   ${path.join(work, "docs", "report-old.pdf")}`,
      ].join("\n"),
    );
    expect(output.suggestedActions?.[0]).toEqual({
      label: "Preview report.pdf",
      skillId: "preview",
      params: { path: path.join(work, "report.pdf") },
    });
  });

  it("answers plainly when nothing matches", async () => {
    const skill = new FuzzySearchSkill();
    expect((await skill.execute({ query: "zzz", params: {} }, ctx)).text).toBe("No files found matching 'zzz'");
    expect((await skill.execute({ query: "  ", params: {} }, ctx)).text).toBe("Please provide a search query.");
  });

  it("refuses a working directory outside the allow-list", async () => {
    const output = await new FuzzySearchSkill().execute(
      { query: "report", params: {} },
      { ...ctx, allowList: createAllowList([path.join(root, "elsewhere")]) },
    );
    expect(output).toEqual({ resultType: "error", text: `path ${work} not in allow-list` });
  });
});

// ============== device_info ==============

describe("DeviceInfoSkill", () => {
  it("formats the collected info", async () => {
    const info: DeviceInfo = {
      platform: "linux",
      release: "6.1.0",
      arch: "x64",
      cpuModel: "Test CPU",
      cpuCount: 8,
      totalMemoryGb: 16,
      freeMemoryGb: 7.5,
      uptimeHours: 12.3,
      homeDir: "/home/tester",
    };
    const output = await new DeviceInfoSkill(() => info).execute();

    expect(output.text).toBe(
      "OS: linux 6.1.0 (x64)\nCPU: Test CPU × 8\nMemory: 7.5 GB free of 16 GB\nUptime: 12.3 h\nHome: /home/tester",
    );
    expect(output.text).toBe(formatDeviceInfo(info));
    expect(output.data).toEqual(info);
  });
});

// ============== SKILL.md library ==============

function writeSkill(dir: string, content: string): void {
  fs.mkdirSync(dir, { recursive: true });
  fs.writeFileSync(path.join(dir, "SKILL.md"), content);
}

describe("skill library", () => {
  it("parses single-line frontmatter", () => {
    expect(extractFrontmatter("---\nname: 'notes'\ndescription: \"Take notes\"\n---\nBody text")).toEqual({
      fields: { name: "notes", description: "Take notes" },
      body: "Body text",
    });
    expect(extractFrontmatter("no frontmatter")).toEqual({ fields: {}, body: "no frontmatter" });
  });

  it("sanitizes ids", () => {
    expect(sanitizeSkillId("PDF Tools!")).toBe("pdf_tools");
  });

  it("loads SKILL.md files recursively", async () => {
    const lib = path.join(root, "library");
    writeSkill(path.join(lib, "pdf"), "---\nname: PDF Tools\ndescription: Work with PDFs\nmodes: [find, fix]\n---\n\nUse pdftotext.\n");
    writeSkill(path.join(lib, "group", "Deeper"), "---\ndescription: Nested skill\n---\nNested body");
    writeSkill(path.join(lib, "undocumented"), "---\nname: nothing\n---\nno description");
    writeSkill(path.join(lib, ".secret"), "---\ndescription: hidden\n---\n");

    const skills = await loadSkillsFromDir(lib);
    const byId = new Map(skills.map((s) => [s.descriptor.id, s]));

    expect([...byId.keys()].sort()).toEqual(["deeper", "pdf_tools"]);
    expect(byId.get("pdf_tools")?.descriptor).toEqual({
      id: "pdf_tools",
      name: "PDF Tools",
      description: "Work with PDFs",
      modes: ["find", "fix"],
      permissionLevel: "Safe",
    });
    expect(byId.get("deeper")?.descriptor.modes).toEqual(["find", "fix", "research", "data", "content", "build"]);
    expect((await byId.get("pdf_tools")?.execute())?.text).toBe("Use pdftotext.");
  });

  it("treats a missing library as empty", async () => {
    const onWarning = vi.fn();
    expect(await loadSkillsFromDir(path.join(root, "nope"), { onWarning })).toEqual([]);
    expect(onWarning).not.toHaveBeenCalled();
  });

  it("renders skills for the system prompt", () => {
    expect(
      formatSkillsForPrompt([
        { id: "a", name: "A", description: "Reads <files> & more", modes: ["find"], permissionLevel: "Safe" },
        { id: "b", name: "B", description: "Writes", modes: ["find"], permissionLevel: "Sensitive" },
      ]),
    ).toBe(
      [
        "<available_skills>",
        "  <skill>",
        "    <id>a</id>",
        "    <description>Reads &lt;files&gt; &amp; more</description>",
        "  </skill>",
        "  <skill>",
        "    <id>b</id>",
        "    <description>Writes</description>",
        "    <permission>sensitive</permission>",
        "  </skill>",
        "</available_skills>",
      ].join("\n"),
    );
    expect(formatSkillsForPrompt([])).toBe("");
  });
});

describe("createDefaultSkillRegistry", () => {
  it("registers the built-ins and library skills without replacing them", async () => {
    const lib = path.join(root, "library");
    writeSkill(path.join(lib, "fuzzy"), "---\nname: fuzzy_search\ndescription: Impostor\n---\n");
    writeSkill(path.join(lib, "notes"), "---\ndescription: Take notes\n---\n");

    const registry = await createDefaultSkillRegistry({ dataDir: root, libraryDir: lib });

    expect(registry.list().map((s) => s.id)).toEqual([
      "file_organize",
      "fuzzy_search",
      "device_info",
      "error_explainer",
      "source_evaluator",
      "csv_analyzer",
      "text_polisher",
      "spec_check",
      "version_history",
      "notes",
    ]);
    for (const mode of MODES) {
      expect(registry.forMode(mode).length).toBeGreaterThan(1);
    }
    expect(registry.get("fuzzy_search")).toBeInstanceOf(FuzzySearchSkill);
  });
});
