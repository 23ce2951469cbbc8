import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { mkdir, mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import path from "node:path";
import { Converter } from "../converter";
import { Logger, Tracker, loadDefaultConfig } from "../utils";
import { NAV_SNIPPET_FILENAME, STATS_FILENAME } from "./writer";
import type { ConversionConfig } from "../types";

describe("write", () => {
  let root: string;
  let config: ConversionConfig;

  async function writeIr(relativePath: string, ir: object): Promise<void> {
    const filePath = path.join(config.input, relativePath);
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, JSON.stringify(ir));
  }

  async function readOutput(relativePath: string): Promise<string> {
    return readFile(path.join(config.output, relativePath), "utf-8");
  }

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), "docnorm-"));
    config = await loadDefaultConfig();
    config.input = path.join(root, "ir");
    config.output = path.join(root, "docs");
    config.markdown.frontMatter = false;
    config.report.mkdocsNav = true;

    await writeIr("manuals/guide.docx.ir.json", {
      title: "User Guide",
      converter: "docx",
      blocks: [
        { kind: "heading", level: 1, text: "User Guide" },
        {
          kind: "paragraph",
          runs: [
            { kind: "text", text: "See " },
            { kind: "link", targetRef: "setup.docx", displayText: "setup" },
          ],
        },
        { kind: "image", sourceRef: "rId1", altText: "Logo" },
      ],
      assets: { rId1: Buffer.from([137, 80]).toString("base64") },
    });
    await writeIr("manuals/setup.docx.ir.json", {
      blocks: [{ kind: "heading", level: 1, text: "Setup" }],
    });
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  async function convert(tracker = new Tracker()): Promise<void> {
    await new Converter(config, { logger: new Logger("silent"), tracker }).convert();
  }

  it("writes pages with relocated images and rewritten links", async () => {
    await convert();

    expect(await readOutput("user-guide.md")).toBe(
      "# User Guide {#user-guide}\n\nSee [setup](setup.md)\n\n![Logo](assets/user-guide/001.png)\n",
    );
    expect(await readOutput("setup.md")).toBe("# Setup {#setup}\n");

    const image = await readFile(
      path.join(config.output, "assets/user-guide/001.png"),
    );
    expect(Array.from(image)).toEqual([137, 80]);
  });

  it("writes the report, stats and nav snippet", async () => {
    await convert();

    const report = JSON.parse(await readOutput(config.report.filename));
    expect(report.total_files).toBe(2);
    expect(report.successful).toBe(2);
    expect(report.files[0].output_file).toBe("user-guide.md");
    expect(report.files[0].converter_used).toBe("docx");

    const stats = JSON.parse(await readOutput(STATS_FILENAME));
    expect(stats.summary.resolvedDocuments).toBe(2);
    expect(stats.summary.relocatedImages).toBe(1);

    expect(await readOutput(NAV_SNIPPET_FILENAME)).toBe(
      'nav:\n  - "Setup": setup.md\n  - "User Guide": user-guide.md\n',
    );
  });

  it("adds front matter when enabled", async () => {
    config.markdown.frontMatter = true;
    await convert();

    const page = await readOutput("setup.md");
    expect(page.split("\n").slice(0, 3)).toEqual([
      "---",
      'title: "Setup"',
      'source: "manuals/setup.docx"',
    ]);
    expect(page.endsWith("---\n\n# Setup {#setup}\n")).toBe(true);
  });

  it("reports a malformed IR file as a failed document", async () => {
    await writeIr("broken.pdf.ir.json", { blocks: "nope" });
    await convert();

    const report = JSON.parse(await readOutput(config.report.filename));
    expect(report.failed).toBe(1);
    expect(report.files[0].source_file).toBe("broken.pdf");
    expect(report.files[0].output_file).toBeNull();
  });

  it("falls back to the built-in template when the custom one does not parse", async () => {
    const templatePath = path.join(root, "page.hbs");
    await writeFile(templatePath, "{{#if title}}\n{{{content}}}\n");
    config.markdown.fileTemplate = templatePath;
    const tracker = new Tracker();

    await convert(tracker);

    expect(await readOutput("setup.md")).toBe("# Setup {#setup}\n");
    expect(tracker.getIssues("resource").map((issue) => issue.path)).toEqual([
      templatePath,
    ]);
  });

  it("marks a document failed when its page cannot be written", async () => {
    await mkdir(path.join(config.output, "setup.md"), { recursive: true });
    const tracker = new Tracker();

    await convert(tracker);

    const report = JSON.parse(await readOutput(config.report.filename));
    expect(report.successful).toBe(1);
    expect(report.failed).toBe(1);
    expect(report.files[1].source_file).toBe("manuals/setup.docx");
    expect(report.files[1].success).toBe(false);
    expect(report.files[1].output_file).toBeNull();
    expect(report.files[1].errors[0]).toMatch(/^failed to write setup\.md: /);
    expect(tracker.getStats().failedDocuments).toBe(1);
    expect(await readOutput(NAV_SNIPPET_FILENAME)).toBe(
      'nav:\n  - "User Guide": user-guide.md\n',
    );
  });
});
