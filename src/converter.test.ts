import { beforeEach, describe, it, expect } from "vitest";
import { Converter } from "./converter";
import { Logger, linkHref, loadDefaultConfig } from "./utils";
import type { Block, ConversionConfig, DocumentInput, LinkBlock } from "./types";

function findLink(blocks: Block[]): LinkBlock | undefined {
  return blocks.find((block): block is LinkBlock => block.kind === "link");
}

describe("Converter", () => {
  let config: ConversionConfig;
  let converter: Converter;

  beforeEach(async () => {
    config = await loadDefaultConfig();
    converter = new Converter(config, { logger: new Logger("silent") });
  });

  it("gives documents with the same title distinct names", async () => {
    const { documents } = await converter.run([
      { sourcePath: "b/guide.docx", title: "User Guide", blocks: [] },
      { sourcePath: "a/guide.docx", title: "User Guide", blocks: [] },
    ]);

    expect(documents.map((doc) => [doc.sourcePath, doc.outputPath])).toEqual([
      ["a/guide.docx", "user-guide.md"],
      ["b/guide.docx", "user-guide-2.md"],
    ]);
  });

  it("assigns names independently of input order", async () => {
    const inputs: DocumentInput[] = [
      { sourcePath: "z.docx", title: "Guide", blocks: [] },
      { sourcePath: "m.docx", title: "Guide", blocks: [] },
      { sourcePath: "a.docx", title: "Guide", blocks: [] },
    ];

    const forward = await converter.run(inputs);
    const backward = await new Converter(config, {
      logger: new Logger("silent"),
    }).run([...inputs].reverse());

    expect(forward.documents.map((doc) => doc.outputPath)).toEqual([
      "guide.md",
      "guide-2.md",
      "guide-3.md",
    ]);
    expect(backward.documents.map((doc) => doc.outputPath)).toEqual(
      forward.documents.map((doc) => doc.outputPath),
    );
  });

  it("repairs skipped heading levels and scores the warning", async () => {
    const { documents } = await converter.run([
      {
        sourcePath: "guide.docx",
        blocks: [
          { kind: "heading", level: 1, text: "Guide" },
          { kind: "heading", level: 2, text: "Setup" },
          { kind: "heading", level: 4, text: "Details" },
        ],
      },
    ]);

    const [doc] = documents;
    expect(doc.headingTree.map((h) => h.level)).toEqual([1, 2, 3]);
    expect(doc.warnings).toHaveLength(1);
    expect(doc.qualityScore).toBe(0.95);
  });

  it("rewrites links between documents of the batch", async () => {
    const { documents, stats } = await converter.run([
      {
        sourcePath: "a.docx",
        title: "a",
        blocks: [
          { kind: "heading", level: 1, text: "A" },
          { kind: "link", targetRef: "b.docx", displayText: "Install", anchor: "Install Steps" },
        ],
      },
      {
        sourcePath: "b.docx",
        title: "b",
        blocks: [
          { kind: "heading", level: 1, text: "B" },
          { kind: "heading", level: 2, text: "Install Steps" },
        ],
      },
    ]);

    const link = findLink(documents[0].blocks);
    expect(link && linkHref(link)).toBe("b.md#install-steps");
    expect(link?.resolved).toBe(true);
    expect(documents[0].warnings).toEqual([]);
    expect(documents[0].qualityScore).toBe(1);
    expect(stats.resolvedLinks).toBe(1);
  });

  it("keeps links to unknown documents and warns", async () => {
    const { documents, stats } = await converter.run([
      {
        sourcePath: "a.docx",
        blocks: [
          { kind: "heading", level: 1, text: "A" },
          { kind: "link", targetRef: "missing.docx", displayText: "Gone" },
        ],
      },
    ]);

    const [doc] = documents;
    expect(doc.status).toBe("resolved");
    expect(doc.warnings).toEqual(["unresolved internal link: missing.docx"]);
    expect(doc.qualityScore).toBe(0.95);
    expect(findLink(doc.blocks)?.targetRef).toBe("missing.docx");
    expect(stats.unresolvedLinks).toBe(1);
  });

  it("isolates a failed extraction from the rest of the batch", async () => {
    const inputs: DocumentInput[] = ["d1", "d2", "d3", "d4", "d5"].map(
      (name): DocumentInput => ({
        sourcePath: `${name}.docx`,
        success: name !== "d3",
        blocks: [{ kind: "heading", level: 1, text: name }],
      }),
    );

    const { documents, report } = await converter.run(inputs);

    expect(report.total).toBe(5);
    expect(report.successful).toBe(4);
    expect(report.failed).toBe(1);
    expect(report.averageQualityScore).toBe(0.8);
    expect(documents[2]).toMatchObject({
      sourcePath: "d3.docx",
      status: "failed",
      outputPath: null,
      errors: ["extraction failed"],
    });
  });

  it("fails a malformed input without rejecting the batch", async () => {
    const { report } = await converter.run([
      { sourcePath: "good.docx", blocks: [] },
      JSON.parse('{"sourcePath":"bad.docx","title":42,"warnings":5,"blocks":[]}'),
    ]);

    expect(report.total).toBe(2);
    expect(report.successful).toBe(1);
    expect(report.failed).toBe(1);
    expect(report.documents[0]).toMatchObject({ sourcePath: "bad.docx", outputPath: null });
  });

  it("cancels every document when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();

    const { documents, report, stats } = await converter.run(
      [
        { sourcePath: "a.docx", blocks: [] },
        { sourcePath: "b.docx", blocks: [] },
        { sourcePath: "c.docx", blocks: [] },
      ],
      { signal: controller.signal },
    );

    expect(documents.every((doc) => doc.status === "failed")).toBe(true);
    expect(documents[0].errors).toEqual(["cancelled"]);
    expect(report.failed).toBe(3);
    expect(stats.cancelledDocuments).toBe(3);
  });

  it("does not resolve links once the batch is cancelled mid-run", async () => {
    const controller = new AbortController();
    config.batch.concurrency = 1;
    queueMicrotask(() => controller.abort());

    const { documents, stats } = await converter.run(
      [
        { sourcePath: "a.docx", blocks: [] },
        { sourcePath: "b.docx", blocks: [] },
        { sourcePath: "c.docx", blocks: [] },
      ],
      { signal: controller.signal },
    );

    expect(documents.map((doc) => doc.outputPath)).toEqual([null, null, null]);
    expect(stats.cancelledDocuments).toBe(3);
    expect(stats.resolvedDocuments).toBe(0);
  });

  it("reports which step is running", async () => {
    const steps: string[] = [];
    const tracked = new Converter(config, {
      logger: new Logger("silent"),
      onStep: (step) => steps.push(step),
    });

    await tracked.run([{ sourcePath: "a.docx", blocks: [] }]);

    expect(steps).toEqual(["process", "resolve"]);
  });
});
