import { describe, it, expect } from "vitest";
import { linkHref, normalizeWhitespace, renderMarkdown } from "./render-markdown";
import type { RenderOptions } from "./render-markdown";
import type { Block } from "../types";

const options: RenderOptions = {
  markdown: { headingIds: true, emphasis: "_", strong: "**" },
  outputPath: "user-guide.md",
};

describe("renderMarkdown", () => {
  it("renders headings with their ids", () => {
    const blocks: Block[] = [{ kind: "heading", level: 2, text: "Setup", id: "setup" }];
    expect(renderMarkdown(blocks, options)).toBe("## Setup {#setup}\n");
  });

  it("omits heading ids when disabled", () => {
    const blocks: Block[] = [{ kind: "heading", level: 1, text: "Guide", id: "guide" }];
    const plain = { ...options, markdown: { ...options.markdown, headingIds: false } };
    expect(renderMarkdown(blocks, plain)).toBe("# Guide\n");
  });

  it("renders inline formatting and links", () => {
    const blocks: Block[] = [
      {
        kind: "paragraph",
        runs: [
          { kind: "text", text: "Hello " },
          { kind: "text", text: "bold", bold: true },
          { kind: "text", text: " and " },
          { kind: "text", text: "it", italic: true },
          { kind: "text", text: " " },
          { kind: "text", text: "x()", code: true },
          { kind: "text", text: ", see " },
          {
            kind: "link",
            targetRef: "b.md",
            anchor: "install-steps",
            displayText: "Install",
            resolved: true,
          },
        ],
      },
    ];

    expect(renderMarkdown(blocks, options)).toBe(
      "Hello **bold** and _it_ `x()`, see [Install](b.md#install-steps)\n",
    );
  });

  it("points images at their relocated path", () => {
    const blocks: Block[] = [
      {
        kind: "image",
        sourceRef: "media/image1.png",
        altText: "Logo",
        assignedPath: "assets/user-guide/001.png",
      },
      { kind: "image", sourceRef: "https://example.com/x.png", altText: "" },
    ];

    expect(renderMarkdown(blocks, options)).toBe(
      "![Logo](assets/user-guide/001.png)\n\n![](https://example.com/x.png)\n",
    );
  });

  it("renders GFM tables with escaped pipes and padded rows", () => {
    const blocks: Block[] = [
      { kind: "table", rows: [["Name", "Value"], ["a|b", "1"], ["c"]] },
    ];

    expect(renderMarkdown(blocks, options)).toBe(
      ["| Name | Value |", "| --- | --- |", "| a\\|b | 1 |", "| c |  |", ""].join("\n"),
    );
  });

  it("separates blocks with one blank line and skips empty tables", () => {
    const blocks: Block[] = [
      { kind: "heading", level: 1, text: "Guide", id: "guide" },
      { kind: "table", rows: [] },
      { kind: "link", targetRef: "b.md", displayText: "B", resolved: true },
    ];

    expect(renderMarkdown(blocks, options)).toBe("# Guide {#guide}\n\n[B](b.md)\n");
  });
});

describe("linkHref", () => {
  it("wraps destinations containing spaces", () => {
    expect(
      linkHref({ kind: "link", targetRef: "My File.docx", displayText: "x", resolved: false }),
    ).toBe("<My File.docx>");
  });

  it("keeps an existing fragment instead of appending the anchor", () => {
    expect(
      linkHref({
        kind: "link",
        targetRef: "b.docx#Setup",
        anchor: "Setup",
        displayText: "x",
        resolved: false,
      }),
    ).toBe("b.docx#Setup");
  });

  it("renders same-document anchors", () => {
    expect(
      linkHref({ kind: "link", targetRef: "", anchor: "setup", displayText: "x", resolved: true }),
    ).toBe("#setup");
  });
});

describe("normalizeWhitespace", () => {
  it("strips trailing spaces and keeps at most two blank lines", () => {
    expect(normalizeWhitespace("a  \n\n\n\n\nb\n\n")).toBe("a\n\n\nb\n");
  });

  it("ends with exactly one newline", () => {
    expect(normalizeWhitespace("text")).toBe("text\n");
  });
});
