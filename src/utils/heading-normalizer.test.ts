import { describe, it, expect } from "vitest";
import { normalizeHeadings } from "./heading-normalizer";
import type { Block, HeadingLevel } from "../types";

function heading(level: HeadingLevel, text: string): Block {
  return { kind: "heading", level, text };
}

function levels(blocks: Block[]): number[] {
  return blocks.flatMap((block) => (block.kind === "heading" ? [block.level] : []));
}

describe("normalizeHeadings", () => {
  it("clamps a level jump to the next level", () => {
    const result = normalizeHeadings(
      [heading(1, "Guide"), heading(2, "Setup"), heading(4, "Details")],
      { title: "Guide" },
    );

    expect(levels(result.blocks)).toEqual([1, 2, 3]);
    expect(result.warnings).toEqual([
      "heading level skip corrected: 'Details' (H4 -> H3)",
    ]);
  });

  it("demotes every level-1 heading after the first", () => {
    const result = normalizeHeadings([heading(1, "A"), heading(1, "B")], {
      title: "A",
    });

    expect(levels(result.blocks)).toEqual([1, 2]);
    expect(result.warnings).toEqual([
      "multiple top-level headings, demoted: 'B'",
    ]);
  });

  it("synthesizes a title when there is no level-1 heading", () => {
    const paragraph: Block = { kind: "paragraph", runs: [{ kind: "text", text: "Hi" }] };
    const result = normalizeHeadings([heading(2, "Intro"), paragraph], {
      title: "User Guide",
    });

    expect(result.blocks[0]).toEqual({
      kind: "heading",
      level: 1,
      text: "User Guide",
      id: "user-guide",
    });
    expect(result.blocks[2]).toBe(paragraph);
    expect(result.warnings).toEqual([]);
  });

  it("measures the first heading from the title level", () => {
    const result = normalizeHeadings([heading(3, "Deep")], { title: "T" });

    expect(levels(result.blocks)).toEqual([1, 2]);
    expect(result.warnings).toEqual([
      "heading level skip corrected: 'Deep' (H3 -> H2)",
    ]);
  });

  it("leaves exactly one level-1 heading and no jumps", () => {
    const result = normalizeHeadings(
      [
        heading(3, "a"),
        heading(1, "b"),
        heading(5, "c"),
        heading(1, "d"),
        heading(2, "e"),
        heading(6, "f"),
      ],
      { title: "T" },
    );

    const out = levels(result.blocks);
    expect(out.filter((level) => level === 1)).toHaveLength(1);
    out.forEach((level, i) => {
      expect(level).toBeLessThanOrEqual((i === 0 ? 1 : out[i - 1]) + 1);
    });
  });

  describe("slugs", () => {
    it("suffixes duplicates and skips taken variants", () => {
      const result = normalizeHeadings(
        [heading(1, "Doc"), heading(2, "Intro 2"), heading(2, "Intro"), heading(2, "Intro")],
        { title: "Doc" },
      );

      expect(result.headingTree.map((entry) => entry.slug)).toEqual([
        "doc",
        "intro-2",
        "intro",
        "intro-3",
      ]);
    });

    it("maps heading text to its first slug", () => {
      const result = normalizeHeadings(
        [heading(1, "Doc"), heading(2, "Intro"), heading(2, "Intro")],
        { title: "Doc" },
      );

      expect(result.slugTable).toEqual({ Doc: "doc", Intro: "intro" });
    });

    it("keeps headings named like object prototype keys", () => {
      const result = normalizeHeadings(
        [heading(1, "Doc"), heading(2, "__proto__")],
        { title: "Doc" },
      );

      expect(Object.hasOwn(result.slugTable, "__proto__")).toBe(true);
      expect(result.slugTable["__proto__"]).toBe("proto");
    });

    it("falls back to 'section' for text without letters or digits", () => {
      const result = normalizeHeadings([heading(1, "!!!")], { title: "x" });
      expect(result.headingTree[0].slug).toBe("section");
    });

    it("respects maxSlugLength", () => {
      const result = normalizeHeadings([heading(1, "alpha beta gamma")], {
        title: "x",
        maxSlugLength: 12,
      });
      expect(result.headingTree[0].slug).toBe("alpha-beta");
    });
  });

  it("does not mutate its input", () => {
    const blocks = [heading(1, "A"), heading(3, "B")];
    const copy = structuredClone(blocks);

    normalizeHeadings(blocks, { title: "A" });

    expect(blocks).toEqual(copy);
  });
});
