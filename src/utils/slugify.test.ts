import { describe, it, expect } from "vitest";
import { slugify } from "./slugify";

describe("slugify", () => {
  it("lower-cases and joins words with dashes", () => {
    expect(slugify("Install Steps")).toBe("install-steps");
  });

  it("collapses punctuation runs into one dash", () => {
    expect(slugify("Q&A: Setup (v2)")).toBe("q-a-setup-v2");
  });

  it("trims leading and trailing dashes", () => {
    expect(slugify("  --Hello--  ")).toBe("hello");
  });

  it("keeps accents written as combining marks", () => {
    expect(slugify("Re\u0301sume\u0301 Tips")).toBe("r\u00e9sum\u00e9-tips");
    expect(slugify("\u0130zmir")).toBe("i\u0307zmir");
  });

  it("keeps non-ASCII letters", () => {
    expect(slugify("Übersicht")).toBe("übersicht");
  });

  it("returns an empty string when nothing is left", () => {
    expect(slugify("***")).toBe("");
  });

  describe("truncation", () => {
    it("cuts back to the last word boundary", () => {
      expect(slugify("alpha beta gamma", 12)).toBe("alpha-beta");
    });

    it("keeps a cut that already falls on a boundary", () => {
      expect(slugify("alpha beta gamma", 10)).toBe("alpha-beta");
    });

    it("hard cuts a single long word", () => {
      expect(slugify("abcdefghij", 4)).toBe("abcd");
    });
  });

  it("is idempotent", () => {
    for (const text of ["Install Steps", "Q&A: Setup (v2)", "Übersicht", "a--b"]) {
      const once = slugify(text);
      expect(slugify(once)).toBe(once);
    }
  });
});
