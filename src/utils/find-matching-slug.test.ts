import { describe, it, expect } from "vitest";
import { findMatchingSlug } from "./find-matching-slug";

describe("findMatchingSlug", () => {
  // ==========================================================================
  // Word-preserving strategies
  // ==========================================================================
  describe("Step 1: Exact match", () => {
    it("matches exact slug", () => {
      const result = findMatchingSlug("install-steps", [
        "overview",
        "install-steps",
      ]);
      expect(result).toEqual({ slug: "install-steps", step: 1 });
    });
  });

  describe("Step 2: Singular/plural match", () => {
    it("matches singular to plural", () => {
      const result = findMatchingSlug("install-step", ["install-steps"]);
      expect(result).toEqual({ slug: "install-steps", step: 2 });
    });

    it("matches plural to singular", () => {
      const result = findMatchingSlug("widgets", ["widget", "widget-box"]);
      expect(result).toEqual({ slug: "widget", step: 2 });
    });
  });

  describe("Step 3: Word prefix match", () => {
    it("prefers the shorter heading", () => {
      const result = findMatchingSlug("configuration", [
        "configuration-files-list",
        "configuration-options",
      ]);
      expect(result).toEqual({ slug: "configuration-options", step: 3 });
    });

    it("keeps document order between equally long headings", () => {
      const result = findMatchingSlug("intro", ["intro-b", "intro-a"]);
      expect(result).toEqual({ slug: "intro-b", step: 3 });
    });
  });

  describe("Step 4: Word prefix ignoring plurals", () => {
    it("matches when a word differs only by plural", () => {
      const result = findMatchingSlug("api-key", ["api-keys-and-tokens"]);
      expect(result).toEqual({ slug: "api-keys-and-tokens", step: 4 });
    });
  });

  // ==========================================================================
  // Dash-insensitive strategies
  // ==========================================================================
  describe("Steps 5-8: Compact matching", () => {
    it("matches an anchor written without dashes", () => {
      const result = findMatchingSlug("backupschedule", ["backup-schedule"]);
      expect(result).toEqual({ slug: "backup-schedule", step: 5 });
    });

    it("matches a compact prefix", () => {
      const result = findMatchingSlug("backupsched", ["backup-schedule"]);
      expect(result).toEqual({ slug: "backup-schedule", step: 7 });
    });
  });

  // ==========================================================================
  // Reverse strategies
  // ==========================================================================
  describe("Step 9: Reverse prefix", () => {
    it("prefers the longest heading that prefixes the anchor", () => {
      const result = findMatchingSlug("backup-schedule-weekly", [
        "backup",
        "backup-schedule",
      ]);
      expect(result).toEqual({ slug: "backup-schedule", step: 9 });
    });
  });

  describe("Step 10: Word subsequence", () => {
    it("matches heading words in order inside the anchor", () => {
      const result = findMatchingSlug("install-the-app", ["install-app"]);
      expect(result).toEqual({ slug: "install-app", step: 10 });
    });
  });

  describe("Step 12: Unordered words", () => {
    it("matches every anchor word in any order", () => {
      const result = findMatchingSlug("steps-install", ["install-steps"]);
      expect(result).toEqual({ slug: "install-steps", step: 12 });
    });
  });

  // ==========================================================================
  // Limits
  // ==========================================================================
  describe("maxStep", () => {
    it("stops before later strategies", () => {
      expect(findMatchingSlug("steps-install", ["install-steps"], 4)).toBeNull();
    });

    it("still matches exact slugs with maxStep 1", () => {
      expect(findMatchingSlug("overview", ["overview"], 1)).toEqual({
        slug: "overview",
        step: 1,
      });
    });
  });

  it("returns null when nothing matches", () => {
    expect(findMatchingSlug("api-token", ["api-keys"])).toBeNull();
  });

  it("returns null for an empty search", () => {
    expect(findMatchingSlug("", ["overview"])).toBeNull();
  });
});
