import { describe, it, expect } from "vitest";
import { filenameToTitle } from "./filename-to-title";

describe("filenameToTitle", () => {
  it("drops directories, extension and numeric prefix", () => {
    expect(filenameToTitle("manuals/01-user-guide.docx")).toBe("User Guide");
  });

  it("splits on underscores", () => {
    expect(filenameToTitle("q3_budget.xlsx")).toBe("Q3 Budget");
  });

  it("accepts Windows separators", () => {
    expect(filenameToTitle("specs\\api-reference.pdf")).toBe("Api Reference");
  });
});
