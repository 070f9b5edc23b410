import { describe, it, expect } from "vitest";
import { DEFAULT_PASSES } from "../../src/lint/runner";
import { explainCode, generateMarkdown, listRules } from "../../src/report/docgen";

describe("docgen", () => {
  it("lists every code with its pass", () => {
    const lines = listRules(DEFAULT_PASSES).split("\n");

    expect(lines).toHaveLength(6);
    expect(lines[0]).toBe("E0700  error    DuplicateDeclaration    index/duplicate-declaration");
    expect(lines[5]).toBe("W0700  warning  UnannotatedOwnedType    lint/stored-members");
  });

  it("generates a markdown table", () => {
    const md = generateMarkdown(DEFAULT_PASSES);

    expect(md).toContain("| Code | Kind | Severity | Pass | Description |");
    expect(md).toContain("| E0704 | RetainCycleViolation | error | `lint/retain-cycle` |");
  });

  it("marks codes no pass emits", () => {
    expect(generateMarkdown([])).toContain("| E0700 | DuplicateDeclaration | error | - |");
  });

  it("explains a code", () => {
    const text = explainCode("e0703");
    expect(text?.split("\n")[0]).toBe("E0703 DisjointOwnership (error, Ownership)");
    expect(text?.split("\n")[4]).toBe("Message: {subject} stores {related}, which has no ownership relation to {subject}");
  });

  it("returns undefined for an unknown code", () => {
    expect(explainCode("X1")).toBeUndefined();
  });
});
