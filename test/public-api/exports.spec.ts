// test/public-api/exports.spec.ts
// Tests that the validator is usable through the package entry point alone

import { describe, it, expect } from "vitest";
import {
  DEFAULT_PASSES,
  createDefaultRunner,
  formatText,
  loadConfig,
  parseDeclarations,
  referenceType,
  validate,
  type Diagnostic,
} from "../../src";

describe("public API", () => {
  it("validates parsed declarations", () => {
    const decls = parseDeclarations(
      JSON.stringify([
        { name: "A", kind: "reference", ownsList: ["B"], storedMembers: [{ name: "b", type: "B" }] },
        { name: "B", kind: "reference", ownsList: ["A"], storedMembers: [{ name: "a", type: "A" }] },
      ])
    );
    const diags: Diagnostic[] = validate(decls);

    expect(diags.map(d => d.code)).toEqual(["E0704"]);
    expect(formatText(diags).split("\n")[1]).toBe("1 error, 0 warnings");
  });

  it("exposes the runner and its passes", () => {
    expect(createDefaultRunner().getPasses()).toEqual([...DEFAULT_PASSES]);
    expect(createDefaultRunner().run([referenceType("A", [], [])]).diagnostics).toEqual([]);
  });

  it("exposes configuration loading", () => {
    expect(loadConfig({ env: {}, overrides: { output: { format: "json" } }, configFile: undefined, cwd: "/nonexistent-ownlint-dir" }).output.format).toBe("json");
  });
});
