import { describe, it, expect } from "vitest";
import { DIAGNOSTIC_CODES, allCodes, formatOwnsAnnotation, lookupCode, makeDiagnostic } from "../../src/outcome/codes";
import { countBySeverity, hasErrors, sortDiagnostics, withSeverity } from "../../src/outcome/diagnostic";
import { InternalInvariantError, OwnlintError, invariant } from "../../src/outcome/errors";

describe("diagnostic codes", () => {
  it("keys every definition by its own kind", () => {
    for (const [kind, def] of Object.entries(DIAGNOSTIC_CODES)) {
      expect(def.kind).toBe(kind);
    }
  });

  it("uses unique codes", () => {
    const codes = allCodes().map(d => d.code);
    expect(codes).toEqual(["E0700", "E0701", "E0702", "E0703", "E0704", "W0700"]);
  });

  it("looks codes up case-insensitively", () => {
    expect(lookupCode("e0704")?.kind).toBe("RetainCycleViolation");
    expect(lookupCode("E9999")).toBeUndefined();
  });
});

describe("makeDiagnostic", () => {
  it("fills every placeholder in the template", () => {
    const d = makeDiagnostic("DisjointOwnership", "A", "C");
    expect(d.message).toBe("A stores C, which has no ownership relation to A");
    expect(d).toMatchObject({ code: "E0703", severity: "error", subjectType: "A", relatedType: "C" });
  });

  it("takes extra template params", () => {
    const d = makeDiagnostic("RetainCycleViolation", "Outer", "A", { params: { first: "A", second: "B" } });
    expect(d.message).toBe("Retain cycle between A and B is not declared by every member");
  });

  it("omits empty data and fixes", () => {
    const d = makeDiagnostic("DuplicateDeclaration", "A", null, { fixes: [] });
    expect("data" in d).toBe(false);
    expect("fixes" in d).toBe(false);
  });

  it("freezes arrays held in data", () => {
    const members = ["A", "B"];
    const d = makeDiagnostic("RetainCycleViolation", "A", "B", {
      params: { first: "A", second: "B" },
      data: { pair: ["A", "B"], members },
    });

    expect(Object.isFrozen(d.data)).toBe(true);
    expect(Object.isFrozen(d.data?.pair)).toBe(true);
    expect(Object.isFrozen(d.data?.members)).toBe(true);
    members.push("C");
    expect(d.data?.members).toEqual(["A", "B"]);
  });

  it("freezes fixes", () => {
    const d = makeDiagnostic("UnexpectedReference", "A", "B", {
      fixes: [{ description: "Add B", target: "A", replacement: "@owns(B)" }],
    });
    expect(Object.isFrozen(d.fixes)).toBe(true);
    expect(Object.isFrozen(d.fixes?.[0])).toBe(true);
  });
});

describe("formatOwnsAnnotation", () => {
  it("joins names", () => {
    expect(formatOwnsAnnotation(["B", "C"])).toBe("@owns(B, C)");
    expect(formatOwnsAnnotation([])).toBe("@owns()");
  });
});

describe("diagnostic helpers", () => {
  const error = makeDiagnostic("DisjointOwnership", "B", "C");
  const warning = makeDiagnostic("UnannotatedOwnedType", "A", "U");

  it("counts by severity", () => {
    expect(countBySeverity([error, warning, warning])).toEqual({ error: 1, warning: 2 });
    expect(hasErrors([warning])).toBe(false);
    expect(hasErrors([warning, error])).toBe(true);
  });

  it("sorts by subject then kind and keeps ties in order", () => {
    const first = makeDiagnostic("UnknownOwnedType", "B", "X");
    const second = makeDiagnostic("UnknownOwnedType", "B", "Y");
    const sorted = sortDiagnostics([second, first, error, warning]);

    expect(sorted).toEqual([warning, error, second, first]);
  });

  it("sorts by code unit rather than locale", () => {
    const lower = makeDiagnostic("DuplicateDeclaration", "a", null);
    const upper = makeDiagnostic("DuplicateDeclaration", "Z", null);
    expect(sortDiagnostics([lower, upper])).toEqual([upper, lower]);
  });

  it("replaces severity with frozen copies", () => {
    const [changed] = withSeverity([error], "warning");
    expect(changed.severity).toBe("warning");
    expect(Object.isFrozen(changed)).toBe(true);
    expect(error.severity).toBe("error");
  });
});

describe("errors", () => {
  it("throws InternalInvariantError from invariant", () => {
    expect(() => invariant(false, "broken", { at: 1 })).toThrow(InternalInvariantError);
    expect(() => invariant(true, "fine")).not.toThrow();
  });

  it("carries a code", () => {
    const e = new InternalInvariantError("broken");
    expect(e).toBeInstanceOf(OwnlintError);
    expect(e.code).toBe("INTERNAL_INVARIANT");
    expect(e.details).toEqual({});
  });
});
