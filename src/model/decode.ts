import { DeclarationFormatError, type FormatProblem } from "../outcome/errors";
import type { StoredMember, TypeDeclaration, TypeKind } from "./declaration";

const KINDS: readonly TypeKind[] = ["reference", "value"];

/**
 * Decode a declaration document into TypeDeclarations.
 *
 * Accepts either a bare array or `{ "declarations": [...] }`. Every problem is
 * collected before throwing, each tagged with its JSON path.
 *
 * Defaults:
 * - `isAnnotated` is true when `ownsList` is present
 * - `storedMembers` is empty
 * - `viaValueTypeChain` is false
 */
export function decodeDeclarations(doc: unknown): TypeDeclaration[] {
  const problems: FormatProblem[] = [];
  const entries = extractEntries(doc, problems);
  const declarations: TypeDeclaration[] = [];

  entries.forEach((entry, i) => {
    const decl = decodeDeclaration(entry, `$.declarations[${i}]`, problems);
    if (decl) declarations.push(decl);
  });

  if (problems.length > 0) {
    throw new DeclarationFormatError(
      `Invalid declaration document (${problems.length} problem${problems.length === 1 ? "" : "s"})`,
      problems
    );
  }
  return declarations;
}

/** Parse JSON text then decode it. */
export function parseDeclarations(json: string): TypeDeclaration[] {
  let doc: unknown;
  try {
    doc = JSON.parse(json);
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    throw new DeclarationFormatError(`Declaration document is not valid JSON: ${message}`, [
      { path: "$", message },
    ]);
  }
  return decodeDeclarations(doc);
}

function extractEntries(doc: unknown, problems: FormatProblem[]): unknown[] {
  if (Array.isArray(doc)) return doc;
  if (isRecord(doc)) {
    if (Array.isArray(doc.declarations)) return doc.declarations;
    problems.push({ path: "$.declarations", message: "expected an array" });
    return [];
  }
  problems.push({ path: "$", message: "expected an array or an object with a declarations array" });
  return [];
}

function decodeDeclaration(
  entry: unknown,
  path: string,
  problems: FormatProblem[]
): TypeDeclaration | undefined {
  if (!isRecord(entry)) {
    problems.push({ path, message: "expected an object" });
    return undefined;
  }

  const before = problems.length;

  const name = entry.name;
  if (typeof name !== "string" || name.length === 0) {
    problems.push({ path: `${path}.name`, message: "expected a non-empty string" });
  }

  const kind = entry.kind;
  if (typeof kind !== "string" || !isKind(kind)) {
    problems.push({ path: `${path}.kind`, message: `expected one of ${KINDS.join(", ")}` });
  }

  const ownsList = decodeStringArray(entry.ownsList, `${path}.ownsList`, problems);

  let isAnnotated = entry.ownsList !== undefined;
  if (entry.isAnnotated !== undefined) {
    if (typeof entry.isAnnotated === "boolean") {
      isAnnotated = entry.isAnnotated;
    } else {
      problems.push({ path: `${path}.isAnnotated`, message: "expected a boolean" });
    }
  }

  const storedMembers: StoredMember[] = [];
  if (entry.storedMembers !== undefined) {
    if (!Array.isArray(entry.storedMembers)) {
      problems.push({ path: `${path}.storedMembers`, message: "expected an array" });
    } else {
      entry.storedMembers.forEach((m: unknown, j: number) => {
        const member = decodeMember(m, `${path}.storedMembers[${j}]`, problems);
        if (member) storedMembers.push(member);
      });
    }
  }

  if (problems.length > before || typeof name !== "string" || typeof kind !== "string" || !isKind(kind)) {
    return undefined;
  }
  return { name, kind, isAnnotated, ownsList: ownsList ?? [], storedMembers };
}

function decodeMember(m: unknown, path: string, problems: FormatProblem[]): StoredMember | undefined {
  if (!isRecord(m)) {
    problems.push({ path, message: "expected an object" });
    return undefined;
  }
  const { name, type, viaValueTypeChain } = m;
  let ok = true;
  if (typeof name !== "string" || name.length === 0) {
    problems.push({ path: `${path}.name`, message: "expected a non-empty string" });
    ok = false;
  }
  if (typeof type !== "string" || type.length === 0) {
    problems.push({ path: `${path}.type`, message: "expected a non-empty string" });
    ok = false;
  }
  if (viaValueTypeChain !== undefined && typeof viaValueTypeChain !== "boolean") {
    problems.push({ path: `${path}.viaValueTypeChain`, message: "expected a boolean" });
    ok = false;
  }
  if (!ok || typeof name !== "string" || typeof type !== "string") return undefined;
  return { name, type, viaValueTypeChain: viaValueTypeChain === true };
}

function decodeStringArray(value: unknown, path: string, problems: FormatProblem[]): string[] | undefined {
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) {
    problems.push({ path, message: "expected an array of strings" });
    return undefined;
  }
  const result: string[] = [];
  value.forEach((v: unknown, i: number) => {
    if (typeof v === "string" && v.length > 0) {
      result.push(v);
    } else {
      problems.push({ path: `${path}[${i}]`, message: "expected a non-empty string" });
    }
  });
  return result;
}

function isKind(value: string): value is TypeKind {
  return KINDS.some(k => k === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
