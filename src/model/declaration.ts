/**
 * Reference types are shared by identity and take part in retain cycles.
 * Value types are copied and only carry whatever references they hold.
 */
export type TypeKind = "reference" | "value";

export interface StoredMember {
  name: string;
  type: string;
  /** Set when the member is only reached through intermediate value types. */
  viaValueTypeChain: boolean;
}

export interface TypeDeclaration {
  name: string;
  kind: TypeKind;
  isAnnotated: boolean;
  /** Types this declaration may hold strongly. Ignored unless isAnnotated. */
  ownsList: string[];
  storedMembers: StoredMember[];
}

/**
 * Name lookup over a declaration set whose names are already unique.
 * `position` preserves input order for deterministic iteration and tie-breaks.
 */
export interface DeclarationIndex {
  declarations: readonly TypeDeclaration[];
  byName: ReadonlyMap<string, TypeDeclaration>;
  position: ReadonlyMap<string, number>;
}

export function indexDeclarations(declarations: readonly TypeDeclaration[]): DeclarationIndex {
  const byName = new Map<string, TypeDeclaration>();
  const position = new Map<string, number>();
  for (const decl of declarations) {
    if (byName.has(decl.name)) continue;
    position.set(decl.name, byName.size);
    byName.set(decl.name, decl);
  }
  return { declarations, byName, position };
}

/** Annotated reference types are the only nodes of the ownership graph. */
export function isOwnershipNode(decl: TypeDeclaration | undefined): decl is TypeDeclaration & { kind: "reference"; isAnnotated: true } {
  return decl?.kind === "reference" && decl.isAnnotated;
}

export function effectiveOwnsList(decl: TypeDeclaration): readonly string[] {
  return decl.isAnnotated ? decl.ownsList : [];
}

// Convenience constructors, mostly for tests and examples.

export function referenceType(
  name: string,
  owns: string[] | null,
  members: Array<[string, string] | StoredMember> = []
): TypeDeclaration {
  return declare(name, "reference", owns, members);
}

export function valueType(
  name: string,
  owns: string[] | null,
  members: Array<[string, string] | StoredMember> = []
): TypeDeclaration {
  return declare(name, "value", owns, members);
}

function declare(
  name: string,
  kind: TypeKind,
  owns: string[] | null,
  members: Array<[string, string] | StoredMember>
): TypeDeclaration {
  return {
    name,
    kind,
    isAnnotated: owns !== null,
    ownsList: owns ?? [],
    storedMembers: members.map(m =>
      Array.isArray(m) ? { name: m[0], type: m[1], viaValueTypeChain: false } : m
    ),
  };
}
