export * from "./types";
export * from "./runner";
export * from "./context";
export * from "./analysis/ownershipGraph";
export * from "./analysis/scc";
export * from "./analysis/reachability";
export * from "./analysis/ownership";
export * from "./passes/duplicateDeclaration";
export * from "./passes/unknownOwnedType";
export * from "./passes/retainCycle";
export * from "./passes/storedMembers";
