export * from "./format";
export * from "./docgen";
