export * from "./declaration";
export * from "./decode";
