export * from "./models";
export * from "./papers";
