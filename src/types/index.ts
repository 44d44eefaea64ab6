export * from "./models";
export * from "./state";
