export * from "./models";
export * from "./workflow";
