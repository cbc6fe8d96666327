export * from "./types";
export * from "./workflow";
export * from "./target";
export * from "./argument-resolver";
export * from "./literals";
export * from "./serialization";
