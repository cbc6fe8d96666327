export * from "./remote-client";
export * from "./remote.types";
export * from "./remote.module";
