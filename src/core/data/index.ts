export * from "./file-access.service";
export * from "./local-data-proxy";
export * from "./data.module";
