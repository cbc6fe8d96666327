export * from "./script-mode.service";
export * from "./script-mode.module";
