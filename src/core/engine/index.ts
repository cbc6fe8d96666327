export * from "./engine.service";
export * from "./engine.module";
