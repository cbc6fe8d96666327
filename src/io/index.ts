export * from "./io.module";
export * from "./logger.service";
export * from "./redact";
