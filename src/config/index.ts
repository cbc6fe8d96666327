export * from "./types";
export * from "./defaults";
export * from "./config.const";
export * from "./config.service";
export * from "./config.module";
export * from "./image-config";
export * from "./runtime-cli";
export * from "./runtime-cli-options";
export * from "./runtime-env";
export * from "./validation/config-validator";
