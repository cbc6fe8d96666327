export * from "./module-loader.service";
export * from "./loader.module";
