export * from "./cli-arguments";
export * from "./cli-options.service";
export * from "./cli-parser.service";
export * from "./cli-runner.service";
export * from "./cli.constants";
export * from "./cli.module";
export * from "./commands/cli-command";
export * from "./commands/run.command";
