import { ConfigurableModuleBuilder } from "@nestjs/common";
import type { CliRuntimeOptions } from "./types";

export interface ConfigModuleOptions {
  /** Overrides resolved before the command line is parsed, e.g. from the environment. */
  cliOptions?: CliRuntimeOptions;
  /** Directory searched for configuration files; defaults to the process cwd. */
  cwd?: string;
}

export const CONFIG_FILENAMES = [
  "scriptflow.config.json",
  "scriptflow.config.yaml",
  "scriptflow.config.yml",
  ".scriptflowrc",
];

export const {
  ConfigurableModuleClass: ConfigurableConfigModule,
  MODULE_OPTIONS_TOKEN: CONFIG_MODULE_OPTIONS_TOKEN,
} = new ConfigurableModuleBuilder<ConfigModuleOptions>({
  moduleName: "ScriptflowConfig",
})
  .setClassMethodName("register")
  .setExtras({ isGlobal: true }, (definition, extras) => ({
    ...definition,
    global: extras.isGlobal,
  }))
  .build();
