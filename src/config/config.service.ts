import { Inject, Injectable, Optional } from "@nestjs/common";
import fs from "fs/promises";
import path from "path";
import yaml from "yaml";
import { ValidationError } from "../errors";
import {
  CONFIG_FILENAMES,
  CONFIG_MODULE_OPTIONS_TOKEN,
  type ConfigModuleOptions,
} from "./config.const";
import { DEFAULT_CONFIG } from "./defaults";
import { mergeCliRuntimeOptions } from "./runtime-cli";
import { ConfigValidator, parseConfigInput } from "./validation/config-validator";
import type {
  CliRuntimeOptions,
  LoggingConfig,
  ScriptflowConfig,
  ScriptflowConfigInput,
} from "./types";

function fileExists(candidate: string): Promise<boolean> {
  return fs.access(candidate).then(
    () => true,
    () => false
  );
}

/**
 * ConfigService resolves scriptflow configuration from disk and layers the
 * environment and command line on top: defaults < file < environment < CLI.
 */
@Injectable()
export class ConfigService {
  private readonly moduleOptions: ConfigModuleOptions;

  constructor(
    private readonly validator: ConfigValidator,
    @Optional()
    @Inject(CONFIG_MODULE_OPTIONS_TOKEN)
    moduleOptions?: ConfigModuleOptions
  ) {
    this.moduleOptions = moduleOptions ?? {};
  }

  async load(options: CliRuntimeOptions = {}): Promise<ScriptflowConfig> {
    const runtime = mergeCliRuntimeOptions(
      this.moduleOptions.cliOptions ?? {},
      options
    );
    const configPath = await this.resolveConfigPath(runtime);
    const fileConfig = configPath ? await this.readConfigFile(configPath) : {};
    const merged = this.mergeConfig(DEFAULT_CONFIG, fileConfig);
    const finalConfig = this.applyCliOverrides(merged, runtime);

    this.validator.validate(finalConfig);

    return finalConfig;
  }

  private get cwd(): string {
    return this.moduleOptions.cwd ?? process.cwd();
  }

  private async readConfigFile(candidate: string): Promise<ScriptflowConfigInput> {
    const data = await fs.readFile(candidate, "utf-8");
    let parsed: unknown;
    try {
      parsed = candidate.endsWith(".json") ? JSON.parse(data) : yaml.parse(data);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ValidationError(`Unable to parse ${candidate}: ${message}`, {
        cause: error,
      });
    }
    return parseConfigInput(parsed, candidate);
  }

  private async resolveConfigPath(
    options: CliRuntimeOptions
  ): Promise<string | null> {
    if (options.config) {
      const explicit = path.resolve(this.cwd, options.config);
      if (!(await fileExists(explicit))) {
        throw new Error(`Config file not found at ${explicit}`);
      }
      return explicit;
    }

    for (const name of CONFIG_FILENAMES) {
      const candidate = path.resolve(this.cwd, name);
      if (await fileExists(candidate)) {
        return candidate;
      }
    }

    return null;
  }

  private mergeConfig(
    base: ScriptflowConfig,
    input: ScriptflowConfigInput
  ): ScriptflowConfig {
    const logging: LoggingConfig = {
      ...base.logging,
      ...(input.logging ?? {}),
      level: input.logging?.level ?? base.logging.level,
    };

    if (input.logging?.destination) {
      logging.destination = {
        ...base.logging.destination,
        ...input.logging.destination,
      };
    }

    return {
      remote: { ...base.remote, ...(input.remote ?? {}) },
      defaults: {
        ...base.defaults,
        ...(input.defaults ?? {}),
        images: [...(input.defaults?.images ?? base.defaults.images)],
      },
      staging: { ...base.staging, ...(input.staging ?? {}) },
      logging,
    };
  }

  private applyCliOverrides(
    config: ScriptflowConfig,
    options: CliRuntimeOptions
  ): ScriptflowConfig {
    const merged: ScriptflowConfig = {
      ...config,
      remote: { ...config.remote },
      defaults: { ...config.defaults },
      logging: { ...config.logging },
    };

    if (options.endpoint) {
      merged.remote.endpoint = options.endpoint;
    }

    if (options.token) {
      merged.remote.token = options.token;
    }

    if (options.project) {
      merged.defaults.project = options.project;
    }

    if (options.domain) {
      merged.defaults.domain = options.domain;
    }

    if (options.destinationDir) {
      merged.defaults.destinationDir = options.destinationDir;
    }

    if (options.images?.length) {
      merged.defaults.images = [...options.images];
    }

    if (options.logLevel) {
      merged.logging.level = options.logLevel;
    }

    if (options.logFile) {
      merged.logging.destination = {
        type: "file",
        path: options.logFile,
        pretty: false,
        colorize: false,
      };
    }

    return merged;
  }
}
