import type { CliRuntimeOptions, LogLevel } from "./types";

const LOG_LEVEL_VALUES = ["silent", "error", "info", "debug"] as const satisfies readonly LogLevel[];

export const CLI_LOG_LEVEL_VALUES = new Set<string>(LOG_LEVEL_VALUES);

export function isLogLevel(value: string): value is LogLevel {
  return CLI_LOG_LEVEL_VALUES.has(value);
}

type CliStringOptionKey =
  | "config"
  | "endpoint"
  | "project"
  | "domain"
  | "destinationDir"
  | "logFile";

type CliListOptionKey = "images";

type CliLogLevelOptionKey = "logLevel";

export type CliValueOptionRuntimeKey =
  | CliStringOptionKey
  | CliListOptionKey
  | CliLogLevelOptionKey;

export interface CliValueOptionDefinitionBase<
  RuntimeKey extends CliValueOptionRuntimeKey,
> {
  readonly runtimeKey: RuntimeKey;
  readonly keys: readonly string[];
  readonly description: string;
}

export interface CliStringValueOptionDefinition
  extends CliValueOptionDefinitionBase<CliStringOptionKey> {
  readonly valueType: "string";
}

export interface CliListValueOptionDefinition
  extends CliValueOptionDefinitionBase<CliListOptionKey> {
  readonly valueType: "list";
}

export interface CliLogLevelValueOptionDefinition
  extends CliValueOptionDefinitionBase<CliLogLevelOptionKey> {
  readonly valueType: "logLevel";
  readonly allowedValues: readonly LogLevel[];
}

export type CliValueOptionDefinition =
  | CliStringValueOptionDefinition
  | CliListValueOptionDefinition
  | CliLogLevelValueOptionDefinition;

type BooleanPropertyNames<T> = {
  [Key in keyof T]-?: Exclude<T[Key], undefined> extends boolean ? Key : never;
}[keyof T];

export type CliBooleanOptionRuntimeKey = Extract<
  BooleanPropertyNames<CliRuntimeOptions>,
  string
>;

export interface CliBooleanOptionDefinition {
  readonly runtimeKey: CliBooleanOptionRuntimeKey;
  readonly keys: readonly string[];
  readonly description: string;
}

export const CLI_VALUE_OPTION_DEFINITIONS: readonly CliValueOptionDefinition[] = [
  {
    runtimeKey: "config",
    keys: ["--config", "-c"],
    valueType: "string",
    description: "Path to a scriptflow configuration file",
  },
  {
    runtimeKey: "endpoint",
    keys: ["--endpoint"],
    valueType: "string",
    description: "Base URL of the orchestration service",
  },
  {
    runtimeKey: "project",
    keys: ["--project", "-p"],
    valueType: "string",
    description: "Project to register and run in",
  },
  {
    runtimeKey: "domain",
    keys: ["--domain", "-d"],
    valueType: "string",
    description: "Domain to register and run in",
  },
  {
    runtimeKey: "destinationDir",
    keys: ["--destination-dir"],
    valueType: "string",
    description:
      "Directory inside the image where the archive containing the script is unpacked",
  },
  {
    runtimeKey: "images",
    keys: ["--image", "-i"],
    valueType: "list",
    description: "Image used to register and run; repeat or comma separate for several",
  },
  {
    runtimeKey: "logLevel",
    keys: ["--log-level"],
    valueType: "logLevel",
    allowedValues: LOG_LEVEL_VALUES,
    description: "Log verbosity",
  },
  {
    runtimeKey: "logFile",
    keys: ["--log-file"],
    valueType: "string",
    description: "Write logs to this file instead of stderr",
  },
] satisfies readonly CliValueOptionDefinition[];

export const CLI_BOOLEAN_OPTION_DEFINITIONS: readonly CliBooleanOptionDefinition[] = [
  {
    runtimeKey: "remote",
    keys: ["--remote"],
    description: "Register the script and execute it on the orchestration service",
  },
] satisfies readonly CliBooleanOptionDefinition[];

export const CLI_VALUE_OPTIONS_BY_FLAG = new Map<
  string,
  CliValueOptionDefinition
>(
  CLI_VALUE_OPTION_DEFINITIONS.flatMap((definition) =>
    definition.keys.map((key) => [key, definition] as const),
  ),
);

export const CLI_BOOLEAN_OPTIONS_BY_FLAG = new Map<
  string,
  CliBooleanOptionDefinition
>(
  CLI_BOOLEAN_OPTION_DEFINITIONS.flatMap((definition) =>
    definition.keys.map((key) => [key, definition] as const),
  ),
);

export function isCliLogLevelOption(
  definition: CliValueOptionDefinition,
): definition is CliLogLevelValueOptionDefinition {
  return definition.valueType === "logLevel";
}
