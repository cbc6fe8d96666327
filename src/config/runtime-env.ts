import { isLogLevel } from "./runtime-cli-options";
import type { CliRuntimeOptions, LogLevel } from "./types";

function parseList(value: string | undefined): string[] | undefined {
  if (value === undefined) {
    return undefined;
  }

  const items = value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

  return items.length > 0 ? items : undefined;
}

function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (value === undefined) {
    return undefined;
  }

  const normalized = value.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : undefined;
}

function parseString(value: string | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function resolveCliRuntimeOptionsFromEnv(
  env: NodeJS.ProcessEnv
): CliRuntimeOptions {
  const options: CliRuntimeOptions = {};

  const config = parseString(env.SCRIPTFLOW_CONFIG);
  if (config !== undefined) {
    options.config = config;
  }

  const endpoint = parseString(env.SCRIPTFLOW_ENDPOINT);
  if (endpoint !== undefined) {
    options.endpoint = endpoint;
  }

  const token = parseString(env.SCRIPTFLOW_TOKEN);
  if (token !== undefined) {
    options.token = token;
  }

  const project = parseString(env.SCRIPTFLOW_PROJECT);
  if (project !== undefined) {
    options.project = project;
  }

  const domain = parseString(env.SCRIPTFLOW_DOMAIN);
  if (domain !== undefined) {
    options.domain = domain;
  }

  const images = parseList(env.SCRIPTFLOW_IMAGES);
  if (images !== undefined) {
    options.images = images;
  }

  const logLevel = parseLogLevel(env.SCRIPTFLOW_LOG_LEVEL);
  if (logLevel !== undefined) {
    options.logLevel = logLevel;
  }

  const logFile = parseString(env.SCRIPTFLOW_LOG_FILE);
  if (logFile !== undefined) {
    options.logFile = logFile;
  }

  return options;
}
