export type LogLevel = "silent" | "error" | "info" | "debug";

export interface LoggingDestination {
  type: "stdout" | "stderr" | "file";
  path?: string;
  pretty?: boolean;
  colorize?: boolean;
}

export interface LoggingConfig {
  level: LogLevel;
  destination?: LoggingDestination;
  enableTimestamps?: boolean;
}

export interface RemoteConfig {
  endpoint: string;
  token?: string;
  pollIntervalMs: number;
  waitTimeoutMs: number;
  uploadExpiresInSeconds: number;
}

export interface RunDefaultsConfig {
  project: string;
  domain: string;
  destinationDir: string;
  images: string[];
}

export interface StagingConfig {
  localDir: string;
}

export interface ScriptflowConfig {
  remote: RemoteConfig;
  defaults: RunDefaultsConfig;
  staging: StagingConfig;
  logging: LoggingConfig;
}

export interface ScriptflowConfigInput {
  remote?: Partial<RemoteConfig>;
  defaults?: Partial<RunDefaultsConfig>;
  staging?: Partial<StagingConfig>;
  logging?: Partial<LoggingConfig>;
}

/**
 * Overrides gathered from the environment and the command line. Every field
 * is optional; absent fields leave the file or default value in place.
 */
export interface CliRuntimeOptions {
  config?: string;
  endpoint?: string;
  token?: string;
  project?: string;
  domain?: string;
  destinationDir?: string;
  images?: string[];
  remote?: boolean;
  logLevel?: LogLevel;
  logFile?: string;
}
