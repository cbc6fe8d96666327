import { Injectable } from "@nestjs/common";
import { isLogLevel } from "../config/runtime-cli-options";
import type { CliRuntimeOptions } from "../config/types";

function toStringArray(value: unknown): string[] | undefined {
  if (Array.isArray(value)) {
    return value
      .map(String)
      .flatMap((item) => item.split(","))
      .map((item) => item.trim())
      .filter(Boolean);
  }
  if (typeof value === "string") {
    return value
      .split(",")
      .map((item) => item.trim())
      .filter(Boolean);
  }
  return undefined;
}

type CliStringRuntimeKey =
  | "config"
  | "endpoint"
  | "project"
  | "domain"
  | "destinationDir"
  | "logFile";

function assignStringOption(
  target: CliRuntimeOptions,
  options: Record<string, unknown>,
  key: CliStringRuntimeKey,
): void {
  const value = options[key];
  if (typeof value === "string") {
    target[key] = value;
  } else if (Array.isArray(value) && value.length > 0) {
    // Repeated single-value flags: the last one wins.
    target[key] = String(value[value.length - 1]);
  }
}

@Injectable()
export class CliOptionsService {
  parse(options: Record<string, unknown>): CliRuntimeOptions {
    const runtime: CliRuntimeOptions = {};

    assignStringOption(runtime, options, "config");
    assignStringOption(runtime, options, "endpoint");
    assignStringOption(runtime, options, "project");
    assignStringOption(runtime, options, "domain");
    assignStringOption(runtime, options, "destinationDir");
    assignStringOption(runtime, options, "logFile");

    if (typeof options.logLevel === "string" && isLogLevel(options.logLevel)) {
      runtime.logLevel = options.logLevel;
    }

    const images = toStringArray(options.images);
    if (images && images.length > 0) {
      runtime.images = images;
    }

    if (typeof options.remote === "boolean") {
      runtime.remote = options.remote;
    }

    return runtime;
  }
}
