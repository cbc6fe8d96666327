import { Injectable } from "@nestjs/common";
import {
  CLI_BOOLEAN_OPTIONS_BY_FLAG,
  CLI_VALUE_OPTIONS_BY_FLAG,
  isCliLogLevelOption,
} from "../config/runtime-cli-options";
import type { CliArguments } from "./cli-arguments";

export class CliParseError extends Error {}

function isKnownFlag(token: string): boolean {
  return (
    CLI_BOOLEAN_OPTIONS_BY_FLAG.has(token) || CLI_VALUE_OPTIONS_BY_FLAG.has(token)
  );
}

/**
 * Splits argv into a command, its known options and positionals. Unknown
 * flags are not errors: each one is kept together with the token after it,
 * verbatim, so values such as `-5` survive. A known option is never taken as
 * that value.
 */
@Injectable()
export class CliParserService {
  parse(argv: string[]): CliArguments {
    if (argv.length === 0) {
      throw new CliParseError("No command provided.");
    }

    const [command, ...rest] = argv;
    if (!command || command.startsWith("-")) {
      throw new CliParseError(`Invalid command: ${command ?? "<empty>"}`);
    }

    const options: Record<string, unknown> = {};
    const positionals: string[] = [];
    const passthrough: string[] = [];

    for (let i = 0; i < rest.length; i += 1) {
      const token = rest[i];
      if (token === "--") {
        positionals.push(...rest.slice(i + 1));
        break;
      }

      if (!token.startsWith("-") || token === "-") {
        positionals.push(token);
        continue;
      }

      const booleanDefinition = CLI_BOOLEAN_OPTIONS_BY_FLAG.get(token);
      if (booleanDefinition) {
        options[booleanDefinition.runtimeKey] = true;
        continue;
      }

      const optionDefinition = CLI_VALUE_OPTIONS_BY_FLAG.get(token);
      if (!optionDefinition) {
        passthrough.push(token);
        const value = rest[i + 1];
        if (value !== undefined && !isKnownFlag(value)) {
          passthrough.push(value);
          i += 1;
        }
        continue;
      }

      const next = rest[i + 1];
      if (next === undefined || next.startsWith("-")) {
        throw new CliParseError(`Option ${token} requires a value.`);
      }

      if (
        isCliLogLevelOption(optionDefinition) &&
        !optionDefinition.allowedValues.some((level) => level === next)
      ) {
        throw new CliParseError(
          `Option ${token} must be one of: ${optionDefinition.allowedValues.join(", ")}.`
        );
      }

      i += 1;
      const optionKey = optionDefinition.runtimeKey;
      const existing = options[optionKey];
      if (existing === undefined) {
        options[optionKey] = next;
        continue;
      }

      if (Array.isArray(existing)) {
        existing.push(next);
        continue;
      }

      options[optionKey] = [existing, next];
    }

    return { command, options, positionals, passthrough };
  }
}
