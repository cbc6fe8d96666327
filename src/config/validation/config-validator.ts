import { Injectable } from "@nestjs/common";
import { z } from "zod";
import { ValidationError } from "../../errors";
import { parseImageConfig } from "../image-config";
import type { ScriptflowConfig, ScriptflowConfigInput } from "../types";

const LOG_LEVEL_SCHEMA = z.enum(["silent", "error", "info", "debug"]);

const LOGGING_DESTINATION_SCHEMA = z
  .object({
    type: z.enum(["stdout", "stderr", "file"]),
    path: z.string().min(1).optional(),
    pretty: z.boolean().optional(),
    colorize: z.boolean().optional(),
  })
  .strict();

export const CONFIG_INPUT_SCHEMA = z
  .object({
    remote: z
      .object({
        endpoint: z.string().min(1).optional(),
        token: z.string().min(1).optional(),
        pollIntervalMs: z.number().optional(),
        waitTimeoutMs: z.number().optional(),
        uploadExpiresInSeconds: z.number().optional(),
      })
      .strict()
      .optional(),
    defaults: z
      .object({
        project: z.string().optional(),
        domain: z.string().optional(),
        destinationDir: z.string().optional(),
        images: z.array(z.string()).optional(),
      })
      .strict()
      .optional(),
    staging: z
      .object({
        localDir: z.string().optional(),
      })
      .strict()
      .optional(),
    logging: z
      .object({
        level: LOG_LEVEL_SCHEMA.optional(),
        destination: LOGGING_DESTINATION_SCHEMA.optional(),
        enableTimestamps: z.boolean().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

const CONFIG_SCHEMA = z.object({
  remote: z.object({
    endpoint: z
      .string()
      .url("remote.endpoint must be an absolute URL")
      .refine(
        (value) => value.startsWith("http://") || value.startsWith("https://"),
        "remote.endpoint must use http or https"
      ),
    token: z.string().min(1).optional(),
    pollIntervalMs: z
      .number()
      .int("remote.pollIntervalMs must be an integer")
      .positive("remote.pollIntervalMs must be greater than zero"),
    waitTimeoutMs: z
      .number()
      .int("remote.waitTimeoutMs must be an integer")
      .positive("remote.waitTimeoutMs must be greater than zero"),
    uploadExpiresInSeconds: z
      .number()
      .int("remote.uploadExpiresInSeconds must be an integer")
      .positive("remote.uploadExpiresInSeconds must be greater than zero"),
  }),
  defaults: z.object({
    project: z.string().min(1, "defaults.project must be provided"),
    domain: z.string().min(1, "defaults.domain must be provided"),
    destinationDir: z.string().min(1, "defaults.destinationDir must be provided"),
    images: z.array(z.string()).min(1, "defaults.images must list at least one image"),
  }),
  staging: z.object({
    localDir: z.string().min(1, "staging.localDir must be provided"),
  }),
  logging: z.object({
    level: LOG_LEVEL_SCHEMA,
    destination: LOGGING_DESTINATION_SCHEMA.optional(),
    enableTimestamps: z.boolean().optional(),
  }),
});

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const location = issue.path.join(".");
    return location ? `${location}: ${issue.message}` : issue.message;
  });
}

/**
 * Validates a parsed configuration file. `source` names the file in errors.
 */
export function parseConfigInput(
  data: unknown,
  source: string
): ScriptflowConfigInput {
  const result = CONFIG_INPUT_SCHEMA.safeParse(data ?? {});
  if (!result.success) {
    throw new ValidationError(
      `Invalid configuration in ${source}:\n${formatIssues(result.error).join("\n")}`
    );
  }
  return result.data;
}

@Injectable()
export class ConfigValidator {
  validate(config: ScriptflowConfig): void {
    const errors: string[] = [];

    const result = CONFIG_SCHEMA.safeParse(config);
    if (!result.success) {
      errors.push(...formatIssues(result.error));
    }

    this.capture(errors, () => parseImageConfig(config.defaults.images));

    if (errors.length > 0) {
      throw new ValidationError(errors.join("\n"));
    }
  }

  private capture(errors: string[], fn: () => void): void {
    try {
      fn();
    } catch (error) {
      if (error instanceof ValidationError) {
        errors.push(error.message);
        return;
      }
      throw error;
    }
  }
}
