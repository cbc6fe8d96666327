import { z } from "zod";
import type { Identifier, LoadedWorkflow } from "../workflow/serialization";

export const TERMINAL_PHASES = new Set([
  "SUCCEEDED",
  "FAILED",
  "ABORTED",
  "TIMED_OUT",
]);

export const UPLOAD_LOCATION_RESPONSE_SCHEMA = z.object({
  signedUrl: z.string().min(1),
  nativeUrl: z.string().min(1),
});

export const EXECUTION_IDENTIFIER_SCHEMA = z.object({
  project: z.string(),
  domain: z.string(),
  name: z.string(),
});

export const CREATE_EXECUTION_RESPONSE_SCHEMA = z.object({
  id: EXECUTION_IDENTIFIER_SCHEMA,
});

export const EXECUTION_RESPONSE_SCHEMA = z.object({
  id: EXECUTION_IDENTIFIER_SCHEMA,
  closure: z
    .object({
      phase: z.string(),
      outputs: z.record(z.unknown()).optional(),
      error: z
        .object({
          code: z.string().optional(),
          message: z.string(),
        })
        .optional(),
    })
    .optional(),
});

export type ExecutionIdentifier = z.infer<typeof EXECUTION_IDENTIFIER_SCHEMA>;

export interface RegisteredWorkflow {
  readonly workflow: LoadedWorkflow;
  readonly workflowId: Identifier;
  readonly launchPlanId: Identifier;
}

export interface ExecutionHandle {
  readonly id: ExecutionIdentifier;
  readonly phase: string;
  readonly outputs?: Readonly<Record<string, unknown>>;
  readonly error?: { readonly code?: string; readonly message: string };
}

export function isTerminalPhase(phase: string): boolean {
  return TERMINAL_PHASES.has(phase);
}

export function describeExecution(execution: ExecutionHandle): string {
  const { project, domain, name } = execution.id;
  const lines = [
    `Execution(project=${project}, domain=${domain}, name=${name}, phase=${execution.phase})`,
  ];

  for (const [output, value] of Object.entries(execution.outputs ?? {})) {
    lines.push(`  ${output} = ${JSON.stringify(value)}`);
  }

  if (execution.error) {
    const code = execution.error.code ? ` [${execution.error.code}]` : "";
    lines.push(`  error =${code} ${execution.error.message}`);
  }

  return lines.join("\n");
}
