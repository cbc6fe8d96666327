import type { ResolvedInputs, WorkflowInterface } from "./types";

export const WORKFLOW_BRAND = Symbol.for("scriptflow.workflow");

export interface WorkflowDefinition<Result = unknown> {
  readonly name?: string;
  readonly inputs?: WorkflowInterface;
  readonly outputs?: WorkflowInterface;
  readonly description?: string;
  run(inputs: ResolvedInputs): Result | Promise<Result>;
}

export interface WorkflowEntity<Result = unknown> {
  readonly [WORKFLOW_BRAND]: true;
  readonly name?: string;
  readonly description?: string;
  readonly inputs: WorkflowInterface;
  readonly outputs: WorkflowInterface;
  execute(inputs?: ResolvedInputs): Promise<Result>;
}

/**
 * Declares a workflow inside a user script. The script exports the returned
 * entity under the name passed on the command line.
 *
 * @example
 * export const greet = defineWorkflow({
 *   inputs: { name: types.string(), times: types.integer() },
 *   run: ({ name, times }) => `hello ${name} x${times}`,
 * });
 */
export function defineWorkflow<Result>(
  definition: WorkflowDefinition<Result>
): WorkflowEntity<Result> {
  const inputs = { ...(definition.inputs ?? {}) };
  const outputs = { ...(definition.outputs ?? {}) };

  return {
    [WORKFLOW_BRAND]: true,
    name: definition.name,
    description: definition.description,
    inputs,
    outputs,
    async execute(values: ResolvedInputs = {}): Promise<Result> {
      return definition.run(values);
    },
  };
}

// The brand is a registered symbol so entities built by another copy of this
// package (a script resolving its own install) are still recognised.
export function isWorkflowEntity(value: unknown): value is WorkflowEntity {
  return (
    typeof value === "object" &&
    value !== null &&
    WORKFLOW_BRAND in value &&
    value[WORKFLOW_BRAND] === true
  );
}
