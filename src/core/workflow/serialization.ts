import { toVariableMap, type Variable } from "./literals";
import type { WorkflowEntity } from "./workflow";

export interface ImageSpec {
  readonly name: string;
  /** Repository part of the reference, registry included. */
  readonly fqn: string;
  readonly tag?: string;
  readonly digest?: string;
}

export interface ImageConfig {
  readonly defaultImage: ImageSpec;
  readonly images: readonly ImageSpec[];
}

export interface FastSerializationSettings {
  readonly enabled: boolean;
  readonly destinationDir: string;
  readonly distributionLocation?: string;
}

/**
 * Settings that travel with a workflow from the moment its script is loaded
 * until it is registered. Passed explicitly; nothing reads them from ambient
 * process state.
 */
export interface SerializationSettings {
  readonly project?: string;
  readonly domain?: string;
  readonly image?: ImageConfig;
  readonly fastSerialization?: FastSerializationSettings;
}

export interface LoadedWorkflow {
  /** `<module>.<export>`; becomes the registered workflow name. */
  readonly qualifiedName: string;
  readonly moduleName: string;
  readonly exportName: string;
  /** Absolute path of the script the workflow was loaded from. */
  readonly sourceFile: string;
  readonly settings: SerializationSettings;
  readonly entity: WorkflowEntity;
}

export interface Identifier {
  resourceType: "WORKFLOW" | "LAUNCH_PLAN";
  project: string;
  domain: string;
  name: string;
  version: string;
}

export interface WorkflowSpec {
  template: {
    id: Identifier;
    interface: {
      inputs: { variables: Record<string, Variable> };
      outputs: { variables: Record<string, Variable> };
    };
    metadata: { description: string };
    container: { image: string; args: string[] };
  };
}

export interface LaunchPlanSpec {
  workflowId: Identifier;
  defaultInputs: { parameters: Record<string, { var: Variable; required: boolean }> };
}

export function formatImageReference(image: ImageSpec): string {
  if (image.digest) {
    return `${image.fqn}@${image.digest}`;
  }
  return image.tag ? `${image.fqn}:${image.tag}` : image.fqn;
}

export function buildWorkflowSpec(
  workflow: LoadedWorkflow,
  id: Identifier,
  settings: SerializationSettings
): WorkflowSpec {
  if (!settings.image) {
    throw new Error("Serialization settings must include an image configuration.");
  }

  const args = ["scriptflow-execute"];
  const fast = settings.fastSerialization;
  if (fast?.enabled) {
    args.push("--dest-dir", fast.destinationDir);
    if (fast.distributionLocation) {
      args.push("--additional-distribution", fast.distributionLocation);
    }
  }
  args.push("--workflow", workflow.qualifiedName);

  return {
    template: {
      id,
      interface: {
        inputs: toVariableMap(workflow.entity.inputs),
        outputs: toVariableMap(workflow.entity.outputs),
      },
      metadata: { description: workflow.entity.description ?? "" },
      container: {
        image: formatImageReference(settings.image.defaultImage),
        args,
      },
    },
  };
}

export function buildLaunchPlanSpec(
  workflow: LoadedWorkflow,
  workflowId: Identifier
): LaunchPlanSpec {
  const { variables } = toVariableMap(workflow.entity.inputs);
  const parameters: LaunchPlanSpec["defaultInputs"]["parameters"] = {};
  for (const [name, variable] of Object.entries(variables)) {
    parameters[name] = { var: variable, required: true };
  }
  return { workflowId, defaultInputs: { parameters } };
}
