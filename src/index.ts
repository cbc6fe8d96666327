export {
  defineWorkflow,
  isWorkflowEntity,
  type WorkflowDefinition,
  type WorkflowEntity,
} from "./core/workflow/workflow";
export {
  StructuredDataset,
  types,
  type InputValue,
  type ResolvedInputs,
  type TypeTag,
  type WorkflowInterface,
} from "./core/workflow/types";
export * from "./errors";
