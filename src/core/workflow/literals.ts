import { StructuredDataset } from "./types";
import type { InputValue, ResolvedInputs, TypeTag, WorkflowInterface } from "./types";

export type SimpleLiteralType =
  | "STRING"
  | "INTEGER"
  | "FLOAT"
  | "BOOLEAN"
  | "DATETIME";

export type LiteralType =
  | { simple: SimpleLiteralType }
  | { blob: { dimensionality: "SINGLE" } }
  | { structuredDatasetType: { format: string } };

export interface Variable {
  type: LiteralType;
  description: string;
}

export type Primitive =
  | { stringValue: string }
  | { integer: number };

export type Literal =
  | { scalar: { primitive: Primitive } }
  | { scalar: { structuredDataset: { uri: string; metadata: { structuredDatasetType: { format: string } } } } };

export interface LiteralMap {
  literals: Record<string, Literal>;
}

export function toLiteralType(type: TypeTag): LiteralType {
  switch (type.kind) {
    case "string":
      return { simple: "STRING" };
    case "integer":
      return { simple: "INTEGER" };
    case "float":
      return { simple: "FLOAT" };
    case "boolean":
      return { simple: "BOOLEAN" };
    case "datetime":
      return { simple: "DATETIME" };
    case "blob":
      return { blob: { dimensionality: "SINGLE" } };
    case "structured_dataset":
      return { structuredDatasetType: { format: type.format ?? "" } };
  }
}

export function toVariableMap(
  iface: WorkflowInterface
): { variables: Record<string, Variable> } {
  const variables: Record<string, Variable> = {};
  for (const [name, type] of Object.entries(iface)) {
    variables[name] = { type: toLiteralType(type), description: name };
  }
  return { variables };
}

export function toLiteral(value: InputValue): Literal {
  if (value instanceof StructuredDataset) {
    return {
      scalar: {
        structuredDataset: {
          uri: value.uri,
          metadata: { structuredDatasetType: { format: value.format ?? "" } },
        },
      },
    };
  }
  if (typeof value === "number") {
    return { scalar: { primitive: { integer: value } } };
  }
  return { scalar: { primitive: { stringValue: value } } };
}

export function toLiteralMap(inputs: ResolvedInputs): LiteralMap {
  const literals: Record<string, Literal> = {};
  for (const [name, value] of Object.entries(inputs)) {
    literals[name] = toLiteral(value);
  }
  return { literals };
}
