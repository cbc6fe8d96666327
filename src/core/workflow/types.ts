export type SimpleTypeKind =
  | "string"
  | "integer"
  | "float"
  | "boolean"
  | "datetime"
  | "blob";

export interface SimpleType<Kind extends SimpleTypeKind = SimpleTypeKind> {
  readonly kind: Kind;
}

export interface StructuredDatasetType {
  readonly kind: "structured_dataset";
  readonly format?: string;
}

/**
 * Declared type of a workflow input or output. The union is closed: code that
 * switches over `kind` is checked for exhaustiveness by the compiler.
 */
export type TypeTag =
  | SimpleType<"string">
  | SimpleType<"integer">
  | SimpleType<"float">
  | SimpleType<"boolean">
  | SimpleType<"datetime">
  | SimpleType<"blob">
  | StructuredDatasetType;

export type TypeKind = TypeTag["kind"];

export type WorkflowInterface = Readonly<Record<string, TypeTag>>;

export const types = {
  string: (): SimpleType<"string"> => ({ kind: "string" }),
  integer: (): SimpleType<"integer"> => ({ kind: "integer" }),
  float: (): SimpleType<"float"> => ({ kind: "float" }),
  boolean: (): SimpleType<"boolean"> => ({ kind: "boolean" }),
  datetime: (): SimpleType<"datetime"> => ({ kind: "datetime" }),
  blob: (): SimpleType<"blob"> => ({ kind: "blob" }),
  structuredDataset: (format?: string): StructuredDatasetType =>
    format ? { kind: "structured_dataset", format } : { kind: "structured_dataset" },
} as const;

/**
 * Reference to tabular data that lives at a remote-addressable location.
 */
export class StructuredDataset {
  constructor(
    readonly uri: string,
    readonly format?: string
  ) {}

  toJSON(): { uri: string; format?: string } {
    return this.format ? { uri: this.uri, format: this.format } : { uri: this.uri };
  }
}

export type InputValue = string | number | StructuredDataset;

export type ResolvedInputs = Record<string, InputValue>;

export interface UploadLocation {
  /** Address the orchestration service uses internally. */
  readonly nativeUrl: string;
  /** Short-lived URL a client can write the file to. */
  readonly signedUrl: string;
}
