import {
  ConversionError,
  LookupError,
  MissingArgumentValueError,
  UnsupportedTypeError,
  ValidationError,
} from "../../errors";
import {
  StructuredDataset,
  type InputValue,
  type ResolvedInputs,
  type TypeTag,
  type UploadLocation,
  type WorkflowInterface,
} from "./types";

const ARGUMENT_PREFIX = "--";
const INTEGER_LITERAL = /^[+-]?\d+(?:_\d+)*$/;

/**
 * Collaborators used to stage file-backed inputs. Each structured dataset
 * argument costs exactly one location and one transfer.
 */
export interface ArgumentStager {
  createUploadLocation(): Promise<UploadLocation>;
  putData(localPath: string, remoteUrl: string): Promise<void>;
}

/**
 * Resolves `--name value` pairs against a workflow's declared inputs.
 * Pairs are handled in order, so uploads happen in the order they appear.
 */
export async function resolveWorkflowInputs(
  tokens: readonly string[],
  inputInterface: WorkflowInterface,
  stager: ArgumentStager
): Promise<ResolvedInputs> {
  if (tokens.length % 2 !== 0) {
    throw new MissingArgumentValueError(tokens[tokens.length - 1]);
  }

  const resolved: ResolvedInputs = {};

  for (let i = 0; i < tokens.length; i += 2) {
    const flag = tokens[i];
    const raw = tokens[i + 1];
    const name = stripArgumentPrefix(flag);

    if (!Object.hasOwn(inputInterface, name)) {
      throw new LookupError(`Workflow has no input named ${name}`);
    }

    resolved[name] = await resolveValue(name, raw, inputInterface[name], stager);
  }

  return resolved;
}

function stripArgumentPrefix(flag: string): string {
  const name = flag.startsWith(ARGUMENT_PREFIX)
    ? flag.slice(ARGUMENT_PREFIX.length)
    : "";
  if (name.length === 0) {
    throw new ValidationError(
      `Expected a workflow input flag like --name, received "${flag}"`
    );
  }
  return name;
}

async function resolveValue(
  name: string,
  raw: string,
  type: TypeTag,
  stager: ArgumentStager
): Promise<InputValue> {
  switch (type.kind) {
    case "string":
      return raw;
    case "integer":
      return parseInteger(name, raw);
    case "structured_dataset": {
      const location = await stager.createUploadLocation();
      await stager.putData(raw, location.signedUrl);
      return new StructuredDataset(location.nativeUrl, type.format);
    }
    case "float":
    case "boolean":
    case "datetime":
    case "blob":
      throw new UnsupportedTypeError(name, type.kind);
    default:
      return assertNever(type);
  }
}

export function parseInteger(name: string, raw: string): number {
  const trimmed = raw.trim();
  if (!INTEGER_LITERAL.test(trimmed)) {
    throw new ConversionError(name, raw, "an integer");
  }

  const value = Number(trimmed.replace(/_/g, ""));
  if (!Number.isSafeInteger(value)) {
    throw new ConversionError(name, raw, "an integer within the safe range");
  }
  return value;
}

function assertNever(value: never): never {
  throw new Error(`Unhandled type tag: ${JSON.stringify(value)}`);
}
