export type ScriptflowErrorCode =
  | "validation"
  | "lookup"
  | "conversion"
  | "unsupported_type"
  | "missing_argument_value"
  | "remote_request"
  | "execution_timeout";

/**
 * Base class for every failure scriptflow raises on its own behalf. Errors from
 * collaborators (network, filesystem) are never wrapped and reach the process
 * boundary unchanged.
 */
export abstract class ScriptflowError extends Error {
  abstract readonly code: ScriptflowErrorCode;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends ScriptflowError {
  readonly code = "validation";
}

export class LookupError extends ScriptflowError {
  readonly code = "lookup";
}

export class ConversionError extends ScriptflowError {
  readonly code = "conversion";

  constructor(
    readonly argument: string,
    readonly value: string,
    expected: string
  ) {
    super(`Invalid value "${value}" for argument ${argument}: expected ${expected}.`);
  }
}

export class UnsupportedTypeError extends ScriptflowError {
  readonly code = "unsupported_type";

  constructor(
    readonly argument: string,
    readonly typeKind: string
  ) {
    super(`Unsupported type for argument ${argument}: ${typeKind}`);
  }
}

export class MissingArgumentValueError extends ScriptflowError {
  readonly code = "missing_argument_value";

  constructor(readonly flag: string) {
    super(`Argument ${flag} requires a value.`);
  }
}

export class RemoteRequestError extends ScriptflowError {
  readonly code = "remote_request";

  constructor(
    readonly method: string,
    readonly url: string,
    readonly status: number,
    readonly body: string
  ) {
    const excerpt = body.length > 200 ? `${body.slice(0, 200)}...` : body;
    super(
      `${method} ${url} failed with status ${status}${excerpt ? `: ${excerpt}` : ""}`
    );
  }
}

export class ExecutionTimeoutError extends ScriptflowError {
  readonly code = "execution_timeout";

  constructor(
    readonly executionName: string,
    readonly timeoutMs: number
  ) {
    super(
      `Execution ${executionName} did not finish within ${timeoutMs}ms.`
    );
  }
}
