export interface CliArguments {
  /**
   * The name of the command to execute (e.g. `run`).
   */
  readonly command: string;
  /**
   * Positional arguments that follow the command name.
   */
  readonly positionals: string[];
  /**
   * Raw option map keyed by camelCase runtime keys (e.g. `destinationDir`).
   */
  readonly options: Record<string, unknown>;
  /**
   * Unrecognised `--flag value` pairs, in order, left for the command to
   * interpret (workflow inputs for `run`).
   */
  readonly passthrough: string[];
}
