import { Injectable } from "@nestjs/common";
import { EngineService, type RunResult } from "../../core/engine/engine.service";
import { describeExecution } from "../../core/remote/remote.types";
import type { CliArguments } from "../cli-arguments";
import { CliOptionsService } from "../cli-options.service";
import type { CliCommand, CliCommandMetadata } from "./cli-command";

export function formatLocalResult(result: unknown): string | undefined {
  if (result === undefined) {
    return undefined;
  }
  if (typeof result === "string") {
    return result;
  }
  if (typeof result === "bigint") {
    return result.toString();
  }
  return JSON.stringify(result, null, 2) ?? String(result);
}

@Injectable()
export class RunCommand implements CliCommand {
  readonly metadata: CliCommandMetadata = {
    name: "run",
    description:
      "Run a workflow from a script locally, or register and run it remotely with --remote.",
    usage: "run [options] <file>:<workflow> [--<input> <value> ...]",
  };

  constructor(
    private readonly engine: EngineService,
    private readonly optionsService: CliOptionsService
  ) {}

  async execute(args: CliArguments): Promise<void> {
    const [target, ...extraPositionals] = args.positionals;
    if (!target) {
      throw new Error("The run command requires a <file>:<workflow> argument.");
    }

    const options = this.optionsService.parse(args.options);
    const outcome = await this.engine.run({
      target,
      inputArgs: [...args.passthrough, ...extraPositionals],
      options,
    });

    this.print(outcome);
  }

  private print(outcome: RunResult): void {
    if (outcome.mode === "remote") {
      console.log(describeExecution(outcome.execution));
      return;
    }

    const rendered = formatLocalResult(outcome.result);
    if (rendered !== undefined) {
      console.log(rendered);
    }
  }
}
