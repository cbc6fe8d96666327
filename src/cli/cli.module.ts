import { Module, type Provider } from "@nestjs/common";
import { EngineModule } from "../core/engine/engine.module";
import { IoModule } from "../io/io.module";
import { CliOptionsService } from "./cli-options.service";
import { CliParserService } from "./cli-parser.service";
import { CliRunnerService } from "./cli-runner.service";
import { CLI_COMMANDS } from "./cli.constants";
import { RunCommand } from "./commands/run.command";
import type { CliCommand } from "./commands/cli-command";

const commandProviders: Provider[] = [
  RunCommand,
  {
    provide: CLI_COMMANDS,
    useFactory: (run: RunCommand): CliCommand[] => [run],
    inject: [RunCommand],
  },
];

/**
 * CliModule bundles the CLI surface so commands and supporting services can be
 * injected wherever a Nest application context is available.
 */
@Module({
  imports: [EngineModule, IoModule],
  providers: [
    CliOptionsService,
    CliParserService,
    CliRunnerService,
    ...commandProviders,
  ],
  exports: [CliRunnerService],
})
export class CliModule {}
