#!/usr/bin/env node
import "reflect-metadata";
import { NestFactory } from "@nestjs/core";
import { AppModule } from "./app.module";
import { CliRunnerService } from "./cli/cli-runner.service";
import { resolveCliRuntimeOptionsFromEnv } from "./config/runtime-env";

export async function bootstrap(argv: string[] = process.argv.slice(2)): Promise<number> {
  const runtimeOptions = resolveCliRuntimeOptionsFromEnv(process.env);
  const app = await NestFactory.createApplicationContext(
    AppModule.forRoot(runtimeOptions),
    { logger: false },
  );

  let exitCode = 0;

  try {
    const runner = app.get(CliRunnerService);
    await runner.run(argv);
  } catch (error) {
    exitCode = 1;
    const message = error instanceof Error ? error.message : String(error);
    console.error(message);
  } finally {
    await app.close();
  }

  return exitCode;
}

if (require.main === module) {
  void bootstrap().then((exitCode) => {
    if (exitCode !== 0) {
      process.exit(exitCode);
    }
  });
}
