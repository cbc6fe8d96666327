import {
  ConfigurableModuleBuilder,
  Module,
  type DynamicModule,
} from "@nestjs/common";
import { ConfigModule } from "./config/config.module";
import type { ConfigModuleOptions } from "./config/config.const";
import type { CliRuntimeOptions } from "./config/types";
import { CliModule } from "./cli/cli.module";
import { EngineModule } from "./core/engine/engine.module";
import { IoModule } from "./io/io.module";

export type AppModuleOptions = CliRuntimeOptions;

const { ConfigurableModuleClass } =
  new ConfigurableModuleBuilder<AppModuleOptions>({
    moduleName: "ScriptflowCliModule",
  }).build();

const toConfigModuleOptions = (
  options: AppModuleOptions = {},
): ConfigModuleOptions => ({ cliOptions: options });

const appendConfigImport = <T extends { imports?: DynamicModule["imports"] }>(
  dynamicModule: T,
  configImport: DynamicModule,
) => ({
  ...dynamicModule,
  imports: [...(dynamicModule.imports ?? []), configImport],
});

@Module({
  imports: [IoModule, EngineModule, CliModule],
})
export class AppModule extends ConfigurableModuleClass {
  static forRoot(options?: AppModuleOptions): DynamicModule {
    const dynamicModule = super.register(options ?? {});
    const configImport = ConfigModule.register(toConfigModuleOptions(options));

    return appendConfigImport(dynamicModule, configImport);
  }
}
