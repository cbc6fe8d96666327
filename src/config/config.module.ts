import { Module } from "@nestjs/common";
import { ConfigurableConfigModule } from "./config.const";
import { ConfigService } from "./config.service";
import { ConfigValidator } from "./validation/config-validator";

@Module({
  providers: [ConfigService, ConfigValidator],
  exports: [ConfigService],
})
export class ConfigModule extends ConfigurableConfigModule {}
