import { Module } from "@nestjs/common";
import { ScriptModeService } from "./script-mode.service";

@Module({
  providers: [ScriptModeService],
  exports: [ScriptModeService],
})
export class ScriptModeModule {}
