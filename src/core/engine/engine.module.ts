import { Module } from "@nestjs/common";
import { IoModule } from "../../io/io.module";
import { DataModule } from "../data/data.module";
import { LoaderModule } from "../loader/loader.module";
import { RemoteModule } from "../remote/remote.module";
import { ScriptModeModule } from "../script-mode/script-mode.module";
import { EngineService } from "./engine.service";

@Module({
  imports: [
    IoModule,
    DataModule,
    LoaderModule,
    RemoteModule,
    ScriptModeModule,
  ],
  providers: [EngineService],
  exports: [EngineService],
})
export class EngineModule {}
