import { Module } from "@nestjs/common";
import { IoModule } from "../../io/io.module";
import { DataModule } from "../data/data.module";
import { ScriptModeModule } from "../script-mode/script-mode.module";
import { RemoteClientFactory } from "./remote-client";

@Module({
  imports: [IoModule, DataModule, ScriptModeModule],
  providers: [RemoteClientFactory],
  exports: [RemoteClientFactory],
})
export class RemoteModule {}
