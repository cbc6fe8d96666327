import { Module } from "@nestjs/common";
import { FileAccessService } from "./file-access.service";

@Module({
  providers: [FileAccessService],
  exports: [FileAccessService],
})
export class DataModule {}
