import { Injectable } from "@nestjs/common";
import { createHash } from "crypto";
import fs from "fs/promises";
import path from "path";
import { create as createTarball } from "tar";

@Injectable()
export class ScriptModeService {
  /**
   * Content hash of the script, used as the registered version so that an
   * unchanged script registers to the same version.
   */
  async hashScriptFile(filePath: string): Promise<string> {
    const contents = await fs.readFile(filePath);
    return createHash("md5").update(contents).digest("hex");
  }

  /**
   * Writes a gzip tarball holding the script under its base name.
   */
  async compressScript(filePath: string, archivePath: string): Promise<void> {
    const absolute = path.resolve(filePath);
    await fs.mkdir(path.dirname(archivePath), { recursive: true });
    await createTarball(
      {
        gzip: true,
        file: archivePath,
        cwd: path.dirname(absolute),
        portable: true,
      },
      [path.basename(absolute)]
    );
  }
}
