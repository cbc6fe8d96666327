import { randomUUID } from "crypto";
import fs from "fs/promises";
import path from "path";
import { pathToFileURL } from "url";
import type { UploadLocation } from "../workflow/types";

/**
 * Issues upload locations inside a local staging directory so local runs can
 * stage structured data the same way remote runs do. Both URLs of a location
 * point at the same file. Locations live until `cleanup` is called.
 */
export class LocalDataProxy {
  private readonly issued: string[] = [];

  constructor(
    private readonly stagingDir: string,
    private readonly generateId: () => string = randomUUID
  ) {}

  async createUploadLocation(filename = "data"): Promise<UploadLocation> {
    const directory = path.resolve(this.stagingDir, this.generateId());
    this.issued.push(directory);
    const url = pathToFileURL(path.join(directory, filename)).href;
    return { nativeUrl: url, signedUrl: url };
  }

  /** Removes every location this proxy has issued. */
  async cleanup(): Promise<void> {
    const directories = this.issued.splice(0);
    for (const directory of directories) {
      await fs.rm(directory, { recursive: true, force: true });
    }
  }
}
