import { Injectable } from "@nestjs/common";
import fs from "fs/promises";
import path from "path";
import { fileURLToPath } from "url";
import { fetch } from "undici";
import { RemoteRequestError } from "../../errors";
import { redactSignedUrl } from "../../io/redact";

function isHttpUrl(target: string): boolean {
  return target.startsWith("https://") || target.startsWith("http://");
}

function toLocalPath(target: string): string {
  return target.startsWith("file://") ? fileURLToPath(target) : path.resolve(target);
}

/**
 * FileAccessService moves local files to the locations handed out by a data
 * proxy: signed HTTP URLs are written with a PUT, file URLs are copied.
 */
@Injectable()
export class FileAccessService {
  async putData(localPath: string, remoteUrl: string): Promise<void> {
    if (isHttpUrl(remoteUrl)) {
      const body = await fs.readFile(localPath);
      const response = await fetch(remoteUrl, {
        method: "PUT",
        headers: {
          "Content-Type": "application/octet-stream",
          "Content-Length": String(body.byteLength),
        },
        body,
      });

      if (!response.ok) {
        throw new RemoteRequestError(
          "PUT",
          redactSignedUrl(remoteUrl),
          response.status,
          await response.text()
        );
      }
      return;
    }

    const destination = toLocalPath(remoteUrl);
    await fs.mkdir(path.dirname(destination), { recursive: true });
    await fs.copyFile(localPath, destination);
  }
}
