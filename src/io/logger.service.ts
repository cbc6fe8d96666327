import { Injectable } from "@nestjs/common";
import fs from "fs";
import path from "path";
import pino, { type Logger, type LoggerOptions } from "pino";
import type { LoggingConfig, LoggingDestination } from "../config/types";

@Injectable()
export class LoggerService {
  private rootLogger: Logger | null = null;
  private cachedSignature = "";

  configure(config?: LoggingConfig): Logger {
    const signature = this.computeSignature(config);
    if (this.rootLogger && signature === this.cachedSignature) {
      return this.rootLogger;
    }
    this.rootLogger = this.buildLogger(config);
    this.cachedSignature = signature;
    return this.rootLogger;
  }

  getLogger(scope?: string): Logger {
    if (!this.rootLogger) {
      this.rootLogger = this.buildLogger();
    }
    if (!scope) {
      return this.rootLogger;
    }
    return this.rootLogger.child({ scope });
  }

  reset(): void {
    this.rootLogger = null;
    this.cachedSignature = "";
  }

  private computeSignature(config?: LoggingConfig): string {
    return JSON.stringify(config ?? {});
  }

  private resolvePrettyTransport(
    destination?: LoggingDestination
  ): LoggerOptions["transport"] {
    const wantsPretty =
      destination?.pretty ?? (destination?.type !== "file" && process.stderr.isTTY);
    if (!wantsPretty) return undefined;

    try {
      require.resolve("pino-pretty");
    } catch {
      return undefined;
    }

    return {
      target: "pino-pretty",
      options: {
        colorize: destination?.colorize ?? true,
        translateTime: "HH:MM:ss",
        ignore: "pid,hostname",
        // stdout carries workflow results, so pretty logs go to stderr.
        destination: destination?.type === "stdout" ? 1 : 2,
      },
    };
  }

  private prepareDestination(destination?: LoggingDestination) {
    switch (destination?.type) {
      case "stdout":
        return pino.destination({ fd: 1 });
      case "file": {
        const filePath = path.resolve(
          destination.path ?? ".scriptflow/logs/scriptflow.log"
        );
        fs.mkdirSync(path.dirname(filePath), { recursive: true });
        return pino.destination({ dest: filePath, sync: false });
      }
      case "stderr":
      default:
        return pino.destination({ fd: 2 });
    }
  }

  private buildLogger(config?: LoggingConfig): Logger {
    const level = config?.level ?? "info";
    const destination = config?.destination;
    const options: LoggerOptions = {
      level,
      base: undefined,
      timestamp:
        config?.enableTimestamps === false
          ? false
          : pino.stdTimeFunctions.isoTime,
    };

    const transport =
      destination?.type === "file" ? undefined : this.resolvePrettyTransport(destination);
    if (transport) {
      options.transport = transport;
      return pino(options);
    }

    return pino(options, this.prepareDestination(destination));
  }
}
