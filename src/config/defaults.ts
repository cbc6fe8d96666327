import type { ScriptflowConfig } from "./types";

export const DEFAULT_PROJECT = "flytesnacks";
export const DEFAULT_DOMAIN = "development";
export const DEFAULT_DESTINATION_DIR = "/root";
export const DEFAULT_IMAGE = "ghcr.io/flyteorg/flytekit:py3.9-latest";

export const DEFAULT_CONFIG: ScriptflowConfig = {
  remote: {
    endpoint: "http://localhost:30080",
    pollIntervalMs: 5_000,
    waitTimeoutMs: 60 * 60 * 1_000,
    uploadExpiresInSeconds: 3_600,
  },
  defaults: {
    project: DEFAULT_PROJECT,
    domain: DEFAULT_DOMAIN,
    destinationDir: DEFAULT_DESTINATION_DIR,
    images: [DEFAULT_IMAGE],
  },
  staging: {
    localDir: ".scriptflow/staging",
  },
  logging: {
    level: "info",
    destination: {
      type: "stderr",
      pretty: true,
      colorize: true,
    },
    enableTimestamps: true,
  },
};
