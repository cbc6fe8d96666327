import { Injectable } from "@nestjs/common";
import fs from "fs/promises";
import os from "os";
import path from "path";
import { setTimeout as delay } from "timers/promises";
import type { Logger } from "pino";
import { fetch } from "undici";
import type { z } from "zod";
import type { RemoteConfig } from "../../config/types";
import { ExecutionTimeoutError, RemoteRequestError } from "../../errors";
import { LoggerService } from "../../io/logger.service";
import { FileAccessService } from "../data/file-access.service";
import { ScriptModeService } from "../script-mode/script-mode.service";
import { toLiteralMap } from "../workflow/literals";
import {
  buildLaunchPlanSpec,
  buildWorkflowSpec,
  type Identifier,
  type LoadedWorkflow,
  type SerializationSettings,
} from "../workflow/serialization";
import type { ResolvedInputs, UploadLocation } from "../workflow/types";
import {
  CREATE_EXECUTION_RESPONSE_SCHEMA,
  EXECUTION_RESPONSE_SCHEMA,
  UPLOAD_LOCATION_RESPONSE_SCHEMA,
  isTerminalPhase,
  type ExecutionHandle,
  type ExecutionIdentifier,
  type RegisteredWorkflow,
} from "./remote.types";

const SCRIPT_ARCHIVE_NAME = "script_mode.tar.gz";

export interface RemoteClientDependencies {
  readonly scriptMode: ScriptModeService;
  readonly fileAccess: FileAccessService;
  readonly logger: Logger;
  readonly sleep?: (ms: number) => Promise<unknown>;
  readonly now?: () => number;
}

type RequestMethod = "GET" | "POST";

/**
 * RemoteClient speaks the orchestration service's REST API: it issues upload
 * locations, registers script-mode workflows and starts executions.
 */
export class RemoteClient {
  private readonly baseUrl: string;
  private readonly sleep: (ms: number) => Promise<unknown>;
  private readonly now: () => number;

  constructor(
    private readonly config: RemoteConfig,
    private readonly deps: RemoteClientDependencies
  ) {
    this.baseUrl = config.endpoint.replace(/\/+$/, "");
    this.sleep = deps.sleep ?? ((ms) => delay(ms));
    this.now = deps.now ?? Date.now;
  }

  async createUploadLocation(
    project: string,
    domain: string,
    suffix?: string
  ): Promise<UploadLocation> {
    const body: Record<string, unknown> = {
      project,
      domain,
      expiresIn: `${this.config.uploadExpiresInSeconds}s`,
    };
    if (suffix) {
      body.filename = suffix;
    }

    const location = await this.request(
      "POST",
      "/api/v1/dataproxy/artifact_urn",
      UPLOAD_LOCATION_RESPONSE_SCHEMA,
      body
    );
    this.deps.logger.debug(
      { project, domain, nativeUrl: location.nativeUrl },
      "Issued upload location"
    );
    return location;
  }

  /**
   * Packages the workflow's script, uploads it to `presignedUrl` and registers
   * the workflow together with its default launch plan under `version`.
   */
  async registerWorkflowScriptMode(
    workflow: LoadedWorkflow,
    settings: SerializationSettings,
    version: string,
    presignedUrl: string
  ): Promise<RegisteredWorkflow> {
    const { project, domain } = settings;
    if (!project || !domain) {
      throw new Error("Serialization settings must name a project and domain.");
    }

    const scratch = await fs.mkdtemp(path.join(os.tmpdir(), "scriptflow-"));
    try {
      const archive = path.join(scratch, SCRIPT_ARCHIVE_NAME);
      await this.deps.scriptMode.compressScript(workflow.sourceFile, archive);
      await this.deps.fileAccess.putData(archive, presignedUrl);
    } finally {
      await fs.rm(scratch, { recursive: true, force: true });
    }

    const workflowId: Identifier = {
      resourceType: "WORKFLOW",
      project,
      domain,
      name: workflow.qualifiedName,
      version,
    };
    const launchPlanId: Identifier = { ...workflowId, resourceType: "LAUNCH_PLAN" };

    await this.register("/api/v1/workflows", {
      id: workflowId,
      spec: buildWorkflowSpec(workflow, workflowId, settings),
    });
    await this.register("/api/v1/launch_plans", {
      id: launchPlanId,
      spec: buildLaunchPlanSpec(workflow, workflowId),
    });

    this.deps.logger.info(
      { workflow: workflow.qualifiedName, version, project, domain },
      "Registered workflow"
    );

    return { workflow, workflowId, launchPlanId };
  }

  async executeWorkflow(
    registered: RegisteredWorkflow,
    inputs: ResolvedInputs,
    project: string,
    domain: string,
    wait: boolean
  ): Promise<ExecutionHandle> {
    const created = await this.request(
      "POST",
      "/api/v1/executions",
      CREATE_EXECUTION_RESPONSE_SCHEMA,
      {
        project,
        domain,
        spec: {
          launchPlan: registered.launchPlanId,
          metadata: { mode: "MANUAL" },
        },
        inputs: toLiteralMap(inputs),
      }
    );

    this.deps.logger.info({ execution: created.id.name }, "Started execution");

    if (!wait) {
      return { id: created.id, phase: "QUEUED" };
    }
    return this.waitForExecution(created.id);
  }

  async getExecution(id: ExecutionIdentifier): Promise<ExecutionHandle> {
    const execution = await this.request(
      "GET",
      `/api/v1/executions/${encodeURIComponent(id.project)}/${encodeURIComponent(id.domain)}/${encodeURIComponent(id.name)}`,
      EXECUTION_RESPONSE_SCHEMA
    );

    return {
      id: execution.id,
      phase: execution.closure?.phase ?? "UNDEFINED",
      outputs: execution.closure?.outputs,
      error: execution.closure?.error,
    };
  }

  private async waitForExecution(
    id: ExecutionIdentifier
  ): Promise<ExecutionHandle> {
    const deadline = this.now() + this.config.waitTimeoutMs;

    while (true) {
      const execution = await this.getExecution(id);
      if (isTerminalPhase(execution.phase)) {
        return execution;
      }

      this.deps.logger.debug(
        { execution: id.name, phase: execution.phase },
        "Waiting for execution"
      );

      if (this.now() + this.config.pollIntervalMs > deadline) {
        throw new ExecutionTimeoutError(id.name, this.config.waitTimeoutMs);
      }
      await this.sleep(this.config.pollIntervalMs);
    }
  }

  private async register(endpoint: string, body: unknown): Promise<void> {
    const response = await this.send("POST", endpoint, body);
    if (response.status === 409) {
      const detail = await response.text();
      this.deps.logger.debug({ endpoint, detail }, "Entity already registered");
      return;
    }
    await this.ensureOk("POST", endpoint, response);
    // undici holds the connection until the body is consumed
    await response.text();
  }

  private async request<T>(
    method: RequestMethod,
    endpoint: string,
    schema: z.ZodType<T>,
    body?: unknown
  ): Promise<T> {
    const response = await this.send(method, endpoint, body);
    await this.ensureOk(method, endpoint, response);
    const payload: unknown = await response.json();
    return schema.parse(payload);
  }

  private send(method: RequestMethod, endpoint: string, body?: unknown) {
    const headers: Record<string, string> = {
      Accept: "application/json",
    };
    if (body !== undefined) {
      headers["Content-Type"] = "application/json";
    }
    if (this.config.token) {
      headers.Authorization = `Bearer ${this.config.token}`;
    }

    return fetch(`${this.baseUrl}${endpoint}`, {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body),
    });
  }

  private async ensureOk(
    method: RequestMethod,
    endpoint: string,
    response: { ok: boolean; status: number; text(): Promise<string> }
  ): Promise<void> {
    if (response.ok) {
      return;
    }
    throw new RemoteRequestError(
      method,
      `${this.baseUrl}${endpoint}`,
      response.status,
      await response.text()
    );
  }
}

@Injectable()
export class RemoteClientFactory {
  constructor(
    private readonly scriptMode: ScriptModeService,
    private readonly fileAccess: FileAccessService,
    private readonly loggerService: LoggerService
  ) {}

  create(config: RemoteConfig): RemoteClient {
    return new RemoteClient(config, {
      scriptMode: this.scriptMode,
      fileAccess: this.fileAccess,
      logger: this.loggerService.getLogger("remote"),
    });
  }
}
