import { Injectable } from "@nestjs/common";
import path from "path";
import type { Logger } from "pino";
import { ConfigService } from "../../config/config.service";
import { parseImageConfig } from "../../config/image-config";
import type { CliRuntimeOptions, ScriptflowConfig } from "../../config/types";
import { LoggerService } from "../../io/logger.service";
import { FileAccessService } from "../data/file-access.service";
import { LocalDataProxy } from "../data/local-data-proxy";
import { ModuleLoaderService } from "../loader/module-loader.service";
import { RemoteClientFactory } from "../remote/remote-client";
import type { ExecutionHandle } from "../remote/remote.types";
import { ScriptModeService } from "../script-mode/script-mode.service";
import {
  resolveWorkflowInputs,
  type ArgumentStager,
} from "../workflow/argument-resolver";
import type {
  LoadedWorkflow,
  SerializationSettings,
} from "../workflow/serialization";
import {
  locateWorkflowModule,
  parseWorkflowTarget,
  type WorkflowTarget,
} from "../workflow/target";

export interface EngineOptions extends CliRuntimeOptions {
  /** Directory scripts and relative paths are resolved against. */
  cwd?: string;
}

export interface RunRequest {
  /** `<file>:<workflow>` as typed on the command line. */
  readonly target: string;
  /** Raw `--name value` tokens addressed to the workflow's inputs. */
  readonly inputArgs: readonly string[];
  readonly options?: EngineOptions;
}

export type RunResult =
  | { readonly mode: "local"; readonly workflow: LoadedWorkflow; readonly result: unknown }
  | { readonly mode: "remote"; readonly workflow: LoadedWorkflow; readonly execution: ExecutionHandle };

/**
 * EngineService runs a workflow script end to end: it resolves configuration,
 * loads the script, turns command-line tokens into typed inputs and either
 * executes the workflow in-process or registers and executes it remotely.
 * Every step runs sequentially.
 */
@Injectable()
export class EngineService {
  constructor(
    private readonly configService: ConfigService,
    private readonly loggerService: LoggerService,
    private readonly moduleLoader: ModuleLoaderService,
    private readonly scriptMode: ScriptModeService,
    private readonly fileAccess: FileAccessService,
    private readonly remoteClientFactory: RemoteClientFactory
  ) {}

  async run(request: RunRequest): Promise<RunResult> {
    const target = parseWorkflowTarget(request.target);
    const { cwd: cwdOverride, ...runtimeOptions } = request.options ?? {};
    const cwd = cwdOverride ?? process.cwd();

    const cfg = await this.configService.load(runtimeOptions);
    const logger = this.configureLogger(cfg);

    const { project, domain } = cfg.defaults;
    const workflow = await this.loadWorkflow(target, { project, domain }, cwd);
    logger.debug(
      { workflow: workflow.qualifiedName, file: workflow.sourceFile },
      "Loaded workflow"
    );

    if (request.options?.remote) {
      return this.runRemote(workflow, request.inputArgs, cfg, logger);
    }
    return this.runLocal(workflow, request.inputArgs, cfg, cwd, logger);
  }

  /**
   * Imports the target's script with `settings` and returns the named
   * workflow. The script's search root is only visible during the import.
   */
  async loadWorkflow(
    target: WorkflowTarget,
    settings: SerializationSettings,
    cwd: string
  ): Promise<LoadedWorkflow> {
    const location = locateWorkflowModule(target.filename, cwd);
    await this.moduleLoader.withSearchPath(location.searchRoot, () =>
      this.moduleLoader.importModule(location.moduleName, settings)
    );
    return this.moduleLoader.loadObject(
      `${location.moduleName}.${target.workflowName}`
    );
  }

  private async runLocal(
    workflow: LoadedWorkflow,
    inputArgs: readonly string[],
    cfg: ScriptflowConfig,
    cwd: string,
    logger: Logger
  ): Promise<RunResult> {
    const proxy = new LocalDataProxy(path.resolve(cwd, cfg.staging.localDir));
    try {
      const inputs = await resolveWorkflowInputs(
        inputArgs,
        workflow.entity.inputs,
        this.createStager(() => proxy.createUploadLocation())
      );

      logger.info({ workflow: workflow.qualifiedName }, "Running workflow locally");
      const result = await workflow.entity.execute(inputs);
      return { mode: "local", workflow, result };
    } finally {
      // staged inputs only live for the duration of the run
      await proxy.cleanup();
    }
  }

  private async runRemote(
    workflow: LoadedWorkflow,
    inputArgs: readonly string[],
    cfg: ScriptflowConfig,
    logger: Logger
  ): Promise<RunResult> {
    const { project, domain, destinationDir } = cfg.defaults;
    const image = parseImageConfig(cfg.defaults.images);
    const client = this.remoteClientFactory.create(cfg.remote);

    const inputs = await resolveWorkflowInputs(
      inputArgs,
      workflow.entity.inputs,
      this.createStager(() => client.createUploadLocation(project, domain))
    );

    const version = await this.scriptMode.hashScriptFile(workflow.sourceFile);
    const uploadLocation = await client.createUploadLocation(
      project,
      domain,
      `scriptmode-${version}.tar.gz`
    );

    const settings: SerializationSettings = {
      ...workflow.settings,
      project,
      domain,
      image,
      fastSerialization: {
        enabled: true,
        destinationDir,
        distributionLocation: uploadLocation.nativeUrl,
      },
    };

    logger.info(
      { workflow: workflow.qualifiedName, version, project, domain },
      "Registering workflow in script mode"
    );
    const registered = await client.registerWorkflowScriptMode(
      workflow,
      settings,
      version,
      uploadLocation.signedUrl
    );

    const execution = await client.executeWorkflow(
      registered,
      inputs,
      project,
      domain,
      true
    );
    return { mode: "remote", workflow, execution };
  }

  private createStager(
    createUploadLocation: ArgumentStager["createUploadLocation"]
  ): ArgumentStager {
    return {
      createUploadLocation,
      putData: (localPath, remoteUrl) =>
        this.fileAccess.putData(localPath, remoteUrl),
    };
  }

  private configureLogger(cfg: ScriptflowConfig): Logger {
    this.loggerService.configure(cfg.logging);
    return this.loggerService.getLogger("engine");
  }
}
