import pino from "pino";
import {
  afterEach,
  beforeEach,
  describe,
  expect,
  it,
  vi,
  type MockInstance,
} from "vitest";
import { CliOptionsService } from "../../../src/cli/cli-options.service";
import { RunCommand, formatLocalResult } from "../../../src/cli/commands/run.command";
import { ConfigService } from "../../../src/config/config.service";
import { ConfigValidator } from "../../../src/config/validation/config-validator";
import { FileAccessService } from "../../../src/core/data/file-access.service";
import { EngineService } from "../../../src/core/engine/engine.service";
import { ModuleLoaderService } from "../../../src/core/loader/module-loader.service";
import { RemoteClientFactory } from "../../../src/core/remote/remote-client";
import { ScriptModeService } from "../../../src/core/script-mode/script-mode.service";
import type { LoadedWorkflow } from "../../../src/core/workflow/serialization";
import { defineWorkflow } from "../../../src/core/workflow/workflow";
import { LoggerService } from "../../../src/io/logger.service";

const workflow: LoadedWorkflow = {
  qualifiedName: "flow.wf",
  moduleName: "flow",
  exportName: "wf",
  sourceFile: "/work/flow.ts",
  settings: {},
  entity: defineWorkflow({ run: () => undefined }),
};

const createEngine = () => {
  const loggerService = new LoggerService();
  vi.spyOn(loggerService, "getLogger").mockReturnValue(pino({ level: "silent" }));
  const scriptMode = new ScriptModeService();
  const fileAccess = new FileAccessService();
  return new EngineService(
    new ConfigService(new ConfigValidator()),
    loggerService,
    new ModuleLoaderService(),
    scriptMode,
    fileAccess,
    new RemoteClientFactory(scriptMode, fileAccess, loggerService)
  );
};

describe("RunCommand", () => {
  let engine: EngineService;
  let command: RunCommand;
  let log: MockInstance<typeof console.log>;

  beforeEach(() => {
    engine = createEngine();
    command = new RunCommand(engine, new CliOptionsService());
    log = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    log.mockRestore();
  });

  it("hands the target, inputs and options to the engine", async () => {
    const run = vi
      .spyOn(engine, "run")
      .mockResolvedValue({ mode: "local", workflow, result: undefined });

    await command.execute({
      command: "run",
      positionals: ["flow.ts:wf", "--extra", "1"],
      options: { project: "analytics", remote: true },
      passthrough: ["--limit", "3"],
    });

    expect(run).toHaveBeenCalledWith({
      target: "flow.ts:wf",
      inputArgs: ["--limit", "3", "--extra", "1"],
      options: { project: "analytics", remote: true },
    });
    expect(log).not.toHaveBeenCalled();
  });

  it("prints local results", async () => {
    vi.spyOn(engine, "run").mockResolvedValue({
      mode: "local",
      workflow,
      result: { rows: 2 },
    });

    await command.execute({
      command: "run",
      positionals: ["flow.ts:wf"],
      options: {},
      passthrough: [],
    });

    expect(log).toHaveBeenCalledWith('{\n  "rows": 2\n}');
  });

  it("prints the remote execution", async () => {
    vi.spyOn(engine, "run").mockResolvedValue({
      mode: "remote",
      workflow,
      execution: {
        id: { project: "p", domain: "d", name: "exec-1" },
        phase: "SUCCEEDED",
      },
    });

    await command.execute({
      command: "run",
      positionals: ["flow.ts:wf"],
      options: { remote: true },
      passthrough: [],
    });

    expect(log).toHaveBeenCalledWith(
      "Execution(project=p, domain=d, name=exec-1, phase=SUCCEEDED)"
    );
  });

  it("requires a target", async () => {
    await expect(
      command.execute({ command: "run", positionals: [], options: {}, passthrough: [] })
    ).rejects.toThrow("The run command requires a <file>:<workflow> argument.");
  });
});

describe("formatLocalResult", () => {
  it("renders results for the terminal", () => {
    expect(formatLocalResult(undefined)).toBeUndefined();
    expect(formatLocalResult("hello")).toBe("hello");
    expect(formatLocalResult(10n)).toBe("10");
    expect(formatLocalResult(3)).toBe("3");
    expect(formatLocalResult(null)).toBe("null");
    expect(formatLocalResult(["a"])).toBe('[\n  "a"\n]');
  });
});
