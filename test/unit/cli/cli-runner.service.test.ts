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
import type { CliArguments } from "../../../src/cli/cli-arguments";
import { CliParseError, CliParserService } from "../../../src/cli/cli-parser.service";
import { CliRunnerService } from "../../../src/cli/cli-runner.service";
import type { CliCommand } from "../../../src/cli/commands/cli-command";
import { LoggerService } from "../../../src/io/logger.service";

const createStubCommand = (name: string, aliases: string[] = []) => {
  const execute = vi.fn(async (_args: CliArguments) => {});
  const command: CliCommand = {
    metadata: {
      name,
      aliases,
      description: `${name} things`,
      usage: `${name} <target>`,
    },
    execute,
  };
  return { command, execute };
};

describe("CliRunnerService", () => {
  let runner: CliRunnerService;
  let execute: ReturnType<typeof createStubCommand>["execute"];
  let log: MockInstance<typeof console.log>;

  beforeEach(() => {
    const loggerService = new LoggerService();
    vi.spyOn(loggerService, "getLogger").mockReturnValue(pino({ level: "silent" }));
    const stub = createStubCommand("run", ["r"]);
    execute = stub.execute;
    runner = new CliRunnerService(new CliParserService(), loggerService, [
      stub.command,
    ]);
    log = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    log.mockRestore();
  });

  it("dispatches to the named command", async () => {
    await runner.run(["run", "flow.ts:wf", "--limit", "3"]);

    expect(execute).toHaveBeenCalledWith({
      command: "run",
      options: {},
      positionals: ["flow.ts:wf"],
      passthrough: ["--limit", "3"],
    });
  });

  it("resolves aliases case-insensitively", async () => {
    await runner.run(["R", "flow.ts:wf"]);

    expect(execute).toHaveBeenCalledTimes(1);
  });

  it("drops a leading separator", async () => {
    await runner.run(["--", "run", "flow.ts:wf"]);

    expect(execute).toHaveBeenCalledWith(
      expect.objectContaining({ positionals: ["flow.ts:wf"] })
    );
  });

  it("prints usage for help", async () => {
    await runner.run(["--help"]);

    const lines = log.mock.calls.map(([line]) => line);
    expect(lines[0]).toBe("Usage: scriptflow <command> [options]");
    expect(lines).toContain("- run (aliases: r): run things\n    run <target>");
    expect(lines).toContain(
      "  --remote: Register the script and execute it on the orchestration service"
    );
    expect(lines).toContain("  --project, -p: Project to register and run in");
    expect(execute).not.toHaveBeenCalled();
  });

  it("prints usage and fails without a command", async () => {
    await expect(runner.run([])).rejects.toThrow("No command provided.");
    expect(log).toHaveBeenCalledWith("Usage: scriptflow <command> [options]");
  });

  it("rejects unknown commands", async () => {
    await expect(runner.run(["deploy"])).rejects.toThrow("Unknown command: deploy");
  });

  it("surfaces parse failures as plain errors", async () => {
    const result = runner.run(["run", "-p"]);

    await expect(result).rejects.toThrow("Option -p requires a value.");
    await expect(result).rejects.not.toBeInstanceOf(CliParseError);
  });

  it("propagates command failures", async () => {
    execute.mockRejectedValueOnce(new Error("workflow failed"));

    await expect(runner.run(["run", "flow.ts:wf"])).rejects.toThrow(
      "workflow failed"
    );
  });
});
