import { describe, expect, it } from "vitest";
import {
  describeExecution,
  isTerminalPhase,
} from "../../../../src/core/remote/remote.types";

const id = { project: "flytesnacks", domain: "development", name: "exec-1" };

describe("describeExecution", () => {
  it("prints the identifier and phase", () => {
    expect(describeExecution({ id, phase: "QUEUED" })).toBe(
      "Execution(project=flytesnacks, domain=development, name=exec-1, phase=QUEUED)"
    );
  });

  it("lists outputs and errors below the header", () => {
    expect(
      describeExecution({
        id,
        phase: "FAILED",
        outputs: { o0: "partial", rows: 3 },
        error: { code: "USER:Error", message: "boom" },
      })
    ).toBe(
      [
        "Execution(project=flytesnacks, domain=development, name=exec-1, phase=FAILED)",
        '  o0 = "partial"',
        "  rows = 3",
        "  error = [USER:Error] boom",
      ].join("\n")
    );
  });

  it("omits a missing error code", () => {
    expect(
      describeExecution({ id, phase: "FAILED", error: { message: "boom" } })
    ).toBe(
      "Execution(project=flytesnacks, domain=development, name=exec-1, phase=FAILED)\n  error = boom"
    );
  });
});

describe("isTerminalPhase", () => {
  it.each(["SUCCEEDED", "FAILED", "ABORTED", "TIMED_OUT"])("%s is terminal", (phase) => {
    expect(isTerminalPhase(phase)).toBe(true);
  });

  it.each(["QUEUED", "RUNNING", "UNDEFINED"])("%s is not terminal", (phase) => {
    expect(isTerminalPhase(phase)).toBe(false);
  });
});
