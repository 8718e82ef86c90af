import { describe, it, expect } from "vitest";
import {
  classifyToolError,
  ConfigError,
  GateCheckError,
  GoalGuardError,
  InvalidSequenceError,
  isSafeRunId,
  RunInFlightError,
  ToolInvocationError,
} from "./errors.js";

describe("classifyToolError", () => {
  it.each([
    ["request timed out", "timeout"],
    ["connect ECONNREFUSED 127.0.0.1:8080", "network"],
    ["fetch failed", "network"],
    ["spawn backtester ENOENT", "crash"],
    ["process exited with exit code 137", "crash"],
    ["strategy does not compile: unexpected token", "unknown"],
  ])("classifies %j as %s", (message, expected) => {
    expect(classifyToolError(message)).toBe(expected);
  });
});

describe("error taxonomy", () => {
  it("names the state and event of an invalid sequence", () => {
    const err = new InvalidSequenceError("INIT", "COMMIT");
    expect(err).toBeInstanceOf(GoalGuardError);
    expect(err.message).toBe("Event COMMIT is not allowed in state INIT");
    expect(err.toJSON()).toEqual({ kind: "invalid_sequence", message: "Event COMMIT is not allowed in state INIT" });
  });

  it("prefixes tool failures with the tool and class", () => {
    const err = new ToolInvocationError("backtest", "no response", "timeout");
    expect(err.message).toBe("backtest failed (timeout): no response");
    expect(err.kind).toBe("tool_invocation");
    expect(err.name).toBe("ToolInvocationError");
  });

  it("prefixes gate check failures with the check name", () => {
    expect(new GateCheckError("lint", "linter crashed").message).toBe("lint: linter crashed");
  });

  it("tags config errors", () => {
    expect(new ConfigError("bad").kind).toBe("config");
  });
});

describe("isSafeRunId", () => {
  it.each([
    ["run-1", true],
    ["9f1c2e7a-0b3d-4c5e-8f6a-7b8c9d0e1f2a", true],
    ["a.b_c", true],
    ["", false],
    ["..", false],
    ["a..b", false],
    ["../x", false],
    ["a/b", false],
    ["a\\b", false],
    [".hidden", false],
  ])("%j is safe: %s", (id, expected) => {
    expect(isSafeRunId(id)).toBe(expected);
  });
});

describe("RunInFlightError", () => {
  it("names the run", () => {
    const err = new RunInFlightError("run-1");
    expect(err.runId).toBe("run-1");
    expect(err.toJSON()).toEqual({ kind: "run_in_flight", message: "Run run-1 is already being driven" });
  });
});
