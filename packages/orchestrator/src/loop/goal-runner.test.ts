import { describe, it, expect } from "vitest";
import { RetryBudgetExhaustedError, RunInFlightError } from "../lib/errors.js";
import type { ArtifactRecord } from "../store/artifact-store.js";
import { MemoryArtifactStore } from "../store/memory-artifact-store.js";
import { createFakeTools, fixedClock, makeRequest, makeRun, testConfig } from "../test-helpers.js";
import type { FakeTools } from "../test-helpers.js";
import type { GoalRun } from "../types/run.js";
import { GoalRunner } from "./goal-runner.js";

function setup(rawConfig: unknown = {}): { runner: GoalRunner; fake: FakeTools; store: MemoryArtifactStore } {
  const fake = createFakeTools();
  const store = new MemoryArtifactStore(fixedClock);
  const runner = new GoalRunner({ tools: fake, store, config: testConfig(rawConfig), now: fixedClock });
  return { runner, fake, store };
}

async function runToError(runner: GoalRunner): Promise<RetryBudgetExhaustedError> {
  const err = await runner.run(makeRequest()).then(
    () => undefined,
    (e: unknown) => e,
  );
  if (!(err instanceof RetryBudgetExhaustedError)) throw new Error("expected the run to exhaust its budget");
  return err;
}

const events = (run: GoalRun): string[] => run.history.map((h) => h.event.type);

/** Refuses every gate result; everything else is stored. */
class GateResultRefusingStore extends MemoryArtifactStore {
  override async put(record: ArtifactRecord): Promise<string> {
    if (record.kind === "gate_result") throw new Error("ENOSPC: no space left on device");
    return super.put(record);
  }
}

describe("GoalRunner", () => {
  it("commits a strategy that clears both gates", async () => {
    const { runner, fake, store } = setup();

    const run = await runner.run(makeRequest());

    expect(run.state).toBe("COMMITTED");
    expect(run.outcome).toEqual({ status: "COMMITTED", reason: "Committed as commit-1" });
    expect(run.artifacts.committedId).toBe("commit-1");
    expect(events(run)).toEqual(["GENERATE_STRATEGY", "BACKTEST", "RUN_TESTS", "PASS", "CRV_VERIFY", "PASS", "COMMIT"]);
    expect(run.toolCalls.map((c) => c.kind)).toEqual([
      "generate_strategy",
      "backtest",
      "run_tests",
      "backtest",
      "backtest",
      "backtest",
      "lint",
      "crv_verify",
      "stress_test",
      "commit",
    ]);
    expect(fake.commit).toHaveBeenCalledTimes(1);
    expect(run.metrics).toEqual({ sharpe: 1.8, maxDrawdown: 0.12, winRate: 0.56 });
    expect((await store.list("run-1")).map((r) => r.record.kind)).toEqual([
      "gate_result",
      "readiness_scorecard",
      "gate_result",
      "goal_run",
    ]);
  });

  it("never verifies a strategy that failed the dev gate", async () => {
    const { runner, fake } = setup({ reflexion: { maxRetries: 1 } });
    fake.runTests.mockResolvedValue({ passed: false, total: 12, failed: 2, failures: [] });

    const err = await runToError(runner);

    expect(fake.crvVerify).not.toHaveBeenCalled();
    expect(err.run.reflexions).toHaveLength(1);
    expect(err.run.reflexions[0].failureContext.gate).toBe("dev");
    expect(err.run.reflexions[0].failureContext.failedChecks).toEqual(["unit_tests"]);
  });

  it("ends in ERROR once the retry budget is spent", async () => {
    const { runner, fake, store } = setup();
    fake.runTests.mockResolvedValue({ passed: false, total: 12, failed: 2, failures: [] });

    const err = await runToError(runner);
    const { run } = err;

    expect(err.message).toBe("Run run-1 exhausted its reflexion budget after 3 iteration(s)");
    expect(run.state).toBe("ERROR");
    expect(run.outcome).toEqual({
      status: "ERROR",
      reason: "Retry budget of 3 exhausted after dev failure: unit tests failed: 2/12",
      errorKind: "retry_budget_exhausted",
    });
    expect(run.reflexions.map((r) => r.decision)).toEqual(["retry", "retry", "exhausted"]);
    // seven calls per cycle, none after the third failure
    expect(run.toolCalls).toHaveLength(21);
    expect(fake.generateStrategy).toHaveBeenCalledTimes(3);
    expect(fake.generateStrategy.mock.calls[1][0]).toEqual({
      goal: "Trend-following strategy with Sharpe above 1",
      riskPreference: "moderate",
      parameters: { lookback: 20, positionSize: 1 },
      hints: ["Fix the strategy logic exercised by the failing unit tests"],
    });
    expect(store.ofKind("run-1", "reflexion")).toHaveLength(3);
    expect(store.ofKind("run-1", "goal_run")[0].payload.state).toBe("ERROR");
  });

  it("cancels before the first step without calling any tool", async () => {
    const { runner, fake } = setup();
    const controller = new AbortController();
    controller.abort();

    const run = await runner.run(makeRequest(), { signal: controller.signal });

    expect(run.state).toBe("CANCELLED");
    expect(run.outcome).toEqual({ status: "CANCELLED", reason: "Cancelled by caller", errorKind: "cancelled" });
    expect(run.toolCalls).toEqual([]);
    expect(fake.generateStrategy).not.toHaveBeenCalled();
  });

  it("cancels between transitions once the signal fires", async () => {
    const { runner, fake } = setup();
    const controller = new AbortController();
    fake.runTests.mockImplementationOnce(async () => {
      controller.abort();
      return { passed: true, total: 12, failed: 0, failures: [] };
    });

    const run = await runner.run(makeRequest(), { signal: controller.signal });

    expect(events(run)).toEqual(["GENERATE_STRATEGY", "BACKTEST", "RUN_TESTS", "CANCEL"]);
    expect(run.history.at(-1)?.from).toBe("DEV_GATE");
    expect(run.toolCalls).toHaveLength(3);
  });

  it("re-runs verification without regenerating after a verifier outage", async () => {
    const { runner, fake } = setup();
    fake.crvVerify.mockRejectedValueOnce(new Error("connect ECONNREFUSED 127.0.0.1:8080"));

    const run = await runner.run(makeRequest());

    expect(run.state).toBe("COMMITTED");
    expect(fake.generateStrategy).toHaveBeenCalledTimes(1);
    expect(run.reflexions).toHaveLength(1);
    expect(run.reflexions[0].plan?.locus).toBe("verification");
    expect(run.gateResults[1].errors).toEqual([
      "verification report unavailable: crv_verify failed (network): connect ECONNREFUSED 127.0.0.1:8080",
    ]);
    expect(run.gateResults[1].infrastructureFailures).toEqual(["crv"]);
    expect(events(run)).toEqual([
      "GENERATE_STRATEGY",
      "BACKTEST",
      "RUN_TESTS",
      "PASS",
      "CRV_VERIFY",
      "FAIL",
      "RETRY_AVAILABLE",
      "RUN_TESTS",
      "PASS",
      "CRV_VERIFY",
      "PASS",
      "COMMIT",
    ]);
    expect(run.history[6].to).toBe("BACKTEST_COMPLETE");
  });

  it("reflects on a failed commit and commits on the retry", async () => {
    const { runner, fake } = setup();
    fake.commit.mockRejectedValueOnce(new Error("registry write failed: ECONNRESET"));

    const run = await runner.run(makeRequest());

    expect(run.state).toBe("COMMITTED");
    expect(fake.commit).toHaveBeenCalledTimes(2);
    const commitResult = run.gateResults.find((g) => g.gate === "commit");
    expect(commitResult?.errors).toEqual(["commit failed (network): registry write failed: ECONNRESET"]);
    expect(commitResult?.infrastructureFailures).toEqual(["commit"]);
    expect(run.reflexions[0].plan?.retryState).toBe("BACKTEST_COMPLETE");
    expect(run.context.reflexionCount).toBe(1);
  });

  it("regenerates the strategy with repaired parameters after a product-gate failure", async () => {
    const { runner, fake } = setup();
    fake.stressTest.mockResolvedValueOnce({ passed: false, scenarios: [{ name: "rate-shock", maxDrawdown: 0.31 }] });

    const run = await runner.run(makeRequest());

    expect(run.state).toBe("COMMITTED");
    expect(run.reflexions[0].plan?.locus).toBe("design");
    expect(fake.generateStrategy).toHaveBeenCalledTimes(2);
    expect(fake.generateStrategy.mock.calls[1][0].parameters).toEqual({ lookback: 20, positionSize: 0.8 });
  });

  it("keeps driving to a terminal state when the store refuses a record", async () => {
    const fake = createFakeTools();
    const store = new GateResultRefusingStore(fixedClock);
    const runner = new GoalRunner({ tools: fake, store, config: testConfig(), now: fixedClock });

    const run = await runner.run(makeRequest());

    expect(run.state).toBe("COMMITTED");
    expect(run.outcome).toEqual({ status: "COMMITTED", reason: "Committed as commit-1" });
    expect(run.storeFailures).toEqual([
      "Could not store gate_result: ENOSPC: no space left on device",
      "Could not store gate_result: ENOSPC: no space left on device",
    ]);
    expect((await store.list("run-1")).map((r) => r.record.kind)).toEqual(["readiness_scorecard", "goal_run"]);
    expect(store.ofKind("run-1", "goal_run")[0].payload.storeFailures).toHaveLength(2);
  });

  it("drops the previous backtest's metrics when the strategy is regenerated", async () => {
    const { runner, fake } = setup({ reflexion: { maxRetries: 2 } });
    fake.backtest.mockImplementation(async (req) => ({
      strategyId: req.strategy.id,
      metrics: { sharpe: 0.3, maxDrawdown: 0.1, winRate: 0.6 },
    }));
    fake.runTests.mockResolvedValue({ passed: false, total: 12, failed: 2, failures: [] });
    fake.generateStrategy
      .mockResolvedValueOnce({ id: "strat-1", name: "Momentum v1", parameters: { lookback: 20, positionSize: 1 } })
      .mockRejectedValueOnce(new Error("socket hang up ECONNRESET"));

    const { run } = await runToError(runner);

    expect(run.reflexions[0].failureContext.metrics).toEqual({ sharpe: 0.3, maxDrawdown: 0.1, winRate: 0.6 });
    expect(run.reflexions[1].failureContext.metrics).toEqual({});
    expect(run.reflexions[1].suggestions.map((s) => s.description)).not.toContain(
      "Improve risk-adjusted returns through volatility targeting",
    );
    expect(run.metrics).toEqual({});
  });

  it("refuses a second drive of a run that is already being driven", async () => {
    const { runner, fake } = setup();
    const run = makeRun();

    const results = await Promise.allSettled([runner.drive(run), runner.drive(run)]);

    expect(results.map((r) => r.status)).toEqual(["fulfilled", "rejected"]);
    expect(results[1]).toEqual({ status: "rejected", reason: expect.any(RunInFlightError) });
    expect(run.state).toBe("COMMITTED");
    expect(fake.generateStrategy).toHaveBeenCalledTimes(1);
    expect(events(run).filter((e) => e === "GENERATE_STRATEGY")).toHaveLength(1);
    await expect(runner.drive(run)).resolves.toBe(run);
  });
});
