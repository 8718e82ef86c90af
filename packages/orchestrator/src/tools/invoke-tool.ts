import pTimeout, { TimeoutError } from "p-timeout";
import type { z } from "zod";
import { errorMessage, formatZodErrors } from "@goalguard/kit";
import { classifyToolError, ToolInvocationError } from "../lib/errors.js";
import { createChildLogger } from "../lib/logger.js";
import type { GoalRun } from "../types/run.js";
import {
  BacktestReportSchema,
  CommitReceiptSchema,
  LintReportSchema,
  StrategyArtifactSchema,
  StressReportSchema,
  TestReportSchema,
  VerificationReportSchema,
} from "../types/tools.js";
import type {
  ToolCallOptions,
  ToolCallRecord,
  ToolInvoker,
  ToolKind,
  ToolRequests,
  ToolResults,
} from "../types/tools.js";

const log = createChildLogger("tools");

export type ToolOutcome<T> = { ok: true; value: T } | { ok: false; error: ToolInvocationError };

const OUTPUT_SCHEMAS: { [K in ToolKind]: z.ZodType<ToolResults[K], z.ZodTypeDef, unknown> } = {
  generate_strategy: StrategyArtifactSchema,
  backtest: BacktestReportSchema,
  run_tests: TestReportSchema,
  lint: LintReportSchema,
  crv_verify: VerificationReportSchema,
  stress_test: StressReportSchema,
  commit: CommitReceiptSchema,
};

const DISPATCH: {
  [K in ToolKind]: (tools: ToolInvoker, req: ToolRequests[K], opts: ToolCallOptions) => Promise<unknown>;
} = {
  generate_strategy: (t, r, o) => t.generateStrategy(r, o),
  backtest: (t, r, o) => t.backtest(r, o),
  run_tests: (t, r, o) => t.runTests(r, o),
  lint: (t, r, o) => t.lint(r, o),
  crv_verify: (t, r, o) => t.crvVerify(r, o),
  stress_test: (t, r, o) => t.stressTest(r, o),
  commit: (t, r, o) => t.commit(r, o),
};

/** Identifiers only; datasets and full artifacts never land in the call log. */
export function summarizeRequest(request: ToolRequests[ToolKind]): Record<string, unknown> {
  const summary: Record<string, unknown> = {};
  if ("goal" in request) {
    summary.goal = request.goal;
    summary.riskPreference = request.riskPreference;
    summary.parameters = { ...request.parameters };
  }
  if ("strategy" in request) summary.strategyId = request.strategy.id;
  if ("data" in request) {
    summary.datasetId = request.data.id;
    summary.rows = request.data.timestamps.length;
  }
  if ("range" in request && request.range) summary.range = { ...request.range };
  if ("maxDrawdownLimit" in request) summary.maxDrawdownLimit = request.maxDrawdownLimit;
  return summary;
}

/**
 * Tool boundary bound to one run. Every call is appended to `run.toolCalls`
 * and resolves to an outcome; it never rejects.
 */
export interface ToolCaller {
  call<K extends ToolKind>(kind: K, request: ToolRequests[K]): Promise<ToolOutcome<ToolResults[K]>>;
  /** Records a call that could not be issued because a prerequisite is missing. */
  skip(kind: ToolKind, reason: string): void;
}

export interface ToolCallerOptions {
  timeoutMs: number;
  now?: () => Date;
}

export function createToolCaller(run: GoalRun, tools: ToolInvoker, opts: ToolCallerOptions): ToolCaller {
  const now = opts.now ?? (() => new Date());

  function record(entry: Omit<ToolCallRecord, "seq">): void {
    run.toolCalls.push({ seq: run.toolCalls.length + 1, ...entry });
  }

  return {
    async call<K extends ToolKind>(kind: K, request: ToolRequests[K]): Promise<ToolOutcome<ToolResults[K]>> {
      const input = summarizeRequest(request);
      const startedAt = now();
      const elapsed = () => Math.max(0, now().getTime() - startedAt.getTime());
      const controller = new AbortController();

      try {
        const raw = await pTimeout(DISPATCH[kind](tools, request, { signal: controller.signal }), {
          milliseconds: opts.timeoutMs,
        });
        const parsed = OUTPUT_SCHEMAS[kind].safeParse(raw);
        if (!parsed.success) {
          throw new ToolInvocationError(
            kind,
            `malformed output: ${formatZodErrors(parsed.error).join("; ")}`,
            "unknown",
          );
        }
        record({ kind, input, output: parsed.data, status: "ok", startedAt: startedAt.toISOString(), durationMs: elapsed() });
        log.debug({ runId: run.id, tool: kind }, "Tool call succeeded");
        return { ok: true, value: parsed.data };
      } catch (err) {
        const timedOut = err instanceof TimeoutError;
        if (timedOut) controller.abort();

        let error: ToolInvocationError;
        if (err instanceof ToolInvocationError) {
          error = err;
        } else if (timedOut) {
          error = new ToolInvocationError(kind, `no response within ${opts.timeoutMs}ms`, "timeout", { cause: err });
        } else {
          const message = errorMessage(err);
          error = new ToolInvocationError(kind, message, classifyToolError(message), { cause: err });
        }

        record({
          kind,
          input,
          error: { kind: error.kind, errorClass: error.errorClass, message: error.message },
          status: timedOut ? "timeout" : "failed",
          startedAt: startedAt.toISOString(),
          durationMs: elapsed(),
        });
        log.warn({ runId: run.id, tool: kind, errorClass: error.errorClass }, error.message);
        return { ok: false, error };
      }
    },

    skip(kind: ToolKind, reason: string): void {
      record({
        kind,
        input: {},
        error: { kind: "skipped", message: reason },
        status: "skipped",
        startedAt: now().toISOString(),
        durationMs: 0,
      });
      log.debug({ runId: run.id, tool: kind }, `Tool call skipped: ${reason}`);
    },
  };
}
