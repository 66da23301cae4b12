import { describe, expect, it } from "vitest";
import { looksComplete, normalizeResult } from "../src/seqflow/execution/normalizer.js";

const ctx = { workflowId: "w1", elapsedMs: 42 };

describe("normalizeResult", () => {
  it("reads a step_results map", () => {
    const result = normalizeResult(
      {
        success: true,
        total_execution_time_ms: 100,
        final_output: "hi",
        step_results: { s1: { success: true, output: "hi", execution_time_ms: 12 } }
      },
      ctx
    );

    expect(result).toEqual({
      workflowId: "w1",
      success: true,
      totalExecutionTimeMs: 100,
      stepResults: { s1: { success: true, output: "hi", error: null, executionTimeMs: 12 } },
      finalOutput: "hi"
    });
  });

  it("reads a steps array and derives success from the steps", () => {
    const result = normalizeResult(
      {
        steps: [
          { step_id: "a", status: "completed", result: "one" },
          { step_id: "b", status: "failed", error: "boom" }
        ]
      },
      ctx
    );

    expect(result).toEqual({
      workflowId: "w1",
      success: false,
      totalExecutionTimeMs: 42,
      stepResults: {
        a: { success: true, output: "one", error: null, executionTimeMs: 0 },
        b: { success: false, output: "", error: "boom", executionTimeMs: 0 }
      },
      finalOutput: "one"
    });
  });

  it("reads executed_steps with side tables for errors and timings", () => {
    const result = normalizeResult(
      {
        workflow_id: "w9",
        executed_steps: ["s1", "s2"],
        step_errors: { s2: "timeout" },
        step_execution_times: { s1: 5, s2: "7" }
      },
      ctx
    );

    expect(result.workflowId).toBe("w9");
    expect(result.success).toBe(false);
    expect(result.stepResults).toEqual({
      s1: { success: true, output: "", error: null, executionTimeMs: 5 },
      s2: { success: false, output: "", error: "timeout", executionTimeMs: 7 }
    });
    expect(result.finalOutput).toBe("");
  });

  it("reads a results array with nested output", () => {
    const result = normalizeResult(
      { success: true, results: [{ name: "summarize", success: true, result_data: { text: "nested" } }] },
      ctx
    );

    expect(result.stepResults).toEqual({
      summarize: { success: true, output: "nested", error: null, executionTimeMs: 0 }
    });
    expect(result.finalOutput).toBe("nested");
  });

  it("yields empty steps when no collection is present", () => {
    expect(normalizeResult({ success: true }, ctx)).toEqual({
      workflowId: "w1",
      success: true,
      totalExecutionTimeMs: 42,
      stepResults: {},
      finalOutput: ""
    });
  });

  it("degrades non-objects to an empty failed result", () => {
    expect(normalizeResult("Internal Server Error", ctx)).toEqual({
      workflowId: "w1",
      success: false,
      totalExecutionTimeMs: 42,
      stepResults: {},
      finalOutput: ""
    });
    expect(normalizeResult(null, ctx).success).toBe(false);
  });

  it("looks inside the data envelope", () => {
    const result = normalizeResult(
      { success: true, data: { success: false, step_results: { s1: { success: false, error: { message: "crashed" } } } } },
      ctx
    );

    expect(result.success).toBe(false);
    expect(result.stepResults.s1).toEqual({ success: false, output: "", error: "crashed", executionTimeMs: 0 });
  });

  it("reads an envelope without data as an empty result", () => {
    expect(normalizeResult({ success: true, data: null }, ctx)).toEqual({
      workflowId: "w1",
      success: false,
      totalExecutionTimeMs: 42,
      stepResults: {},
      finalOutput: ""
    });
  });

  it("keeps steps whose id is an object prototype key", () => {
    const raw: unknown = JSON.parse(
      '{"success":true,"step_results":{"__proto__":{"success":true,"output":"kept"}},"step_errors":{}}'
    );

    const result = normalizeResult(raw, ctx);

    expect(Object.keys(result.stepResults)).toEqual(["__proto__"]);
    expect(Object.getOwnPropertyDescriptor(result.stepResults, "__proto__")?.value).toEqual({
      success: true,
      output: "kept",
      error: null,
      executionTimeMs: 0
    });
    expect(result.finalOutput).toBe("kept");
  });

  it("prefers the first collection key present", () => {
    const result = normalizeResult(
      { step_results: { a: { success: true } }, steps: [{ step_id: "b", success: true }] },
      ctx
    );
    expect(Object.keys(result.stepResults)).toEqual(["a"]);
  });

  it("names anonymous array entries by position", () => {
    const result = normalizeResult({ steps: [{ success: true, output: "x" }, { success: true, output: "y" }] }, ctx);
    expect(Object.keys(result.stepResults)).toEqual(["step_1", "step_2"]);
  });

  it("serializes structured outputs", () => {
    const result = normalizeResult(
      { success: true, final_output: { summary: "ok" }, step_results: { s1: { success: true, output: { score: 3 } } } },
      ctx
    );
    expect(result.stepResults.s1?.output).toBe('{"score":3}');
    expect(result.finalOutput).toBe('{"summary":"ok"}');
  });

  it("lets status strings decide success", () => {
    expect(normalizeResult({ status: "completed" }, ctx).success).toBe(true);
    expect(normalizeResult({ status: "cancelled", step_results: { s1: { success: true } } }, ctx).success).toBe(false);
  });

  it("falls back from total to plain execution time", () => {
    expect(normalizeResult({ execution_time_ms: 77 }, ctx).totalExecutionTimeMs).toBe(77);
  });
});

describe("looksComplete", () => {
  it("rejects runs that are still going", () => {
    expect(looksComplete({ status: "running", success: false })).toBe(false);
    expect(looksComplete({ status: "pending", step_results: {} })).toBe(false);
  });

  it("accepts bodies that report an outcome or steps", () => {
    expect(looksComplete({ success: true })).toBe(true);
    expect(looksComplete({ status: "completed", step_results: {} })).toBe(true);
    expect(looksComplete({ data: { success: false } })).toBe(true);
  });

  it("rejects bodies without outcome or steps", () => {
    expect(looksComplete({ message: "no result yet" })).toBe(false);
    expect(looksComplete({ success: true, data: null })).toBe(false);
    expect(looksComplete("done")).toBe(false);
  });
});
