/**
 * Result normalization.
 *
 * Servers disagree on how a workflow result is wrapped and keyed. Every
 * known shape is probed here, in one place, and reduced to a
 * CanonicalResult. normalizeResult() is total: unknown shapes degrade to a
 * mostly empty result instead of throwing.
 */

import { isRecord } from "../http/transport.js";
import type { CanonicalResult, StepOutcome } from "./types.js";

export type NormalizeContext = {
  /** Used when the body does not name the workflow */
  workflowId: string;
  /** Client-measured wall clock, used when the server omits timing */
  elapsedMs: number;
};

/** Probe order for the step collection; first present key wins. */
export const STEP_COLLECTION_KEYS = ["step_results", "steps", "executed_steps", "results"] as const;

const OUTPUT_KEYS = ["output", "result", "response", "text", "content"] as const;
const NESTED_OUTPUT_KEYS = ["result_data", "data"] as const;
const SUCCESS_STATUSES = new Set(["completed", "success", "succeeded"]);
const FAILURE_STATUSES = new Set(["failed", "cancelled", "error"]);

export function asText(value: unknown): string | null {
  if (value === undefined || value === null) return null;
  if (typeof value === "string") return value;
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

export function asNumber(value: unknown): number | null {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function pickOutput(record: Record<string, unknown>): string {
  for (const key of OUTPUT_KEYS) {
    const text = asText(record[key]);
    if (text !== null) return text;
  }
  for (const nestedKey of NESTED_OUTPUT_KEYS) {
    const nested = record[nestedKey];
    if (!isRecord(nested)) continue;
    for (const key of OUTPUT_KEYS) {
      const text = asText(nested[key]);
      if (text !== null) return text;
    }
  }
  return "";
}

export function pickError(value: unknown): string | null {
  if (typeof value === "string") return value.length > 0 ? value : null;
  if (isRecord(value) && typeof value.message === "string") {
    return value.message.length > 0 ? value.message : null;
  }
  return null;
}

type StepLookups = {
  errors: Record<string, unknown>;
  times: Record<string, unknown>;
};

function ownValue(record: Record<string, unknown>, key: string): unknown {
  return Object.prototype.hasOwnProperty.call(record, key) ? record[key] : undefined;
}

function normalizeStep(stepId: string, raw: unknown, lookups: StepLookups): StepOutcome {
  const sideError = pickError(ownValue(lookups.errors, stepId));
  const sideTime = asNumber(ownValue(lookups.times, stepId));

  if (!isRecord(raw)) {
    // Bare entries (e.g. executed_steps: ["s1", "s2"]) carry no detail.
    return {
      success: sideError === null,
      output: typeof raw === "string" && raw !== stepId ? raw : "",
      error: sideError,
      executionTimeMs: sideTime ?? 0
    };
  }

  let success: boolean;
  if (typeof raw.success === "boolean") {
    success = raw.success;
  } else if (typeof raw.status === "string") {
    success = SUCCESS_STATUSES.has(raw.status.toLowerCase());
  } else {
    success = false;
  }

  return {
    success,
    output: pickOutput(raw),
    error: pickError(raw.error) ?? pickError(raw.error_message) ?? sideError,
    executionTimeMs: asNumber(raw.execution_time_ms) ?? asNumber(raw.duration_ms) ?? sideTime ?? 0
  };
}

function entryId(entry: unknown, index: number): string {
  if (typeof entry === "string") return entry;
  if (isRecord(entry)) {
    for (const key of ["step_id", "id", "name"] as const) {
      const value = entry[key];
      if (typeof value === "string" && value.length > 0) return value;
    }
  }
  return `step_${index + 1}`;
}

function collectSteps(body: Record<string, unknown>): Record<string, StepOutcome> {
  const lookups: StepLookups = {
    errors: isRecord(body.step_errors) ? body.step_errors : {},
    times: isRecord(body.step_execution_times) ? body.step_execution_times : {}
  };

  const key = STEP_COLLECTION_KEYS.find(candidate => body[candidate] !== undefined && body[candidate] !== null);
  if (key === undefined) return {};
  const collection = body[key];

  // A Map keeps ids such as "__proto__" as ordinary keys.
  const steps = new Map<string, StepOutcome>();
  if (Array.isArray(collection)) {
    collection.forEach((entry, index) => {
      const stepId = entryId(entry, index);
      steps.set(stepId, normalizeStep(stepId, entry, lookups));
    });
  } else if (isRecord(collection)) {
    for (const [stepId, entry] of Object.entries(collection)) {
      steps.set(stepId, normalizeStep(stepId, entry, lookups));
    }
  }
  return Object.fromEntries(steps);
}

function deriveSuccess(body: Record<string, unknown>, steps: Record<string, StepOutcome>): boolean {
  if (typeof body.success === "boolean") return body.success;
  if (typeof body.status === "string") {
    const status = body.status.toLowerCase();
    if (SUCCESS_STATUSES.has(status)) return true;
    if (FAILURE_STATUSES.has(status)) return false;
  }
  const outcomes = Object.values(steps);
  return outcomes.length > 0 && outcomes.every(step => step.success);
}

/** Output of the last step that reports success, or "". */
export function lastSuccessfulOutput(steps: Record<string, StepOutcome>): string {
  const successful = Object.values(steps).filter(step => step.success);
  return successful[successful.length - 1]?.output ?? "";
}

function deriveFinalOutput(body: Record<string, unknown>, steps: Record<string, StepOutcome>): string {
  return asText(body.final_output) ?? lastSuccessfulOutput(steps);
}

export function emptyResult(context: NormalizeContext): CanonicalResult {
  return {
    workflowId: context.workflowId,
    success: false,
    totalExecutionTimeMs: context.elapsedMs,
    stepResults: {},
    finalOutput: ""
  };
}

/**
 * The record a result is read from: the `data` object of an envelope, or
 * the body itself when it has no `data` key. An envelope whose `data` is
 * not an object (`{ success: true, data: null }`) carries no result.
 */
function resultBody(raw: unknown): Record<string, unknown> | null {
  if (!isRecord(raw)) return null;
  if (!("data" in raw)) return raw;
  return isRecord(raw.data) ? raw.data : null;
}

function namesStepCollection(body: Record<string, unknown>): boolean {
  return STEP_COLLECTION_KEYS.some(key => body[key] !== undefined && body[key] !== null);
}

/** Whether the body names a step collection under any probed key. */
export function hasStepCollection(raw: unknown): boolean {
  const body = resultBody(raw);
  return body !== null && namesStepCollection(body);
}

export function normalizeResult(raw: unknown, context: NormalizeContext): CanonicalResult {
  const body = resultBody(raw);
  if (body === null) return emptyResult(context);

  const stepResults = collectSteps(body);
  const workflowId = typeof body.workflow_id === "string" && body.workflow_id.length > 0
    ? body.workflow_id
    : context.workflowId;

  return {
    workflowId,
    success: deriveSuccess(body, stepResults),
    totalExecutionTimeMs:
      asNumber(body.total_execution_time_ms) ?? asNumber(body.execution_time_ms) ?? context.elapsedMs,
    stepResults,
    finalOutput: deriveFinalOutput(body, stepResults)
  };
}

/**
 * Whether a payload looks like a finished run (used on poll results).
 */
export function looksComplete(raw: unknown): boolean {
  const body = resultBody(raw);
  if (body === null) return false;
  if (typeof body.status === "string") {
    const status = body.status.toLowerCase();
    if (status === "pending" || status === "running" || status === "registered") return false;
  }
  return typeof body.success === "boolean" || namesStepCollection(body);
}
