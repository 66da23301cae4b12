/**
 * Workflow model types and the wire format the server accepts.
 */

import { z } from "zod";

/** Workflow and step ids accepted by the server */
export const IdentifierSchema = z
  .string()
  .min(1)
  .max(100)
  .regex(/^[A-Za-z0-9_-]+$/, "Only letters, digits, '_' and '-' are allowed");

/**
 * Per-step options beyond the required id, agent and prompt.
 */
export type StepOptions = {
  /** Operation on the worker (default "inference") */
  functionName?: string;
  /** Server-enforced step timeout */
  timeoutSeconds?: number;
  /** Server-enforced retry budget */
  maxRetries?: number;
  temperature?: number;
  maxTokens?: number;
  /** Extra payload merged into the step parameters */
  parameters?: Record<string, unknown>;
  continueOnFailure?: boolean;
  stepName?: string;
  description?: string;
};

/**
 * A step as held by the model. Agents are referenced by name only.
 */
export type WorkflowStep = {
  stepId: string;
  stepName: string;
  description: string;
  agentName: string;
  prompt: string;
  functionName: string;
  timeoutSeconds: number;
  maxRetries: number;
  temperature: number;
  maxTokens: number;
  parameters: Record<string, unknown>;
  continueOnFailure: boolean;
};

export type WorkflowOptions = {
  name?: string;
  description?: string;
  stopOnFailure?: boolean;
  maxExecutionTimeSeconds?: number;
  globalContext?: Record<string, unknown>;
};

export const STEP_DEFAULTS = {
  functionName: "inference",
  timeoutSeconds: 60,
  maxRetries: 2,
  temperature: 0.7,
  maxTokens: 1000,
  model: "default"
} as const;

export const WORKFLOW_DEFAULTS = {
  stopOnFailure: true,
  maxExecutionTimeSeconds: 300
} as const;

// ============================================================================
// Wire format
// ============================================================================

export type ApiWorkflowStep = {
  step_id: string;
  step_name: string;
  description: string;
  agent_id: string;
  function_name: string;
  timeout_seconds: number;
  max_retries: number;
  continue_on_failure: boolean;
  parameters: Record<string, unknown>;
};

export type ApiWorkflowDefinition = {
  workflow_id: string;
  workflow_name: string;
  description: string;
  stop_on_failure: boolean;
  max_execution_time_seconds: number;
  global_context: Record<string, unknown>;
  steps: ApiWorkflowStep[];
};
