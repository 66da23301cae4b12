/**
 * Execution result and event types.
 */

/**
 * Outcome of one step, independent of transport.
 */
export type StepOutcome = {
  success: boolean;
  output: string;
  error: string | null;
  executionTimeMs: number;
};

/**
 * Normalized, transport-independent outcome of a workflow run.
 */
export type CanonicalResult = {
  workflowId: string;
  success: boolean;
  totalExecutionTimeMs: number;
  stepResults: Record<string, StepOutcome>;
  finalOutput: string;
};

export type ExecutionStrategy = "stream" | "poll" | "sync";

export type ExecuteOptions = {
  /** Sent to the server as `input_context` */
  inputContext?: Record<string, unknown>;
  /** Closes the stream; the fallback ladder continues as after an empty close */
  signal?: AbortSignal;
  onEvent?: ExecutionEventHandler;
};

// ============================================================================
// Streaming
// ============================================================================

export type StreamState = "awaiting_step" | "in_step" | "done";

export type StreamIncompleteReason =
  | "closed_without_result"
  | "aborted"
  | "http_status"
  | "transport_error"
  | "invalid_body";

export type StreamOutcome =
  | { kind: "terminal"; result: CanonicalResult; transport: "sse" | "json" }
  | {
      kind: "incomplete";
      reason: StreamIncompleteReason;
      state: StreamState;
      detail: string;
      /** Steps that completed before the stream ended */
      partialStepResults: Record<string, StepOutcome>;
      /** Messages of `error` events received before the stream ended */
      serverErrors: string[];
    };

// ============================================================================
// Events
// ============================================================================

export type StepStartEvent = {
  type: "step_start";
  stepId: string;
  stepName: string | null;
  agentName: string | null;
};

export type OutputEvent = {
  type: "output";
  /** null when the text arrived before any step started */
  stepId: string | null;
  text: string;
};

export type StepCompleteEvent = {
  type: "step_complete";
  stepId: string;
  success: boolean;
  error: string | null;
};

export type ServerErrorEvent = {
  type: "server_error";
  stepId: string | null;
  message: string;
};

export type WorkflowCompleteEvent = {
  type: "workflow_complete";
  workflowId: string;
};

/** The server answered a stream request with a plain JSON body. */
export type TransportDegradedEvent = {
  type: "transport_degraded";
  contentType: string;
};

export type FallbackEvent = {
  type: "fallback";
  from: ExecutionStrategy;
  to: ExecutionStrategy;
  reason: string;
};

export type ExecutionEvent =
  | StepStartEvent
  | OutputEvent
  | StepCompleteEvent
  | ServerErrorEvent
  | WorkflowCompleteEvent
  | TransportDegradedEvent
  | FallbackEvent;

export type ExecutionEventHandler = (event: ExecutionEvent) => void;

// ============================================================================
// Fallback
// ============================================================================

export type AttemptRecord = {
  strategy: ExecutionStrategy;
  ok: boolean;
  detail: string;
};

export type ExecutionReport = {
  result: CanonicalResult;
  strategy: ExecutionStrategy;
  attempts: AttemptRecord[];
};
