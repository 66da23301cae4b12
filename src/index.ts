/**
 * seqflow
 *
 * Client for sequential workflow execution servers: agent name resolution,
 * idempotent registration, streaming with fallback, result normalization.
 */

// Client
export {
  WorkflowClient,
  createClientFromEnv,
  type ExecutionMode,
  type WorkflowExecuteOptions,
  type WorkflowClientOptions,
  type WorkflowSummary,
  type WorkflowStatus
} from "./seqflow/client.js";

// Workflow model
export { Workflow, createWorkflow } from "./seqflow/workflow/workflow.js";
export {
  STEP_DEFAULTS,
  WORKFLOW_DEFAULTS,
  type StepOptions,
  type WorkflowStep,
  type WorkflowOptions,
  type ApiWorkflowStep,
  type ApiWorkflowDefinition
} from "./seqflow/workflow/types.js";
export * from "./seqflow/workflow/templates.js";
export { WorkflowFileSchema, workflowFromJson, loadWorkflowFile, type WorkflowFile } from "./seqflow/workflow/file.js";

// Agents
export { HttpAgentDirectory, parseAgentList, type AgentDirectory, type AgentEntry } from "./seqflow/agents/directory.js";
export { AgentNameResolver } from "./seqflow/agents/resolver.js";

// Registration
export {
  WorkflowRegistrar,
  type RegisterOptions,
  type RegistrationReport
} from "./seqflow/registrar.js";

// Execution
export type {
  StepOutcome,
  CanonicalResult,
  ExecutionStrategy,
  ExecuteOptions,
  ExecutionEvent,
  ExecutionEventHandler,
  ExecutionReport,
  AttemptRecord,
  StreamOutcome,
  StreamState
} from "./seqflow/execution/types.js";
export { normalizeResult, looksComplete, STEP_COLLECTION_KEYS } from "./seqflow/execution/normalizer.js";
export { StreamingExecutor, StreamStateMachine } from "./seqflow/execution/streaming.js";
export { SyncExecutor } from "./seqflow/execution/sync.js";
export { FallbackCoordinator } from "./seqflow/execution/fallback.js";

// Plumbing
export { HttpTransport, type FetchLike } from "./seqflow/http/transport.js";
export {
  ClientConfigSchema,
  parseClientConfig,
  loadConfigFromEnv,
  type ClientConfig,
  type ClientConfigInput,
  type ConflictPolicy
} from "./seqflow/config.js";
export { createLogger, silentLogger, type Logger, type LogLevel } from "./seqflow/logger.js";
export { SeqflowError, isSeqflowError, toSeqflowError, type SeqflowErrorCode } from "./seqflow/errors.js";
