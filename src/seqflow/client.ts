/**
 * WorkflowClient - one instance per server connection.
 *
 * Owns the agent directory cache, the registrar and both execution
 * strategies. Every execute call registers the workflow again first: the
 * server's store may have been cleared since the last call.
 */

import { HttpAgentDirectory, type AgentDirectory, type AgentEntry } from "./agents/directory.js";
import { AgentNameResolver } from "./agents/resolver.js";
import { loadConfigFromEnv, parseClientConfig, type ClientConfig, type ClientConfigInput } from "./config.js";
import { SeqflowError } from "./errors.js";
import { FallbackCoordinator } from "./execution/fallback.js";
import { looksComplete, normalizeResult } from "./execution/normalizer.js";
import { StreamingExecutor } from "./execution/streaming.js";
import { SyncExecutor } from "./execution/sync.js";
import type { CanonicalResult, ExecuteOptions, ExecutionReport } from "./execution/types.js";
import {
  HttpTransport,
  describeErrorBody,
  isRecord,
  unwrapEnvelope,
  type FetchLike,
  type JsonResponse
} from "./http/transport.js";
import { createLogger, type Logger } from "./logger.js";
import { WorkflowRegistrar, type RegisterOptions, type RegistrationReport } from "./registrar.js";
import type { Workflow } from "./workflow/workflow.js";

export type ExecutionMode =
  /** Stream, falling back to the stored result and then a blocking call */
  | "stream"
  /** One blocking call */
  | "sync";

export type WorkflowExecuteOptions = ExecuteOptions & {
  mode?: ExecutionMode;
  registration?: RegisterOptions;
};

export type WorkflowClientOptions = {
  config?: ClientConfigInput;
  logger?: Logger;
  /** Replaces the global fetch (tests, proxies) */
  fetch?: FetchLike;
  /** Replaces the HTTP agent directory */
  directory?: AgentDirectory;
};

export type WorkflowSummary = {
  workflowId: string;
  name: string;
  totalSteps: number;
  status: string;
};

export type WorkflowStatus = {
  workflowId: string;
  status: string;
  raw: Record<string, unknown>;
};

export class WorkflowClient {
  readonly config: ClientConfig;
  readonly resolver: AgentNameResolver;
  readonly registrar: WorkflowRegistrar;
  private readonly transport: HttpTransport;
  private readonly logger: Logger;
  private readonly syncExecutor: SyncExecutor;
  private readonly streamingExecutor: StreamingExecutor;
  private readonly coordinator: FallbackCoordinator;

  constructor(options: WorkflowClientOptions = {}) {
    this.config = parseClientConfig(options.config);
    this.logger = options.logger ?? createLogger({ level: this.config.logLevel });
    this.transport = new HttpTransport({
      baseUrl: this.config.baseUrl,
      apiPrefix: this.config.apiPrefix,
      timeoutMs: this.config.requestTimeoutMs,
      logger: this.logger,
      ...(options.fetch !== undefined && { fetch: options.fetch })
    });

    const directory = options.directory ?? new HttpAgentDirectory(this.transport);
    this.resolver = new AgentNameResolver(directory, this.logger);
    this.registrar = new WorkflowRegistrar({
      transport: this.transport,
      resolver: this.resolver,
      logger: this.logger,
      workflowsPath: this.config.workflowsPath,
      onConflict: this.config.onConflict,
      verify: this.config.verifyRegistration
    });

    const shared = { transport: this.transport, logger: this.logger, workflowsPath: this.config.workflowsPath };
    this.syncExecutor = new SyncExecutor(shared);
    this.streamingExecutor = new StreamingExecutor({ ...shared, timeoutMs: this.config.streamTimeoutMs });
    this.coordinator = new FallbackCoordinator({
      ...shared,
      streaming: this.streamingExecutor,
      sync: this.syncExecutor
    });
  }

  // ==========================================================================
  // Agents
  // ==========================================================================

  async listAgents(): Promise<AgentEntry[]> {
    const directory = await this.resolver.refresh();
    return [...directory].map(([name, id]) => ({ name, id }));
  }

  async resolveAgent(name: string): Promise<string> {
    return this.resolver.resolve(name);
  }

  // ==========================================================================
  // Registration & execution
  // ==========================================================================

  async register(workflow: Workflow, options?: RegisterOptions): Promise<RegistrationReport> {
    return this.registrar.register(workflow, options);
  }

  /**
   * Register and run a workflow; returns the canonical result.
   */
  async execute(workflow: Workflow, options: WorkflowExecuteOptions = {}): Promise<CanonicalResult> {
    const report = await this.executeWithReport(workflow, options);
    return report.result;
  }

  /**
   * Register and run a workflow; also reports which strategy produced the
   * result and every attempt made on the way.
   */
  async executeWithReport(workflow: Workflow, options: WorkflowExecuteOptions = {}): Promise<ExecutionReport> {
    await this.registrar.register(workflow, options.registration);

    const base = {
      ...(options.inputContext !== undefined && { inputContext: options.inputContext }),
      ...(options.signal !== undefined && { signal: options.signal })
    };
    if (options.mode === "sync") {
      const result = await this.syncExecutor.execute(workflow.workflowId, base);
      return { result, strategy: "sync", attempts: [{ strategy: "sync", ok: true, detail: "HTTP 200" }] };
    }
    return this.coordinator.run(workflow.workflowId, {
      ...base,
      ...(options.onEvent !== undefined && { onEvent: options.onEvent })
    });
  }

  /**
   * Register and start a run without waiting for it; returns the server's
   * execution id. Follow up with getStatus()/getResult().
   */
  async executeAsync(workflow: Workflow, inputContext?: Record<string, unknown>): Promise<string> {
    await this.registrar.register(workflow);
    const response = await this.transport.requestJson(
      "POST",
      this.workflowUrl(workflow.workflowId, "/execute-async"),
      { body: inputContext ? { input_context: inputContext } : {} }
    );
    const payload = unwrapEnvelope(response.body);
    if ((response.status !== 200 && response.status !== 202) || !isRecord(payload) || typeof payload.execution_id !== "string") {
      throw this.requestFailed("EXECUTION_FAILED", `Async execution of '${workflow.workflowId}' failed`, response);
    }
    return payload.execution_id;
  }

  // ==========================================================================
  // Inspection & housekeeping
  // ==========================================================================

  async health(): Promise<boolean> {
    try {
      const response = await this.transport.requestJson("GET", this.transport.rootUrl("/health"), { timeoutMs: 5_000 });
      return response.status === 200;
    } catch (err) {
      if (!(err instanceof SeqflowError)) throw err;
      this.logger.debug("Health check failed", { error: err.message });
      return false;
    }
  }

  async listWorkflows(): Promise<WorkflowSummary[]> {
    const response = await this.transport.requestJson("GET", this.transport.apiUrl(this.config.workflowsPath));
    if (!response.ok) {
      throw this.requestFailed("TRANSPORT_ERROR", "Listing workflows failed", response);
    }
    const payload = unwrapEnvelope(response.body);
    if (!Array.isArray(payload)) return [];

    return payload.filter(isRecord).map((entry): WorkflowSummary => {
      const status = isRecord(entry.status) ? entry.status.status : entry.status;
      return {
        workflowId: typeof entry.workflow_id === "string" ? entry.workflow_id : "",
        name: typeof entry.workflow_name === "string" ? entry.workflow_name : "",
        totalSteps: typeof entry.total_steps === "number" ? entry.total_steps : 0,
        status: typeof status === "string" ? status : "unknown"
      };
    });
  }

  /** The stored definition, or null when the server does not know the id. */
  async getWorkflow(workflowId: string): Promise<Record<string, unknown> | null> {
    const response = await this.transport.requestJson("GET", this.workflowUrl(workflowId));
    if (response.status === 404) return null;
    const payload = unwrapEnvelope(response.body);
    if (!response.ok || !isRecord(payload)) {
      throw this.requestFailed("TRANSPORT_ERROR", `Fetching workflow '${workflowId}' failed`, response);
    }
    return payload;
  }

  async getStatus(workflowId: string): Promise<WorkflowStatus | null> {
    const response = await this.transport.requestJson("GET", this.workflowUrl(workflowId, "/status"));
    if (response.status === 404) return null;
    const payload = unwrapEnvelope(response.body);
    if (!response.ok || !isRecord(payload)) {
      throw this.requestFailed("TRANSPORT_ERROR", `Fetching status of '${workflowId}' failed`, response);
    }
    return {
      workflowId,
      status: typeof payload.status === "string" ? payload.status : "unknown",
      raw: payload
    };
  }

  /** The last stored result, normalized, or null when there is none yet. */
  async getResult(workflowId: string): Promise<CanonicalResult | null> {
    const startedAt = Date.now();
    const response = await this.transport.requestJson("GET", this.workflowUrl(workflowId, "/result"));
    if (response.status === 404) return null;
    if (!response.ok) {
      throw this.requestFailed("TRANSPORT_ERROR", `Fetching result of '${workflowId}' failed`, response);
    }
    const payload = unwrapEnvelope(response.body);
    if (!looksComplete(payload)) return null;
    return normalizeResult(payload, { workflowId, elapsedMs: Date.now() - startedAt });
  }

  async cancel(workflowId: string): Promise<boolean> {
    const response = await this.transport.requestJson("POST", this.workflowUrl(workflowId, "/cancel"), { body: {} });
    const payload = unwrapEnvelope(response.body);
    return response.ok && isRecord(payload) && payload.cancelled === true;
  }

  /** Remove a definition. Returns false when it was already absent. */
  async deleteWorkflow(workflowId: string): Promise<boolean> {
    const response = await this.transport.requestJson("DELETE", this.workflowUrl(workflowId));
    if (response.status === 404) return false;
    if (!response.ok) {
      throw this.requestFailed("TRANSPORT_ERROR", `Deleting workflow '${workflowId}' failed`, response);
    }
    return true;
  }

  private workflowUrl(workflowId: string, suffix = ""): string {
    return this.transport.apiUrl(`${this.config.workflowsPath}/${encodeURIComponent(workflowId)}${suffix}`);
  }

  private requestFailed(code: "TRANSPORT_ERROR" | "EXECUTION_FAILED", message: string, response: JsonResponse): SeqflowError {
    return new SeqflowError(code, `${message}: HTTP ${response.status}`, {
      status: response.status,
      serverMessage: describeErrorBody(response.body)
    });
  }
}

/**
 * Create a client configured from SEQFLOW_* environment variables.
 */
export function createClientFromEnv(options: Omit<WorkflowClientOptions, "config"> = {}): WorkflowClient {
  return new WorkflowClient({ ...options, config: loadConfigFromEnv() });
}
