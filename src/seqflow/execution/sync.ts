import { SeqflowError } from "../errors.js";
import { describeErrorBody, unwrapEnvelope, type HttpTransport } from "../http/transport.js";
import type { Logger } from "../logger.js";
import { normalizeResult } from "./normalizer.js";
import type { CanonicalResult } from "./types.js";

export type SyncExecutorOptions = {
  transport: HttpTransport;
  logger: Logger;
  workflowsPath: string;
};

export type SyncExecuteOptions = {
  inputContext?: Record<string, unknown>;
  signal?: AbortSignal;
};

export function executeUrl(transport: HttpTransport, workflowsPath: string, workflowId: string): string {
  return transport.apiUrl(`${workflowsPath}/${encodeURIComponent(workflowId)}/execute`);
}

export function executeBody(inputContext: Record<string, unknown> | undefined): Record<string, unknown> {
  return inputContext ? { input_context: inputContext } : {};
}

/**
 * One blocking POST to the execute endpoint. No retries: step-level
 * retries are the server's job and whole-run retries the caller's.
 */
export class SyncExecutor {
  private readonly transport: HttpTransport;
  private readonly logger: Logger;
  private readonly workflowsPath: string;

  constructor(options: SyncExecutorOptions) {
    this.transport = options.transport;
    this.logger = options.logger;
    this.workflowsPath = options.workflowsPath;
  }

  async execute(workflowId: string, options: SyncExecuteOptions = {}): Promise<CanonicalResult> {
    const startedAt = Date.now();
    const response = await this.transport.requestJson(
      "POST",
      executeUrl(this.transport, this.workflowsPath, workflowId),
      {
        body: executeBody(options.inputContext),
        accept: "application/json",
        ...(options.signal !== undefined && { signal: options.signal })
      }
    );

    if (response.status !== 200) {
      const serverMessage = describeErrorBody(response.body);
      this.logger.warn("Synchronous execution failed", { workflowId, status: response.status });
      throw new SeqflowError("EXECUTION_FAILED", `Execution of '${workflowId}' failed: HTTP ${response.status}`, {
        workflowId,
        status: response.status,
        serverMessage
      });
    }

    return normalizeResult(unwrapEnvelope(response.body), {
      workflowId,
      elapsedMs: Date.now() - startedAt
    });
  }
}
