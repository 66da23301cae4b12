/**
 * Fallback Coordinator.
 *
 * One pass, never cyclic:
 *   1. streaming execution
 *   2. one GET of the stored result
 *   3. one synchronous execution
 * The execute endpoint is hit at most twice per run (steps 1 and 3).
 * A caller abort or stream timeout only ends step 1; steps 2 and 3 still
 * run under their own request timeouts.
 */

import { SeqflowError } from "../errors.js";
import { describeErrorBody, unwrapEnvelope, type HttpTransport } from "../http/transport.js";
import type { Logger } from "../logger.js";
import { looksComplete, normalizeResult } from "./normalizer.js";
import type { StreamingExecutor } from "./streaming.js";
import type { SyncExecutor } from "./sync.js";
import type {
  AttemptRecord,
  CanonicalResult,
  ExecuteOptions,
  ExecutionEvent,
  ExecutionReport,
  ExecutionStrategy
} from "./types.js";

export type FallbackCoordinatorOptions = {
  transport: HttpTransport;
  logger: Logger;
  workflowsPath: string;
  streaming: StreamingExecutor;
  sync: SyncExecutor;
};

export class FallbackCoordinator {
  private readonly transport: HttpTransport;
  private readonly logger: Logger;
  private readonly workflowsPath: string;
  private readonly streaming: StreamingExecutor;
  private readonly sync: SyncExecutor;

  constructor(options: FallbackCoordinatorOptions) {
    this.transport = options.transport;
    this.logger = options.logger;
    this.workflowsPath = options.workflowsPath;
    this.streaming = options.streaming;
    this.sync = options.sync;
  }

  async run(workflowId: string, options: ExecuteOptions = {}): Promise<ExecutionReport> {
    const startedAt = Date.now();
    const attempts: AttemptRecord[] = [];
    const notify = (event: ExecutionEvent): void => {
      try {
        options.onEvent?.(event);
      } catch (err) {
        this.logger.warn("Execution event handler threw", {
          event: event.type,
          error: err instanceof Error ? err.message : String(err)
        });
      }
    };
    const stepDown = (from: ExecutionStrategy, to: ExecutionStrategy, reason: string): void => {
      this.logger.info(`Falling back from ${from} to ${to}`, { workflowId, reason });
      notify({ type: "fallback", from, to, reason });
    };

    // 1. stream
    const outcome = await this.streaming.execute(workflowId, {
      ...(options.inputContext !== undefined && { inputContext: options.inputContext }),
      ...(options.signal !== undefined && { signal: options.signal }),
      ...(options.onEvent !== undefined && { onEvent: options.onEvent })
    });
    if (outcome.kind === "terminal") {
      attempts.push({ strategy: "stream", ok: true, detail: `terminal result over ${outcome.transport}` });
      return { result: outcome.result, strategy: "stream", attempts };
    }
    const { partialStepResults, serverErrors } = outcome;
    attempts.push({ strategy: "stream", ok: false, detail: `${outcome.reason}: ${outcome.detail}` });
    stepDown("stream", "poll", outcome.reason);

    // 2. poll
    const polled = await this.poll(workflowId, startedAt);
    if (polled.result) {
      attempts.push({ strategy: "poll", ok: true, detail: polled.detail });
      return { result: polled.result, strategy: "poll", attempts };
    }
    attempts.push({ strategy: "poll", ok: false, detail: polled.detail });
    stepDown("poll", "sync", polled.detail);

    // 3. sync
    try {
      const result = await this.sync.execute(
        workflowId,
        options.inputContext !== undefined ? { inputContext: options.inputContext } : {}
      );
      attempts.push({ strategy: "sync", ok: true, detail: "HTTP 200" });
      return { result, strategy: "sync", attempts };
    } catch (err) {
      if (!(err instanceof SeqflowError)) throw err;
      attempts.push({ strategy: "sync", ok: false, detail: err.message });
    }

    throw new SeqflowError("EXECUTION_FAILED", `All execution strategies failed for '${workflowId}'`, {
      workflowId,
      attempts,
      partialStepResults,
      serverErrors
    });
  }

  private async poll(workflowId: string, startedAt: number): Promise<{ result: CanonicalResult | null; detail: string }> {
    const url = this.transport.apiUrl(`${this.workflowsPath}/${encodeURIComponent(workflowId)}/result`);
    try {
      const response = await this.transport.requestJson("GET", url);
      if (response.status !== 200) {
        const message = describeErrorBody(response.body);
        return { result: null, detail: `HTTP ${response.status}${message ? ` (${message})` : ""}` };
      }
      const payload = unwrapEnvelope(response.body);
      if (!looksComplete(payload)) {
        return { result: null, detail: "stored result is not complete" };
      }
      return {
        result: normalizeResult(payload, { workflowId, elapsedMs: Date.now() - startedAt }),
        detail: "stored result"
      };
    } catch (err) {
      if (!(err instanceof SeqflowError)) throw err;
      return { result: null, detail: err.message };
    }
  }
}
