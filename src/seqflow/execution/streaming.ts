/**
 * Streaming execution over Server-Sent Events.
 *
 * StreamStateMachine consumes classified lines and owns all protocol
 * state:
 *
 *   awaiting_step --step_start--> in_step --step_complete--> awaiting_step
 *   any --workflow_complete | object with final_output/step_results--> done
 *
 * StreamingExecutor owns the connection: it reads one chunk at a time and
 * feeds every completed line to the machine before the next read, so
 * output events reach the caller as soon as the server flushes them.
 */

import { SeqflowError } from "../errors.js";
import { isRecord, unwrapEnvelope, type HttpTransport } from "../http/transport.js";
import type { Logger } from "../logger.js";
import {
  asNumber,
  asText,
  hasStepCollection,
  lastSuccessfulOutput,
  normalizeResult,
  pickError
} from "./normalizer.js";
import { SseLineDecoder, type SseLine } from "./sse.js";
import { executeBody, executeUrl } from "./sync.js";
import type {
  CanonicalResult,
  ExecutionEvent,
  ExecutionEventHandler,
  StepOutcome,
  StreamIncompleteReason,
  StreamOutcome,
  StreamState
} from "./types.js";

const TOKEN_EVENT_TYPES = new Set(["llm_token", "token"]);
const OUTPUT_EVENT_TYPES = new Set(["llm_output", "output"]);

function firstString(record: Record<string, unknown>, keys: readonly string[]): string | null {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === "string") return value;
  }
  return null;
}

export class StreamStateMachine {
  private current: StreamState = "awaiting_step";
  private activeStepId: string | null = null;
  private activeBuffer = "";
  private stepCounter = 0;
  private readonly completed = new Map<string, StepOutcome>();
  private readonly errors: string[] = [];
  private terminalPayload: Record<string, unknown> | null = null;

  constructor(
    private readonly workflowId: string,
    private readonly emit: (event: ExecutionEvent) => void
  ) {}

  get state(): StreamState {
    return this.current;
  }

  get terminal(): Record<string, unknown> | null {
    return this.terminalPayload;
  }

  /** Error messages reported by the server along the way. */
  get serverErrors(): readonly string[] {
    return this.errors;
  }

  /** Steps closed by a step_complete event, in completion order. */
  completedSteps(): Record<string, StepOutcome> {
    return Object.fromEntries(this.completed);
  }

  accept(line: SseLine): void {
    if (this.current === "done") return;

    switch (line.kind) {
      case "data":
        this.onData(line.payload);
        return;
      case "text":
        this.appendText(line.text);
        return;
      case "field":
      case "comment":
      case "blank":
        return;
    }
  }

  private onData(payload: string): void {
    if (payload === "[DONE]") return;

    let parsed: unknown;
    try {
      parsed = JSON.parse(payload) as unknown;
    } catch {
      this.appendText(payload);
      return;
    }

    if (isRecord(parsed)) {
      this.onEvent(parsed);
    } else {
      this.appendText(payload);
    }
  }

  private onEvent(event: Record<string, unknown>): void {
    const type = typeof event.type === "string" ? event.type : "";

    if (type === "step_start") {
      this.startStep(event);
    } else if (TOKEN_EVENT_TYPES.has(type)) {
      const text = firstString(event, ["token", "content", "text"]);
      if (text) this.appendText(text);
    } else if (OUTPUT_EVENT_TYPES.has(type)) {
      const text = firstString(event, ["output", "content"]);
      if (text) this.appendText(text);
    } else if (type === "step_complete") {
      this.completeStep(event);
    } else if (type === "workflow_complete") {
      this.finish(isRecord(event.result) ? event.result : event);
    } else if (type === "error") {
      const message = pickError(event.message) ?? pickError(event.error) ?? JSON.stringify(event);
      this.errors.push(message);
      this.emit({ type: "server_error", stepId: this.activeStepId, message });
    } else if ("final_output" in event || "step_results" in event) {
      this.finish(event);
    }
  }

  private startStep(event: Record<string, unknown>): void {
    this.stepCounter += 1;
    const stepName = firstString(event, ["step_name"]);
    const stepId = firstString(event, ["step_id"]) ?? stepName ?? `step_${this.stepCounter}`;

    this.activeStepId = stepId;
    this.activeBuffer = "";
    this.current = "in_step";
    this.emit({
      type: "step_start",
      stepId,
      stepName,
      agentName: firstString(event, ["agent_name"])
    });
  }

  private completeStep(event: Record<string, unknown>): void {
    const stepId = firstString(event, ["step_id"]) ?? this.activeStepId ?? `step_${this.stepCounter}`;
    const buffered = stepId === this.activeStepId ? this.activeBuffer : "";
    const outcome: StepOutcome = {
      success: event.success === true,
      output: typeof event.output === "string" ? event.output : buffered,
      error: pickError(event.error) ?? pickError(event.error_message),
      executionTimeMs: asNumber(event.execution_time_ms) ?? 0
    };

    this.completed.set(stepId, outcome);
    this.activeStepId = null;
    this.activeBuffer = "";
    this.current = "awaiting_step";
    this.emit({ type: "step_complete", stepId, success: outcome.success, error: outcome.error });
  }

  private finish(payload: Record<string, unknown>): void {
    this.terminalPayload = payload;
    this.current = "done";
    this.emit({ type: "workflow_complete", workflowId: this.workflowId });
  }

  private appendText(text: string): void {
    if (text.length === 0) return;
    if (this.activeStepId !== null) {
      this.activeBuffer += text;
    }
    this.emit({ type: "output", stepId: this.activeStepId, text });
  }
}

/**
 * Normalize a terminal stream payload. Steps are taken from the payload;
 * when it carries none, the steps completed on the stream stand in, and
 * outputs the payload leaves empty are filled from the streamed text.
 */
export function resolveTerminal(
  payload: Record<string, unknown>,
  streamed: Record<string, StepOutcome>,
  workflowId: string,
  elapsedMs: number
): CanonicalResult {
  const result = normalizeResult(payload, { workflowId, elapsedMs });
  const unwrapped = unwrapEnvelope(payload);
  const body = isRecord(unwrapped) ? unwrapped : payload;

  if (!hasStepCollection(body)) {
    result.stepResults = { ...streamed };
    const reportsOutcome = typeof body.success === "boolean" || typeof body.status === "string";
    if (!reportsOutcome) {
      const outcomes = Object.values(streamed);
      result.success = outcomes.length > 0 && outcomes.every(step => step.success);
    }
  } else {
    for (const [stepId, outcome] of Object.entries(result.stepResults)) {
      const fromStream = streamed[stepId];
      if (outcome.output === "" && fromStream !== undefined && fromStream.output !== "") {
        outcome.output = fromStream.output;
      }
    }
  }

  if (asText(body.final_output) === null) {
    result.finalOutput = lastSuccessfulOutput(result.stepResults);
  }
  return result;
}

export type StreamingExecutorOptions = {
  transport: HttpTransport;
  logger: Logger;
  workflowsPath: string;
  /** Upper bound on one streaming run */
  timeoutMs: number;
};

export type StreamExecuteOptions = {
  inputContext?: Record<string, unknown>;
  signal?: AbortSignal;
  onEvent?: ExecutionEventHandler;
};

export class StreamingExecutor {
  private readonly transport: HttpTransport;
  private readonly logger: Logger;
  private readonly workflowsPath: string;
  private readonly timeoutMs: number;

  constructor(options: StreamingExecutorOptions) {
    this.transport = options.transport;
    this.logger = options.logger;
    this.workflowsPath = options.workflowsPath;
    this.timeoutMs = options.timeoutMs;
  }

  async execute(workflowId: string, options: StreamExecuteOptions = {}): Promise<StreamOutcome> {
    const startedAt = Date.now();
    const emit = this.dispatcher(options.onEvent);
    const machine = new StreamStateMachine(workflowId, emit);

    const incomplete = (reason: StreamIncompleteReason, detail: string): StreamOutcome => {
      const serverErrors = [...machine.serverErrors];
      this.logger.info("Stream ended without a result", { workflowId, reason, detail, serverErrors });
      return {
        kind: "incomplete",
        reason,
        state: machine.state,
        detail,
        partialStepResults: machine.completedSteps(),
        serverErrors
      };
    };

    const controller = new AbortController();
    const onCallerAbort = (): void => controller.abort();
    if (options.signal?.aborted) {
      controller.abort();
    } else {
      options.signal?.addEventListener("abort", onCallerAbort, { once: true });
    }
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      let response: Response;
      try {
        response = await this.transport.open("POST", executeUrl(this.transport, this.workflowsPath, workflowId), {
          body: executeBody(options.inputContext),
          accept: "text/event-stream",
          signal: controller.signal
        });
      } catch (err) {
        if (err instanceof SeqflowError) {
          return incomplete(controller.signal.aborted ? "aborted" : "transport_error", err.message);
        }
        throw err;
      }

      if (response.status !== 200) {
        await this.discard(response);
        return incomplete("http_status", `HTTP ${response.status}`);
      }

      const contentType = response.headers.get("content-type") ?? "";
      if (!contentType.toLowerCase().includes("text/event-stream")) {
        return await this.readDegraded(response, contentType, workflowId, startedAt, emit, incomplete);
      }

      const body = response.body;
      if (body === null) {
        return incomplete("closed_without_result", "empty response body");
      }

      const reader = body.getReader();
      const decoder = new SseLineDecoder();
      try {
        for (;;) {
          const { done, value } = await reader.read();
          if (done) {
            for (const line of decoder.flush()) machine.accept(line);
            break;
          }
          for (const line of decoder.push(value)) machine.accept(line);
          if (machine.state === "done") {
            await this.release(reader);
            break;
          }
        }
      } catch (err) {
        if (controller.signal.aborted) {
          return incomplete("aborted", "stream closed by caller or timeout");
        }
        const message = err instanceof Error ? err.message : String(err);
        return incomplete("transport_error", message);
      }

      const terminal = machine.terminal;
      if (terminal === null) {
        return incomplete("closed_without_result", `stream closed in state ${machine.state}`);
      }
      return {
        kind: "terminal",
        transport: "sse",
        result: resolveTerminal(terminal, machine.completedSteps(), workflowId, Date.now() - startedAt)
      };
    } finally {
      clearTimeout(timeoutId);
      options.signal?.removeEventListener("abort", onCallerAbort);
    }
  }

  /**
   * The server ignored the event-stream Accept header and answered with a
   * single document. Not an error: the document is the result.
   */
  private async readDegraded(
    response: Response,
    contentType: string,
    workflowId: string,
    startedAt: number,
    emit: (event: ExecutionEvent) => void,
    incomplete: (reason: StreamIncompleteReason, detail: string) => StreamOutcome
  ): Promise<StreamOutcome> {
    this.logger.info("Server answered the stream request without streaming", { workflowId, contentType });
    emit({ type: "transport_degraded", contentType });

    let text: string;
    try {
      text = await response.text();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return incomplete("transport_error", message);
    }

    let document: unknown;
    try {
      document = JSON.parse(text) as unknown;
    } catch {
      return incomplete("invalid_body", `unparsable ${contentType || "untyped"} body`);
    }
    if (!isRecord(document)) {
      return incomplete("invalid_body", "response body is not a JSON object");
    }

    return {
      kind: "terminal",
      transport: "json",
      result: normalizeResult(unwrapEnvelope(document), { workflowId, elapsedMs: Date.now() - startedAt })
    };
  }

  private dispatcher(handler: ExecutionEventHandler | undefined): (event: ExecutionEvent) => void {
    if (!handler) return () => undefined;
    return (event) => {
      try {
        handler(event);
      } catch (err) {
        this.logger.warn("Execution event handler threw", {
          event: event.type,
          error: err instanceof Error ? err.message : String(err)
        });
      }
    };
  }

  private async release(reader: { cancel(): Promise<void> }): Promise<void> {
    try {
      await reader.cancel();
    } catch (err) {
      this.logger.debug("Stream cancel failed", { error: err instanceof Error ? err.message : String(err) });
    }
  }

  private async discard(response: Response): Promise<void> {
    try {
      await response.body?.cancel();
    } catch (err) {
      this.logger.debug("Discarding response body failed", {
        error: err instanceof Error ? err.message : String(err)
      });
    }
  }
}
