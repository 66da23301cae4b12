/**
 * Idempotent workflow registration against a create-or-409 store.
 *
 *   resolve agents -> POST (201 ok)
 *                  -> 409 -> DELETE (200/204/404) -> POST once more (201 ok)
 *
 * Anything else fails the registration. There is never a third POST.
 */

import type { AgentNameResolver } from "./agents/resolver.js";
import type { ConflictPolicy } from "./config.js";
import { SeqflowError, isSeqflowError } from "./errors.js";
import { describeErrorBody, type HttpTransport, type JsonResponse } from "./http/transport.js";
import type { Logger } from "./logger.js";
import type { ApiWorkflowDefinition } from "./workflow/types.js";
import type { Workflow } from "./workflow/workflow.js";

export type RegisterOptions = {
  onConflict?: ConflictPolicy;
  /** GET the workflow back after the server reports success */
  verify?: boolean;
};

export type RegistrationReport = {
  workflowId: string;
  /** A stale definition was deleted and recreated */
  replaced: boolean;
  /** The definition was read back after creation */
  verified: boolean;
  /** Registration requests sent (POST, DELETE and the verification GET) */
  httpCalls: number;
};

export type RegistrarOptions = {
  transport: HttpTransport;
  resolver: AgentNameResolver;
  logger: Logger;
  workflowsPath: string;
  onConflict: ConflictPolicy;
  verify: boolean;
};

const DELETE_ABSENT_STATUSES = new Set([200, 204, 404]);

export class WorkflowRegistrar {
  private readonly transport: HttpTransport;
  private readonly resolver: AgentNameResolver;
  private readonly logger: Logger;
  private readonly workflowsPath: string;
  private readonly defaultConflictPolicy: ConflictPolicy;
  private readonly defaultVerify: boolean;

  constructor(options: RegistrarOptions) {
    this.transport = options.transport;
    this.resolver = options.resolver;
    this.logger = options.logger;
    this.workflowsPath = options.workflowsPath;
    this.defaultConflictPolicy = options.onConflict;
    this.defaultVerify = options.verify;
  }

  /**
   * Resolve agent names and publish the workflow, replacing a stale
   * definition with the same id. Seals the workflow on success.
   */
  async register(workflow: Workflow, options: RegisterOptions = {}): Promise<RegistrationReport> {
    const onConflict = options.onConflict ?? this.defaultConflictPolicy;
    const verify = options.verify ?? this.defaultVerify;
    const definition = await this.resolveDefinition(workflow);
    const workflowId = workflow.workflowId;

    let httpCalls = 0;
    let replaced = false;

    const create = async (): Promise<JsonResponse> => {
      httpCalls += 1;
      return this.transport.requestJson("POST", this.transport.apiUrl(this.workflowsPath), { body: definition });
    };

    let response = await create();

    if (response.status === 409) {
      if (onConflict === "accept") {
        this.logger.info("Workflow already registered, keeping existing definition", { workflowId });
        workflow.seal();
        return { workflowId, replaced: false, verified: false, httpCalls };
      }

      this.logger.info("Workflow already exists, replacing", { workflowId });
      httpCalls += 1;
      const removal = await this.transport.requestJson("DELETE", this.workflowUrl(workflowId));
      if (!DELETE_ABSENT_STATUSES.has(removal.status)) {
        throw this.failure(workflowId, "DELETE of existing workflow failed", removal, httpCalls);
      }
      replaced = true;
      response = await create();
    }

    if (response.status !== 201) {
      throw this.failure(
        workflowId,
        replaced ? "Re-registration after cleanup failed" : "Workflow registration failed",
        response,
        httpCalls
      );
    }

    let verified = false;
    if (verify) {
      httpCalls += 1;
      const check = await this.transport.requestJson("GET", this.workflowUrl(workflowId));
      if (check.status === 404) {
        throw this.failure(workflowId, "Workflow not found right after registration", check, httpCalls);
      }
      verified = check.ok;
      if (!verified) {
        this.logger.warn("Could not verify workflow registration", { workflowId, status: check.status });
      }
    }

    workflow.seal();
    this.logger.debug("Workflow registered", { workflowId, replaced, verified, httpCalls });
    return { workflowId, replaced, verified, httpCalls };
  }

  private async resolveDefinition(workflow: Workflow): Promise<ApiWorkflowDefinition> {
    if (workflow.steps.length === 0) {
      throw new SeqflowError("INVALID_WORKFLOW", `Workflow '${workflow.workflowId}' has no steps`);
    }
    try {
      const agentIds = await this.resolver.resolveAll(workflow.agentNames());
      return workflow.toDefinition(agentIds);
    } catch (err) {
      if (isSeqflowError(err, "AGENT_NOT_FOUND")) {
        throw new SeqflowError(
          "UNRESOLVED_AGENT",
          `Workflow '${workflow.workflowId}' references unknown agents: ${err.message}`,
          err.details
        );
      }
      throw err;
    }
  }

  private workflowUrl(workflowId: string): string {
    return this.transport.apiUrl(`${this.workflowsPath}/${encodeURIComponent(workflowId)}`);
  }

  private failure(workflowId: string, message: string, response: JsonResponse, httpCalls: number): SeqflowError {
    return new SeqflowError("REGISTRATION_FAILED", `${message}: HTTP ${response.status}`, {
      workflowId,
      status: response.status,
      serverMessage: describeErrorBody(response.body),
      httpCalls
    });
  }
}
