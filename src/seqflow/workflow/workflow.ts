/**
 * In-memory workflow builder.
 *
 * A workflow is append-only until it has been registered. After that it is
 * sealed: changes go through fork(), which yields an unsealed copy with the
 * same id whose registration replaces the remote definition.
 */

import { SeqflowError } from "../errors.js";
import {
  IdentifierSchema,
  STEP_DEFAULTS,
  WORKFLOW_DEFAULTS,
  type ApiWorkflowDefinition,
  type ApiWorkflowStep,
  type StepOptions,
  type WorkflowOptions,
  type WorkflowStep
} from "./types.js";

function titleCase(stepId: string): string {
  return stepId
    .split("_")
    .filter(part => part.length > 0)
    .map(part => part.charAt(0).toUpperCase() + part.slice(1).toLowerCase())
    .join(" ");
}

function assertIdentifier(kind: string, value: string): void {
  const parsed = IdentifierSchema.safeParse(value);
  if (!parsed.success) {
    throw new SeqflowError("INVALID_WORKFLOW", `Invalid ${kind}: '${value}'`, {
      issues: parsed.error.issues.map(issue => issue.message)
    });
  }
}

export class Workflow {
  readonly workflowId: string;
  private name: string;
  private description: string;
  private stopOnFailure: boolean;
  private maxExecutionTimeSeconds: number;
  private readonly globalContext: Record<string, unknown>;
  private readonly stepList: WorkflowStep[] = [];
  private sealed = false;

  constructor(workflowId: string, options: WorkflowOptions = {}) {
    assertIdentifier("workflow id", workflowId);
    this.workflowId = workflowId;
    this.name = options.name ?? titleCase(workflowId);
    this.description = options.description ?? `Custom workflow: ${this.name}`;
    this.stopOnFailure = options.stopOnFailure ?? WORKFLOW_DEFAULTS.stopOnFailure;
    this.maxExecutionTimeSeconds = options.maxExecutionTimeSeconds ?? WORKFLOW_DEFAULTS.maxExecutionTimeSeconds;
    this.globalContext = { ...options.globalContext };
  }

  get workflowName(): string {
    return this.name;
  }

  get steps(): readonly WorkflowStep[] {
    return this.stepList;
  }

  get context(): Readonly<Record<string, unknown>> {
    return this.globalContext;
  }

  get haltsOnFailure(): boolean {
    return this.stopOnFailure;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  /**
   * Append a step (fluent).
   */
  addStep(stepId: string, agentName: string, prompt: string, options: StepOptions = {}): this {
    this.assertMutable();
    assertIdentifier("step id", stepId);
    if (agentName.trim().length === 0) {
      throw new SeqflowError("INVALID_WORKFLOW", `Step '${stepId}' has no agent name`);
    }
    if (this.stepList.some(step => step.stepId === stepId)) {
      throw new SeqflowError("INVALID_WORKFLOW", `Duplicate step id '${stepId}' in workflow '${this.workflowId}'`);
    }

    const functionName = options.functionName ?? STEP_DEFAULTS.functionName;
    this.stepList.push({
      stepId,
      stepName: options.stepName ?? titleCase(stepId),
      description: options.description ?? `Execute ${functionName} using ${agentName}`,
      agentName,
      prompt,
      functionName,
      timeoutSeconds: options.timeoutSeconds ?? STEP_DEFAULTS.timeoutSeconds,
      maxRetries: options.maxRetries ?? STEP_DEFAULTS.maxRetries,
      temperature: options.temperature ?? STEP_DEFAULTS.temperature,
      maxTokens: options.maxTokens ?? STEP_DEFAULTS.maxTokens,
      parameters: { ...options.parameters },
      continueOnFailure: options.continueOnFailure ?? false
    });
    return this;
  }

  setContext(key: string, value: unknown): this {
    this.assertMutable();
    this.globalContext[key] = value;
    return this;
  }

  setStopOnFailure(stop: boolean): this {
    this.assertMutable();
    this.stopOnFailure = stop;
    return this;
  }

  setDescription(description: string): this {
    this.assertMutable();
    this.description = description;
    return this;
  }

  /**
   * Distinct agent names in first-use order.
   */
  agentNames(): string[] {
    return [...new Set(this.stepList.map(step => step.agentName))];
  }

  /**
   * Called by the registrar once the server has accepted the definition.
   */
  seal(): void {
    this.sealed = true;
  }

  /**
   * Unsealed copy with the same id, steps and context.
   */
  fork(): Workflow {
    const copy = new Workflow(this.workflowId, {
      name: this.name,
      description: this.description,
      stopOnFailure: this.stopOnFailure,
      maxExecutionTimeSeconds: this.maxExecutionTimeSeconds,
      globalContext: structuredClone(this.globalContext)
    });
    for (const step of this.stepList) {
      copy.stepList.push({ ...step, parameters: structuredClone(step.parameters) });
    }
    return copy;
  }

  /**
   * Wire definition with agent names replaced by remote ids.
   * Every agent name must be present in `agentIds`.
   */
  toDefinition(agentIds: ReadonlyMap<string, string>): ApiWorkflowDefinition {
    if (this.stepList.length === 0) {
      throw new SeqflowError("INVALID_WORKFLOW", `Workflow '${this.workflowId}' has no steps`);
    }

    const steps = this.stepList.map((step): ApiWorkflowStep => {
      const agentId = agentIds.get(step.agentName);
      if (agentId === undefined) {
        throw new SeqflowError("UNRESOLVED_AGENT", `No id for agent '${step.agentName}'`, {
          stepId: step.stepId,
          agents: [step.agentName]
        });
      }
      return {
        step_id: step.stepId,
        step_name: step.stepName,
        description: step.description,
        agent_id: agentId,
        function_name: step.functionName,
        timeout_seconds: step.timeoutSeconds,
        max_retries: step.maxRetries,
        continue_on_failure: step.continueOnFailure,
        parameters: {
          prompt: step.prompt,
          model: STEP_DEFAULTS.model,
          max_tokens: step.maxTokens,
          temperature: step.temperature,
          ...step.parameters
        }
      };
    });

    return {
      workflow_id: this.workflowId,
      workflow_name: this.name,
      description: this.description,
      stop_on_failure: this.stopOnFailure,
      max_execution_time_seconds: this.maxExecutionTimeSeconds,
      global_context: { ...this.globalContext },
      steps
    };
  }

  private assertMutable(): void {
    if (this.sealed) {
      throw new SeqflowError(
        "WORKFLOW_SEALED",
        `Workflow '${this.workflowId}' is registered; fork() it to make changes`
      );
    }
  }
}

export function createWorkflow(workflowId: string, options?: WorkflowOptions): Workflow {
  return new Workflow(workflowId, options);
}
