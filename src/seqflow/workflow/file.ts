import fs from "node:fs";
import { z } from "zod";
import { SeqflowError, toSeqflowError } from "../errors.js";
import { IdentifierSchema, type StepOptions } from "./types.js";
import { Workflow } from "./workflow.js";

/**
 * JSON workflow files, as read by the CLI `run` command.
 *
 * {
 *   "workflow_id": "blog_post",
 *   "name": "Blog Post",
 *   "global_context": { "audience": "developers" },
 *   "steps": [
 *     { "step_id": "research", "agent": "research_assistant", "prompt": "..." }
 *   ]
 * }
 */

const FileStepSchema = z.object({
  step_id: IdentifierSchema,
  agent: z.string().min(1),
  prompt: z.string(),
  function_name: z.string().min(1).optional(),
  timeout_seconds: z.number().int().positive().optional(),
  max_retries: z.number().int().nonnegative().optional(),
  temperature: z.number().min(0).max(2).optional(),
  max_tokens: z.number().int().positive().optional(),
  continue_on_failure: z.boolean().optional(),
  parameters: z.record(z.unknown()).optional()
});

export const WorkflowFileSchema = z.object({
  workflow_id: IdentifierSchema,
  name: z.string().min(1).optional(),
  description: z.string().optional(),
  stop_on_failure: z.boolean().optional(),
  max_execution_time_seconds: z.number().int().positive().optional(),
  global_context: z.record(z.unknown()).optional(),
  steps: z.array(FileStepSchema).min(1)
});

export type WorkflowFile = z.infer<typeof WorkflowFileSchema>;

function stepOptions(step: z.infer<typeof FileStepSchema>): StepOptions {
  const options: StepOptions = {};
  if (step.function_name !== undefined) options.functionName = step.function_name;
  if (step.timeout_seconds !== undefined) options.timeoutSeconds = step.timeout_seconds;
  if (step.max_retries !== undefined) options.maxRetries = step.max_retries;
  if (step.temperature !== undefined) options.temperature = step.temperature;
  if (step.max_tokens !== undefined) options.maxTokens = step.max_tokens;
  if (step.continue_on_failure !== undefined) options.continueOnFailure = step.continue_on_failure;
  if (step.parameters !== undefined) options.parameters = step.parameters;
  return options;
}

export function workflowFromJson(json: unknown): Workflow {
  const parsed = WorkflowFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new SeqflowError("BAD_REQUEST", "Invalid workflow file", { issues: parsed.error.issues });
  }
  const file = parsed.data;

  const workflow = new Workflow(file.workflow_id, {
    ...(file.name !== undefined && { name: file.name }),
    ...(file.description !== undefined && { description: file.description }),
    ...(file.stop_on_failure !== undefined && { stopOnFailure: file.stop_on_failure }),
    ...(file.max_execution_time_seconds !== undefined && { maxExecutionTimeSeconds: file.max_execution_time_seconds }),
    ...(file.global_context !== undefined && { globalContext: file.global_context })
  });

  for (const step of file.steps) {
    workflow.addStep(step.step_id, step.agent, step.prompt, stepOptions(step));
  }
  return workflow;
}

export function loadWorkflowFile(filePath: string): Workflow {
  let json: unknown;
  try {
    json = JSON.parse(fs.readFileSync(filePath, "utf8")) as unknown;
  } catch (err) {
    const wrapped = toSeqflowError(err);
    throw new SeqflowError("BAD_REQUEST", `Cannot read workflow file ${filePath}: ${wrapped.message}`, {
      path: filePath
    });
  }
  return workflowFromJson(json);
}
