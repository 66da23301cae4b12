#!/usr/bin/env node
import { Argument, Command } from "commander";
import process from "node:process";
import chalk from "chalk";
import { z } from "zod";
import { createClientFromEnv, type WorkflowClient } from "./seqflow/client.js";
import { EXIT_CODES, healthCommand, runCommand } from "./commands.js";
import type { CanonicalResult, ExecutionEvent, ExecutionReport } from "./seqflow/execution/types.js";
import { TEMPLATE_KINDS, buildTemplate } from "./seqflow/workflow/templates.js";
import { loadWorkflowFile } from "./seqflow/workflow/file.js";
import type { Workflow } from "./seqflow/workflow/workflow.js";

const ContextSchema = z.record(z.unknown());
const TemplateKindSchema = z.enum(TEMPLATE_KINDS);

type RunOptions = {
  stream: boolean;
  context?: string;
  verify: boolean;
  json: boolean;
};

const program = new Command();

program.name("seqflow").description("Run sequential workflows on a remote agent server").version("0.1.0");

program
  .command("health")
  .description("Check that the server answers /health")
  .action(async () => {
    await guarded(() => healthCommand());
  });

program
  .command("agents")
  .description("List the agents the server knows, with their current ids")
  .action(async () => {
    await guarded(async () => {
      const agents = await createClientFromEnv().listAgents();
      if (agents.length === 0) {
        process.stderr.write(chalk.yellow("No agents registered\n"));
      }
      for (const agent of agents) {
        process.stdout.write(`${agent.name}\t${chalk.dim(agent.id)}\n`);
      }
      return EXIT_CODES.OK;
    });
  });

program
  .command("run")
  .description("Register and execute a workflow from a JSON file")
  .argument("<file>", "Workflow definition file")
  .option("--stream", "Stream step output as it arrives", false)
  .option("--context <json>", "Input context as a JSON object")
  .option("--verify", "Read the workflow back after registering it", false)
  .option("--json", "Print the full result as JSON", false)
  .action(async (file: string, opts: RunOptions) => {
    await guarded(async () => executeAndReport(createClientFromEnv(), loadWorkflowFile(file), opts));
  });

program
  .command("template")
  .description("Register and execute a prebuilt workflow")
  .addArgument(new Argument("<kind>", "Template").choices(TEMPLATE_KINDS))
  .argument("<subject>", "Topic, requirements or data description")
  .option("--stream", "Stream step output as it arrives", false)
  .option("--json", "Print the full result as JSON", false)
  .action(async (kind: string, subject: string, opts: Pick<RunOptions, "stream" | "json">) => {
    await guarded(async () => {
      const workflow = buildTemplate(TemplateKindSchema.parse(kind), subject);
      return executeAndReport(createClientFromEnv(), workflow, { ...opts, verify: false });
    });
  });

program
  .command("status")
  .description("Show the server-side status of a workflow")
  .argument("<id>", "Workflow id")
  .action(async (id: string) => {
    await guarded(async () => {
      const status = await createClientFromEnv().getStatus(id);
      if (!status) {
        process.stderr.write(chalk.yellow(`Workflow '${id}' not found\n`));
        return EXIT_CODES.ERROR;
      }
      process.stdout.write(JSON.stringify(status.raw, null, 2) + "\n");
      return EXIT_CODES.OK;
    });
  });

program
  .command("result")
  .description("Show the last stored result of a workflow")
  .argument("<id>", "Workflow id")
  .action(async (id: string) => {
    await guarded(async () => {
      const result = await createClientFromEnv().getResult(id);
      if (!result) {
        process.stderr.write(chalk.yellow(`No finished result for '${id}'\n`));
        return EXIT_CODES.ERROR;
      }
      process.stdout.write(JSON.stringify(result, null, 2) + "\n");
      return result.success ? EXIT_CODES.OK : EXIT_CODES.FAILED;
    });
  });

program
  .command("delete")
  .description("Delete a workflow definition from the server")
  .argument("<id>", "Workflow id")
  .action(async (id: string) => {
    await guarded(async () => {
      const deleted = await createClientFromEnv().deleteWorkflow(id);
      process.stdout.write(
        deleted ? chalk.green(`Deleted '${id}'\n`) : chalk.dim(`'${id}' was not registered\n`)
      );
      return EXIT_CODES.OK;
    });
  });

/**
 * Run a command body and exit with its code; errors print and exit 30.
 */
async function guarded(body: () => Promise<number>): Promise<void> {
  process.exit(await runCommand(body));
}

async function executeAndReport(client: WorkflowClient, workflow: Workflow, opts: RunOptions): Promise<number> {
  const abortController = new AbortController();
  let cancelled = false;
  const handleSignal = (signal: string) => {
    if (cancelled) {
      process.stderr.write(chalk.red(`\nForced exit on second ${signal}\n`));
      process.exit(EXIT_CODES.CANCELLED);
    }
    cancelled = true;
    process.stderr.write(chalk.yellow(`\nReceived ${signal}, cancelling...\n`));
    abortController.abort();
  };
  process.on("SIGINT", () => handleSignal("SIGINT"));
  process.on("SIGTERM", () => handleSignal("SIGTERM"));

  const inputContext = opts.context !== undefined ? ContextSchema.parse(JSON.parse(opts.context)) : undefined;

  process.stderr.write(chalk.blue(`Running workflow '${workflow.workflowId}' (${workflow.steps.length} steps)\n`));
  process.stderr.write(chalk.dim(`  Server: ${client.config.baseUrl}\n`));
  process.stderr.write(chalk.dim(`  Mode: ${opts.stream ? "stream" : "sync"}\n\n`));

  const report: ExecutionReport = await client.executeWithReport(workflow, {
    mode: opts.stream ? "stream" : "sync",
    signal: abortController.signal,
    ...(opts.verify && { registration: { verify: true } }),
    ...(inputContext !== undefined && { inputContext }),
    ...(opts.stream && { onEvent: printEvent })
  });

  if (opts.json) {
    process.stdout.write(JSON.stringify(report, null, 2) + "\n");
  } else {
    outputResultHuman(report, !(opts.stream && report.strategy === "stream"));
  }

  if (cancelled) return EXIT_CODES.CANCELLED;
  return report.result.success ? EXIT_CODES.OK : EXIT_CODES.FAILED;
}

function printEvent(event: ExecutionEvent): void {
  switch (event.type) {
    case "step_start":
      process.stderr.write(chalk.cyan(`\n▶ ${event.stepName ?? event.stepId}\n`));
      break;
    case "output":
      process.stdout.write(event.text);
      break;
    case "step_complete":
      process.stderr.write(
        event.success ? chalk.green(`\n✓ ${event.stepId}\n`) : chalk.red(`\n✗ ${event.stepId}: ${event.error ?? "failed"}\n`)
      );
      break;
    case "server_error":
      process.stderr.write(chalk.red(`\nServer error: ${event.message}\n`));
      break;
    case "transport_degraded":
      process.stderr.write(chalk.yellow(`Server answered with ${event.contentType} instead of a stream\n`));
      break;
    case "fallback":
      process.stderr.write(chalk.yellow(`Falling back from ${event.from} to ${event.to} (${event.reason})\n`));
      break;
    case "workflow_complete":
      break;
  }
}

function outputResultHuman(report: ExecutionReport, printFinalOutput: boolean): void {
  const result: CanonicalResult = report.result;
  const steps = Object.entries(result.stepResults);
  const succeeded = steps.filter(([, step]) => step.success).length;

  if (result.success) {
    process.stderr.write(chalk.green(`\n✓ Workflow '${result.workflowId}' completed\n`));
  } else {
    process.stderr.write(chalk.red(`\n✗ Workflow '${result.workflowId}' failed\n`));
  }
  process.stderr.write(chalk.dim(`  Steps: ${succeeded}/${steps.length} succeeded\n`));
  process.stderr.write(chalk.dim(`  Strategy: ${report.strategy}\n`));
  process.stderr.write(chalk.dim(`  Time: ${result.totalExecutionTimeMs}ms\n`));
  for (const [stepId, step] of steps) {
    if (step.error) {
      process.stderr.write(chalk.red(`  ${stepId}: ${step.error}\n`));
    }
  }
  if (printFinalOutput && result.finalOutput) {
    process.stdout.write(result.finalOutput + "\n");
  }
}

await program.parseAsync(process.argv);
