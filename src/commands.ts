import process from "node:process";
import chalk from "chalk";
import { createClientFromEnv, type WorkflowClientOptions } from "./seqflow/client.js";
import { toSeqflowError } from "./seqflow/errors.js";

/**
 * Exit codes for CLI commands.
 */
export const EXIT_CODES = {
  OK: 0,           // Workflow (or command) succeeded
  FAILED: 10,      // Workflow ran but reported failure
  ERROR: 30,       // Registration, transport or usage error
  CANCELLED: 40,   // Cancelled by user (SIGINT/SIGTERM)
} as const;

export type CommandOutput = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
};

export const processOutput: CommandOutput = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  }
};

/**
 * Run a command body and return its exit code. Errors are printed and
 * become EXIT_CODES.ERROR.
 */
export async function runCommand(body: () => Promise<number>, output: CommandOutput = processOutput): Promise<number> {
  try {
    return await body();
  } catch (err) {
    const error = toSeqflowError(err);
    output.stderr(chalk.red(`Error: [${error.code}] ${error.message}\n`));
    return EXIT_CODES.ERROR;
  }
}

/** `seqflow health` */
export async function healthCommand(
  clientOptions: Omit<WorkflowClientOptions, "config"> = {},
  output: CommandOutput = processOutput
): Promise<number> {
  const client = createClientFromEnv(clientOptions);
  if (await client.health()) {
    output.stdout(chalk.green(`Server at ${client.config.baseUrl} is healthy\n`));
    return EXIT_CODES.OK;
  }
  output.stderr(chalk.red(`Server at ${client.config.baseUrl} is not reachable\n`));
  return EXIT_CODES.ERROR;
}
