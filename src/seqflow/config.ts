import { z } from "zod";
import { SeqflowError } from "./errors.js";

/**
 * Client configuration.
 *
 * Programmatic callers go through parseClientConfig(); the CLI and
 * createClientFromEnv() read SEQFLOW_* environment variables.
 */

export const LogLevelEnum = z.enum(["debug", "info", "warn", "error", "silent"]);

export const ConflictPolicyEnum = z.enum([
  "replace", // 409 -> DELETE -> POST once more
  "accept"   // 409 means the definition is already there
]);

export type ConflictPolicy = z.infer<typeof ConflictPolicyEnum>;

export const ClientConfigSchema = z.object({
  /** Server origin, without the API prefix */
  baseUrl: z.string().url().default("http://localhost:8080"),
  /** Prefix for every API route */
  apiPrefix: z.string().default("/api/v1"),
  /** Workflow collection route under the API prefix */
  workflowsPath: z.string().startsWith("/").default("/sequential-workflows"),
  /** Timeout for one-shot JSON requests, including synchronous execution */
  requestTimeoutMs: z.number().int().positive().default(60_000),
  /** Upper bound for a streaming execution */
  streamTimeoutMs: z.number().int().positive().default(300_000),
  onConflict: ConflictPolicyEnum.default("replace"),
  /** GET the workflow back after a successful POST */
  verifyRegistration: z.boolean().default(false),
  logLevel: LogLevelEnum.default("info")
});

export type ClientConfig = z.infer<typeof ClientConfigSchema>;
export type ClientConfigInput = z.input<typeof ClientConfigSchema>;

export function parseClientConfig(input: ClientConfigInput = {}): ClientConfig {
  const parsed = ClientConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new SeqflowError("BAD_REQUEST", "Invalid client configuration", { issues: parsed.error.issues });
  }
  return parsed.data;
}

function parseIntEnv(name: string, raw: string): number {
  const value = Number.parseInt(raw, 10);
  if (Number.isNaN(value)) {
    throw new SeqflowError("BAD_REQUEST", `${name} must be an integer`, { value: raw });
  }
  return value;
}

function parseBoolEnv(raw: string): boolean {
  return ["true", "1", "yes"].includes(raw.trim().toLowerCase());
}

/**
 * Build a client configuration from environment variables.
 * Unset variables fall back to schema defaults.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  const input: ClientConfigInput = {};

  if (env.SEQFLOW_BASE_URL) input.baseUrl = env.SEQFLOW_BASE_URL;
  if (env.SEQFLOW_API_PREFIX !== undefined) input.apiPrefix = env.SEQFLOW_API_PREFIX;
  if (env.SEQFLOW_WORKFLOWS_PATH) input.workflowsPath = env.SEQFLOW_WORKFLOWS_PATH;
  if (env.SEQFLOW_REQUEST_TIMEOUT_MS) {
    input.requestTimeoutMs = parseIntEnv("SEQFLOW_REQUEST_TIMEOUT_MS", env.SEQFLOW_REQUEST_TIMEOUT_MS);
  }
  if (env.SEQFLOW_STREAM_TIMEOUT_MS) {
    input.streamTimeoutMs = parseIntEnv("SEQFLOW_STREAM_TIMEOUT_MS", env.SEQFLOW_STREAM_TIMEOUT_MS);
  }
  if (env.SEQFLOW_ON_CONFLICT) {
    const policy = ConflictPolicyEnum.safeParse(env.SEQFLOW_ON_CONFLICT);
    if (!policy.success) {
      throw new SeqflowError("BAD_REQUEST", "SEQFLOW_ON_CONFLICT must be 'replace' or 'accept'", {
        value: env.SEQFLOW_ON_CONFLICT
      });
    }
    input.onConflict = policy.data;
  }
  if (env.SEQFLOW_VERIFY_REGISTRATION) {
    input.verifyRegistration = parseBoolEnv(env.SEQFLOW_VERIFY_REGISTRATION);
  }
  if (env.SEQFLOW_LOG_LEVEL) {
    const level = LogLevelEnum.safeParse(env.SEQFLOW_LOG_LEVEL);
    if (!level.success) {
      throw new SeqflowError("BAD_REQUEST", "Unknown SEQFLOW_LOG_LEVEL", { value: env.SEQFLOW_LOG_LEVEL });
    }
    input.logLevel = level.data;
  }

  return parseClientConfig(input);
}
