export type SeqflowErrorCode =
  | "AGENT_NOT_FOUND"
  | "UNRESOLVED_AGENT"
  | "REGISTRATION_FAILED"
  | "EXECUTION_FAILED"
  | "INVALID_WORKFLOW"
  | "WORKFLOW_SEALED"
  | "TRANSPORT_ERROR"
  | "TIMEOUT"
  | "BAD_REQUEST"
  | "INTERNAL";

export class SeqflowError extends Error {
  readonly code: SeqflowErrorCode;
  readonly details?: unknown;

  constructor(code: SeqflowErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = "SeqflowError";
    this.code = code;
    if (details !== undefined) {
      this.details = details;
    }
  }

  toJSON(): { code: SeqflowErrorCode; message: string; details?: unknown } {
    return {
      code: this.code,
      message: this.message,
      ...(this.details !== undefined && { details: this.details })
    };
  }
}

export function isSeqflowError(err: unknown, code?: SeqflowErrorCode): err is SeqflowError {
  return err instanceof SeqflowError && (code === undefined || err.code === code);
}

export function toSeqflowError(err: unknown): SeqflowError {
  if (err instanceof SeqflowError) return err;
  if (err instanceof Error) {
    // Zod validation errors
    if (err.name === "ZodError") {
      const issues = "issues" in err ? err.issues : undefined;
      return new SeqflowError("BAD_REQUEST", "Validation error", { issues });
    }
    return new SeqflowError("INTERNAL", err.message, { name: err.name, stack: err.stack });
  }
  return new SeqflowError("INTERNAL", "Unknown error", { err });
}
