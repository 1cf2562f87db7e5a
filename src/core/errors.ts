export type ErrorCode =
  | "MalformedEdge"
  | "StageTimeout"
  | "StageExecutionError"
  | "StageBudgetExhausted"
  | "SynthesisValidationError";

export class ChainwardenError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = code;
  }
}

export class MalformedEdgeError extends ChainwardenError {
  constructor(message: string) {
    super("MalformedEdge", message);
  }
}

export class StageTimeoutError extends ChainwardenError {
  constructor(stageName: string, timeoutMs: number) {
    super("StageTimeout", `stage ${stageName} exceeded ${timeoutMs}ms`);
  }
}

export class StageExecutionError extends ChainwardenError {
  constructor(stageName: string, cause: unknown) {
    super("StageExecutionError", `stage ${stageName} failed: ${errorMessage(cause)}`, { cause });
  }
}

export class StageBudgetExhaustedError extends ChainwardenError {
  constructor(stageName: string, remainingMs: number) {
    super("StageBudgetExhausted", `budget exhausted before ${stageName} (${Math.max(0, Math.round(remainingMs))}ms left)`);
  }
}

export class SynthesisValidationError extends ChainwardenError {
  constructor(reason: string) {
    super("SynthesisValidationError", `synthesis output rejected: ${reason}`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function describeError(err: unknown): string {
  if (err instanceof ChainwardenError) {
    return `${err.code}: ${err.message}`;
  }
  return errorMessage(err);
}
