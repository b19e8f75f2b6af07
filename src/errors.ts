export type ErrorCode =
  | "resolution_error"
  | "graph_error"
  | "transformer_error"
  | "not_fitted"
  | "persistence_error";

export class StepGraphError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** An adapter could not find a required source or key. */
export class ResolutionError extends StepGraphError {
  /** Set once the failure is attributed to the step being resolved. */
  readonly step?: string;

  constructor(message: string, step?: string) {
    super("resolution_error", step === undefined ? message : `step '${step}': ${message}`);
    this.step = step;
  }
}

/** Duplicate step name, unknown step reference or cycle. */
export class GraphError extends StepGraphError {
  constructor(message: string) {
    super("graph_error", message);
  }
}

export type TransformerOperation = "fit" | "transform" | "persist" | "load";

export class TransformerError extends StepGraphError {
  readonly step: string;
  readonly operation: TransformerOperation;

  constructor(step: string, operation: TransformerOperation, cause: unknown, code: ErrorCode = "transformer_error") {
    super(code, `step '${step}': ${operation} failed: ${describe(cause)}`, { cause });
    this.step = step;
    this.operation = operation;
  }
}

/** `transform` reached a trainable step with no fitted or persisted state. */
export class NotFittedError extends TransformerError {
  constructor(step: string) {
    super(step, "transform", new Error("transformer was never fitted and no persisted model exists"), "not_fitted");
  }
}

export class PersistenceError extends StepGraphError {
  readonly path: string;

  constructor(path: string, action: string, cause: unknown) {
    super("persistence_error", `${action} ${path}: ${describe(cause)}`, { cause });
    this.path = path;
  }
}

export function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
