/**
 * Error kinds contained by the gate and the orchestrator.
 * None of these escape submit() or execute(); callers only observe outcome fields.
 */
export type ErrorKind =
  | "NOT_FOUND"
  | "UNAUTHORIZED"
  | "RATE_LIMITED"
  | "INVALID_PARAMETERS"
  | "BACKEND_FAILURE"
  | "CAPABILITY_EXECUTION_FAILURE"
  | "TIMEOUT"
  | "CANCELLED";

/**
 * Error tagged with a kind, used for classification when converting to outcomes.
 */
export class RuntimeError extends Error {
  constructor(
    public readonly kind: ErrorKind,
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = "RuntimeError";
  }
}

/**
 * Create a tagged error with a kind field.
 */
export function createTaggedError(
  kind: ErrorKind,
  message: string,
  details?: unknown,
): RuntimeError {
  return new RuntimeError(kind, message, details);
}

/**
 * Kind of an arbitrary thrown value; untagged errors fall back to `fallback`.
 */
export function errorKindOf(error: unknown, fallback: ErrorKind): ErrorKind {
  return error instanceof RuntimeError ? error.kind : fallback;
}

/**
 * Human-readable description of an arbitrary thrown value.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message || error.name;
  if (typeof error === "string") return error;
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}

/**
 * Thrown by CapabilityCatalogue.register() when the id is already taken.
 */
export class DuplicateCapabilityError extends Error {
  constructor(public readonly capabilityId: string) {
    super(`Capability already registered: ${capabilityId}`);
    this.name = "DuplicateCapabilityError";
  }
}

/**
 * Thrown when an agent definition fails schema validation.
 */
export class InvalidAgentDefinitionError extends Error {
  constructor(
    message: string,
    public readonly errors: string[] = [],
  ) {
    super(message);
    this.name = "InvalidAgentDefinitionError";
  }
}

/**
 * Thrown by transitionJob() for a move the status machine does not allow.
 */
export class InvalidTransitionError extends Error {
  constructor(
    public readonly from: string,
    public readonly to: string,
  ) {
    super(`Invalid job transition: ${from} -> ${to}`);
    this.name = "InvalidTransitionError";
  }
}
