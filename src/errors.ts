import type {
  BackendPayload,
  ErrorDetail,
  ErrorKind,
  ResourceKind,
  ResourceRef,
  ValidationIssue,
} from "./types.js";

/**
 * Base class of the closed error taxonomy. Everything the orchestration layer
 * reports as a failure is one of the subclasses below.
 */
export abstract class OperationError extends Error {
  abstract readonly kind: ErrorKind;

  toDetail(): ErrorDetail {
    return { kind: this.kind, message: this.message };
  }
}

export class ValidationError extends OperationError {
  readonly kind = "ValidationError";

  constructor(readonly issues: ValidationIssue[], message?: string) {
    super(message ?? `Invalid request: ${issues.map((i) => `${i.field}: ${i.message}`).join("; ")}`);
    this.name = "ValidationError";
  }

  override toDetail(): ErrorDetail {
    return { kind: this.kind, message: this.message, issues: this.issues };
  }
}

export class NotFoundError extends OperationError {
  readonly kind = "NotFound";

  constructor(message: string, readonly backend?: BackendPayload) {
    super(message);
    this.name = "NotFoundError";
  }

  override toDetail(): ErrorDetail {
    return { kind: this.kind, message: this.message, ...(this.backend ? { backend: this.backend } : {}) };
  }
}

export class AmbiguousError extends OperationError {
  readonly kind = "Ambiguous";

  constructor(readonly selector: string, readonly candidates: ResourceRef[]) {
    super(
      `Selector '${selector}' matches ${candidates.length} resources: ` +
        candidates.map((c) => `${c.kind} ${c.id} on ${c.node}`).join(", ")
    );
    this.name = "AmbiguousError";
  }

  override toDetail(): ErrorDetail {
    return { kind: this.kind, message: this.message, candidates: this.candidates };
  }
}

export class KindMismatchError extends OperationError {
  readonly kind = "KindMismatch";

  constructor(readonly ref: ResourceRef, readonly expected: ResourceKind) {
    super(`${ref.id} on ${ref.node} is a ${ref.kind}, not a ${expected}`);
    this.name = "KindMismatchError";
  }

  override toDetail(): ErrorDetail {
    return { kind: this.kind, message: this.message, candidates: [this.ref] };
  }
}

export class UnsupportedOptionError extends OperationError {
  readonly kind = "UnsupportedOption";

  constructor(message: string, readonly issues: ValidationIssue[] = []) {
    super(message);
    this.name = "UnsupportedOptionError";
  }

  override toDetail(): ErrorDetail {
    return {
      kind: this.kind,
      message: this.message,
      ...(this.issues.length > 0 ? { issues: this.issues } : {}),
    };
  }
}

export class ConflictError extends OperationError {
  readonly kind = "ConflictError";

  constructor(message: string, readonly backend?: BackendPayload) {
    super(message);
    this.name = "ConflictError";
  }

  override toDetail(): ErrorDetail {
    return { kind: this.kind, message: this.message, ...(this.backend ? { backend: this.backend } : {}) };
  }
}

export class BackendError extends OperationError {
  readonly kind = "BackendError";

  constructor(message: string, readonly backend?: BackendPayload) {
    super(message);
    this.name = "BackendError";
  }

  override toDetail(): ErrorDetail {
    return { kind: this.kind, message: this.message, ...(this.backend ? { backend: this.backend } : {}) };
  }
}

export class TimedOutError extends OperationError {
  readonly kind = "TimedOut";

  constructor(message: string) {
    super(message);
    this.name = "TimedOutError";
  }
}

/** Startup configuration is missing or malformed. Not part of the operation taxonomy. */
export class ConfigError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join("; ")}`);
    this.name = "ConfigError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
