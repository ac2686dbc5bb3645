export type ReconcileErrorKind =
  | 'FetchError'
  | 'MalformedConfig'
  | 'MalformedTrustAnchors'
  | 'MalformedIssuerCredential'
  | 'InvalidIssuerCredential'
  | 'GenerationError';

/**
 * Environment failures. Every stage throws one of these and the
 * orchestrator turns it into a failed `Result`.
 */
export abstract class ReconcileError extends Error {
  abstract readonly kind: ReconcileErrorKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class FetchError extends ReconcileError {
  readonly kind = 'FetchError' as const;
}

export class MalformedConfigError extends ReconcileError {
  readonly kind = 'MalformedConfig' as const;
}

export class MalformedTrustAnchorsError extends ReconcileError {
  readonly kind = 'MalformedTrustAnchors' as const;
}

export class MalformedIssuerCredentialError extends ReconcileError {
  readonly kind = 'MalformedIssuerCredential' as const;
}

export class InvalidIssuerCredentialError extends ReconcileError {
  readonly kind = 'InvalidIssuerCredential' as const;
}

export class GenerationError extends ReconcileError {
  readonly kind = 'GenerationError' as const;
}

/** A caller broke an internal invariant. Never converted into a `Result`. */
export class PreconditionViolation extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PreconditionViolation';
  }
}

export function assertPrecondition(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new PreconditionViolation(message);
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
