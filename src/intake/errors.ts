// src/intake/errors.ts

export class ConsultationNotFoundError extends Error {
  readonly consultationId: string;

  constructor(consultationId: string) {
    super(`consultation not found: ${consultationId}`);
    this.name = "ConsultationNotFoundError";
    this.consultationId = consultationId;
  }
}

export class ConsultationClosedError extends Error {
  readonly consultationId: string;

  constructor(consultationId: string) {
    super(`consultation is already completed: ${consultationId}`);
    this.name = "ConsultationClosedError";
    this.consultationId = consultationId;
  }
}

/**
 * A store write or read that did not reach durable storage. This is the only
 * failure the intake flow propagates to its caller.
 */
export class PersistenceError extends Error {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`persistence failure during ${operation}: ${detail}`, { cause });
    this.name = "PersistenceError";
    this.operation = operation;
  }
}
