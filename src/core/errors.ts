export type MemoryErrorCode = 'validation' | 'not_found' | 'provider_unavailable';

export class MemoryError extends Error {
  constructor(
    readonly code: MemoryErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Malformed input. Never retried.
export class ValidationError extends MemoryError {
  constructor(message: string) {
    super('validation', message);
  }
}

export class NotFoundError extends MemoryError {
  constructor(
    readonly entity: string,
    readonly id: string
  ) {
    super('not_found', `${entity} not found: ${id}`);
  }
}

// The embedding provider failed. Retried with backoff at the call site.
export class ProviderUnavailableError extends MemoryError {
  constructor(
    readonly provider: string,
    message: string,
    cause?: unknown
  ) {
    super('provider_unavailable', `${provider}: ${message}`, { cause });
  }
}

export type ConsistencyWarningCode =
  | 'cycle_detected'
  | 'merge_skipped'
  | 'embedding_deferred'
  | 'stale_write_skipped';

/**
 * Non-fatal annotation returned alongside a result. Logged, never thrown.
 */
export interface ConsistencyWarning {
  code: ConsistencyWarningCode;
  message: string;
  recordIds: string[];
}

export function consistencyWarning(
  code: ConsistencyWarningCode,
  message: string,
  recordIds: string[] = []
): ConsistencyWarning {
  return { code, message, recordIds: [...recordIds] };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
