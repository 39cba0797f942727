/**
 * Engine error taxonomy. Per-invocation and per-record failures are recorded as data;
 * only PlannerContractViolation is thrown to the plan caller.
 */

export type EngineErrorKind =
  | 'ToolInvocationError'
  | 'Timeout'
  | 'ParseError'
  | 'CacheBackendError'
  | 'PlannerContractViolation';

export abstract class EngineError extends Error {
  abstract readonly kind: EngineErrorKind;
}

/** Network failure, timeout or malformed params on a single tool call. */
export class ToolInvocationError extends EngineError {
  readonly kind: 'ToolInvocationError' | 'Timeout';

  constructor(
    message: string,
    public readonly code: string,
    public readonly retryable: boolean,
    options: { timeout?: boolean } = {},
  ) {
    super(message);
    this.name = 'ToolInvocationError';
    this.kind = options.timeout ? 'Timeout' : 'ToolInvocationError';
  }
}

export class ParseError extends EngineError {
  readonly kind = 'ParseError' as const;

  constructor(message: string, public readonly entityId?: string | number) {
    super(message);
    this.name = 'ParseError';
  }
}

/** Cache store failure; the caller bypasses the cache instead of failing. */
export class CacheBackendError extends EngineError {
  readonly kind = 'CacheBackendError' as const;

  constructor(message: string, public readonly operation: 'get' | 'set' | 'delete' | 'clear' | 'sizes') {
    super(message);
    this.name = 'CacheBackendError';
  }
}

export interface ContractIssue {
  path: string;
  message: string;
}

/** Malformed or empty plan. Raised before any invocation is issued. */
export class PlannerContractViolation extends EngineError {
  readonly kind = 'PlannerContractViolation' as const;

  constructor(message: string, public readonly issues: ContractIssue[] = []) {
    super(message);
    this.name = 'PlannerContractViolation';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
