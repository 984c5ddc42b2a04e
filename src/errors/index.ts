export type StackctlErrorCode =
  | 'CONFIG_INVALID'
  | 'TEMPLATE_INVALID'
  | 'TEMPLATE_NOT_FOUND'
  | 'UNKNOWN_STAGE'
  | 'UNKNOWN_DEPENDENCY'
  | 'DEPENDENCY_CYCLE'
  | 'UNRESOLVED_IMPORT'
  | 'DUPLICATE_EXPORT'
  | 'SELF_IMPORT'
  | 'IMPORT_NOT_APPLIED'
  | 'INVALID_TRANSITION'
  | 'STATE_CORRUPT'
  | 'DEPENDENTS_REMAIN'
  | 'STACK_OPERATION_FAILED'
  | 'STACK_TIMEOUT';

/**
 * Error raised for failures the orchestrator knows how to name.
 */
export class StackctlError extends Error {
  readonly code: StackctlErrorCode;
  readonly remediation?: string;
  readonly stage?: string;

  constructor(
    code: StackctlErrorCode,
    message: string,
    options: { remediation?: string; stage?: string; cause?: unknown } = {}
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'StackctlError';
    this.code = code;
    this.remediation = options.remediation;
    this.stage = options.stage;
  }
}

export function isStackctlError(error: unknown): error is StackctlError {
  return error instanceof StackctlError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
