export type SwitchyardErrorCode = 'INVALID_ARGUMENT' | 'INVALID_OPERATION';

/**
 * The only error type Switchyard throws at its callers.
 *
 * Both codes mark programming errors (missing setup, bad arguments). Presentation
 * failures never surface as thrown errors.
 */
export class SwitchyardError extends Error {
  override readonly name = 'SwitchyardError';
  readonly code: SwitchyardErrorCode;

  constructor(code: SwitchyardErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SwitchyardError);
    }
  }
}

export function invalidArgument(detail: string): SwitchyardError {
  return new SwitchyardError('INVALID_ARGUMENT', detail);
}

export function invalidOperation(detail: string): SwitchyardError {
  return new SwitchyardError('INVALID_OPERATION', detail);
}

export function isSwitchyardError(value: unknown, code?: SwitchyardErrorCode): value is SwitchyardError {
  if (!(value instanceof SwitchyardError)) return false;
  return code === undefined || value.code === code;
}
