export type VimErrorKind =
  | 'UnrecognizedExCommand'
  | 'InvalidSubstitutionSyntax'
  | 'UnsavedCloseBlocked'
  | 'UnknownSetOption'
  | 'MissingArgument'
  | 'CommandFailed';

/**
 * User-facing failure of a command. Thrown by the handlers and engines,
 * reported by the state machine through the host.
 */
export class VimError extends Error {
  readonly kind: VimErrorKind;

  constructor(kind: VimErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'VimError';
    this.kind = kind;
  }
}

export function isVimError(error: unknown): error is VimError {
  return error instanceof VimError;
}

export function toVimError(error: unknown): VimError {
  if (isVimError(error)) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new VimError('CommandFailed', message, { cause: error });
}
