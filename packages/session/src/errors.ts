export type SessionErrorCode =
  | 'not-connected'
  | 'freed'
  | 'timeout'
  | 'rejected'
  | 'transport'
  | 'invalid-path';

const KNOWN_CODES: readonly SessionErrorCode[] = [
  'not-connected',
  'freed',
  'timeout',
  'rejected',
  'transport',
  'invalid-path',
];

/**
 * Failure of a session operation.
 */
export class SessionError extends Error {
  readonly code: SessionErrorCode;

  constructor(code: SessionErrorCode, message: string) {
    super(message);
    this.name = 'SessionError';
    this.code = code;
  }
}

/**
 * Map an error code reported by a daemon onto a SessionErrorCode.
 * Unrecognised codes become 'rejected'.
 */
export function toSessionErrorCode(code: string): SessionErrorCode {
  return KNOWN_CODES.find((known) => known === code) ?? 'rejected';
}
