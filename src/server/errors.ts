export type SessionErrorCode =
  | 'duplicate_manager'
  | 'duplicate_id'
  | 'unknown_pending_id'
  | 'unauthorized'
  | 'session_closed'
  | 'session_not_open'
  | 'endpoint_unreachable'
  | 'persistence_failure'
  | 'invalid_params';

export class SessionError extends Error {
  constructor(readonly code: SessionErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SessionError';
  }
}

export function isSessionError(error: unknown): error is SessionError {
  return error instanceof SessionError;
}

export function toErrorBody(error: unknown): { code: string; message: string } {
  if (isSessionError(error)) return { code: error.code, message: error.message };
  return { code: 'internal_error', message: 'internal error' };
}
