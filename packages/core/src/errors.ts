export type DockErrorCode =
  | 'invalid_config'
  | 'backend_unavailable'
  | 'backend_failed'
  | 'unknown_backend'
  | 'unknown_prompt';

export class DockError extends Error {
  code: DockErrorCode;
  details?: unknown;

  constructor(code: DockErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = 'DockError';
    this.code = code;
    this.details = details;
  }
}

export function isDockError(err: unknown): err is DockError {
  return err instanceof DockError;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
