import { AppErrorSchema, type AppError } from '../../shared/src';

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function pickDetails(error: NodeJS.ErrnoException, extra?: Record<string, unknown>) {
  const details: Record<string, unknown> = { ...(extra ?? {}) };
  if (error.code) details.errno = error.code;
  if (error.syscall) details.syscall = error.syscall;
  if (error.path) details.path = error.path;
  return Object.keys(details).length ? details : undefined;
}

const ERRNO_REASONS: Record<string, string> = {
  EACCES: 'permission denied',
  EPERM: 'operation not permitted',
  ENOSPC: 'no space left on device',
  ENOENT: 'no such file or directory',
  ENOTDIR: 'a path component is not a directory',
  EISDIR: 'target is a directory',
  EROFS: 'read-only file system',
  EEXIST: 'a file already exists at that path'
};

export function describeErrno(error: unknown): string | null {
  if (!isErrnoException(error) || !error.code) return null;
  return ERRNO_REASONS[error.code] ?? null;
}

export function toAppError(error: unknown): AppError {
  if (!(error instanceof Error)) {
    const parsed = AppErrorSchema.safeParse(error);
    if (parsed.success) return parsed.data;
  }

  if (isErrnoException(error)) {
    return {
      code: `io.${(error.code ?? 'unknown').toLowerCase()}`,
      message: error.message,
      details: pickDetails(error)
    };
  }

  if (error instanceof Error) {
    return {
      code: 'unknown',
      message: error.message,
      details: error.stack ? { stack: error.stack } : undefined
    };
  }

  return {
    code: 'unknown',
    message: 'An unknown error occurred.',
    details: { raw: error }
  };
}

export function createAppError(code: string, message: string, details?: unknown): AppError {
  return { code, message, details };
}

/**
 * Wraps a filesystem failure under a domain code, keeping the errno reason in the message.
 */
export function ioError(code: string, context: string, error: unknown, extra?: Record<string, unknown>): AppError {
  const reason = describeErrno(error) ?? toAppError(error).message;
  const details = isErrnoException(error) ? pickDetails(error, extra) : { ...(extra ?? {}), cause: toAppError(error) };
  return createAppError(code, `${context}: ${reason}`, details);
}
