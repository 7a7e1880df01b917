import { PlistError } from "./plist-error";

/**
 * Wraps a failed file system call; the original error stays on `cause`.
 */
export class IoError extends PlistError {
  readonly name = 'IoError';
  readonly code: string | undefined;

  constructor(message: string, readonly path: string, cause: unknown) {
    super(message, { cause });
    this.code = errnoCode(cause);
  }
}

function errnoCode(cause: unknown): string | undefined {
  if (cause instanceof Error && 'code' in cause && typeof cause.code === 'string') {
    return cause.code;
  }
  return undefined;
}
