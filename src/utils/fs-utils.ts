/**
 * Whether a filesystem error carries the given errno code (ENOENT, EXDEV, ...)
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}
