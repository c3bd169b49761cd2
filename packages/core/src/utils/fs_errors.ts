/**
 * True when `error` is a Node.js system error carrying the given code
 * (`ENOENT`, `EEXIST`...).
 */
export function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}
