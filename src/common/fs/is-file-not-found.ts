/**
 * Structural ENOENT check. Errors rejected by fs/promises may come from
 * another realm (as under Jest), where `instanceof Error` is false.
 */
export function isFileNotFound(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}
