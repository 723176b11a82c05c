/**
 * Node errors expose a string `code` (ENOENT, EADDRINUSE, ...) that the
 * TypeScript lib types do not declare; read it without assuming a shape.
 */
export function nodeErrorCode(e: unknown): string | undefined {
  if (typeof e !== 'object' || e === null || !('code' in e)) return undefined;
  return typeof e.code === 'string' ? e.code : undefined;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
