// packages/utils/src/errors.ts

export function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}

/** Node system error code (`ENOENT`, `EACCES`, ...) when present. */
export function errorCode(e: unknown): string | undefined {
  if (typeof e !== 'object' || e === null || !('code' in e)) return undefined;
  const { code } = e;
  return typeof code === 'string' ? code : undefined;
}

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}
