import type { ZodType, ZodTypeDef } from 'zod';

export type ParseResult<T> = { ok: true; data: T } | { ok: false; error: string };

/**
 * Parse a raw response body and validate it against a schema
 */
export function parseBody<T>(body: string, schema: ZodType<T, ZodTypeDef, unknown>): ParseResult<T> {
  let json: unknown;

  try {
    json = JSON.parse(body);
  } catch {
    return { ok: false, error: 'malformed JSON' };
  }

  const result = schema.safeParse(json);

  if (!result.success) {
    const first = result.error.issues[0];
    return { ok: false, error: `unexpected shape at ${first.path.join('.') || '<root>'}: ${first.message}` };
  }

  return { ok: true, data: result.data };
}

/**
 * Walk nested objects by key, returning undefined on any miss
 */
export function readPath(value: unknown, keys: readonly string[]): unknown {
  let current: unknown = value;

  for (const key of keys) {
    if (current === null || typeof current !== 'object' || Array.isArray(current)) {
      return undefined;
    }
    current = Reflect.get(current, key);
  }

  return current;
}
