import type { Context } from 'hono';
import type { ZodError, ZodTypeAny, z } from 'zod';

export type Parsed<T> = { ok: true; data: T } | { ok: false; response: Response };

function formatZodError(error: ZodError) {
  return error.issues.map((issue) => ({
    field: issue.path.join('.'),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Parse and validate the JSON body. With `optional`, an empty body is read
 * as `{}`.
 */
export async function readBody<S extends ZodTypeAny>(
  c: Context,
  schema: S,
  opts: { optional?: boolean } = {},
): Promise<Parsed<z.infer<S>>> {
  let body: unknown;
  try {
    const text = await c.req.text();
    body = opts.optional && text.trim() === '' ? {} : JSON.parse(text);
  } catch {
    return { ok: false, response: c.json({ error: 'bad_request', message: 'Invalid JSON body' }, 400) };
  }

  const result = schema.safeParse(body);
  if (!result.success) {
    return {
      ok: false,
      response: c.json({ error: 'validation_error', details: formatZodError(result.error) }, 422),
    };
  }
  return { ok: true, data: result.data };
}

/** Validate query parameters. */
export function readQuery<S extends ZodTypeAny>(c: Context, schema: S): Parsed<z.infer<S>> {
  const result = schema.safeParse(c.req.query());
  if (!result.success) {
    return {
      ok: false,
      response: c.json({ error: 'validation_error', details: formatZodError(result.error) }, 422),
    };
  }
  return { ok: true, data: result.data };
}
