import type { Context } from 'hono'
import type { z } from 'zod'

/** Read the request body as JSON. Returns 400 if it is not JSON. */
export async function readJson(c: Context): Promise<unknown> {
  try {
    const body: unknown = await c.req.json()
    return body
  } catch {
    return c.json({ error: 'Invalid JSON body.' }, 400)
  }
}

function validationFailed(c: Context, error: z.ZodError): Response {
  return c.json({ error: 'Validation failed.', fields: error.flatten().fieldErrors }, 400)
}

/** Parse and validate request body with a Zod schema. Returns 400 on failure. */
export async function parseBody<T>(
  c: Context,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Promise<T | Response> {
  const body = await readJson(c)
  if (isResponse(body)) return body

  const result = schema.safeParse(body)
  if (!result.success) return validationFailed(c, result.error)
  return result.data
}

/** Validate path parameters. Returns 400 on failure. */
export function parseParams<T>(
  c: Context,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): T | Response {
  const result = schema.safeParse(c.req.param())
  if (!result.success) return validationFailed(c, result.error)
  return result.data
}

/** Check if a parse result is a Response (validation error). */
export function isResponse(value: unknown): value is Response {
  return value instanceof Response
}
