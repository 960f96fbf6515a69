import type { Context } from 'hono'
import type { z } from 'zod'

/**
 * Parse and validate a JSON request body. Returns a 400 response on
 * malformed JSON or schema violations, with field errors keyed by the
 * top-level property and object-level errors under `form`.
 */
export async function parseBody<T extends z.ZodTypeAny>(
  c: Context,
  schema: T,
): Promise<z.output<T> | Response> {
  let body: unknown
  try {
    body = await c.req.json()
  } catch {
    return c.json({ error: 'Invalid JSON body.' }, 400)
  }

  const result = schema.safeParse(body)
  if (!result.success) {
    const { fieldErrors, formErrors } = result.error.flatten()
    return c.json(
      {
        error: 'Validation failed.',
        fields: fieldErrors,
        ...(formErrors.length > 0 ? { form: formErrors } : {}),
      },
      400,
    )
  }

  return result.data
}

/** Check if a parseBody result is a Response (validation error). */
export function isResponse(value: unknown): value is Response {
  return value instanceof Response
}
