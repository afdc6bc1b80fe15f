import { z } from 'zod'

/** Pretty zod error formatter (one-line per issue) */
export function formatZodError(e: z.ZodError): string {
  return e.issues
    .map((i) => {
      const path = i.path.length ? i.path.join('.') : '(root)'
      return `${path}: ${i.message}`
    })
    .join('; ')
}

/**
 * Parse `data` with `schema`; on failure hand a compact message to `fail`,
 * which builds the domain error to throw.
 */
export function parseOrThrow<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown,
  fail: (message: string, error: z.ZodError) => Error
): z.output<S> {
  const r = schema.safeParse(data)
  if (!r.success) throw fail(formatZodError(r.error), r.error)
  return r.data
}

/* ─────────────────────────── Primitive Schemas ──────────────────────────── */

export const NonEmptyString = z.string().min(1)

/** Bare hex as the node emits it (no 0x, even length, any case). */
export const WireHex = z
  .string()
  .regex(/^(?:[0-9a-fA-F]{2})*$/, 'must be even-length hex without 0x')

/** Safe URL (http/https) */
export const HttpUrl = z
  .string()
  .url()
  .refine((u) => u.startsWith('http://') || u.startsWith('https://'), { message: 'expected http(s) URL' })

/** Non-negative integer from a JSON number or a decimal string, as bigint. */
export const UIntBig = z
  .union([z.number().int().nonnegative(), z.bigint().nonnegative(), z.string().regex(/^\d+$/)])
  .transform((v) => BigInt(v))

/** Non-negative integer from a number or decimal string (env vars), as number. */
export const UIntNumber = z
  .union([z.number().int().nonnegative(), z.string().regex(/^\d+$/)])
  .transform((v) => Number(v))
