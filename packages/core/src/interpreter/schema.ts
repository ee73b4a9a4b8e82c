/**
 * Shape of the language model's reply. Values stay loose (numbers or
 * phrases) here; the interpreter resolves them against the clock.
 */

import { z } from 'zod'

const text = z.string().nullish()
const numberish = z.union([z.number(), z.string()]).nullish()

const reservationFields = z.object({
  guest_name: text,
  check_in: text,
  nights: numberish,
  total_price: numberish,
  cabin: text,
  deposit: numberish,
  phone: text,
  notes: text,
})

export const modelReplySchema = z.discriminatedUnion('intent', [
  reservationFields.extend({ intent: z.literal('create') }),
  z.object({
    intent: z.literal('modify'),
    guest_name: z.string().min(1),
    changes: reservationFields,
  }),
  z.object({ intent: z.literal('delete'), guest_name: z.string().min(1) }),
  z.object({ intent: z.literal('query'), question: z.string(), answer: text }),
  z.object({ intent: z.literal('unsupported'), reason: text }),
])

export type ModelReply = z.infer<typeof modelReplySchema>

export type ReservationFields = z.infer<typeof reservationFields>

/** Reply JSON examples shown to the model */
export const REPLY_EXAMPLES = [
  '{"intent":"create","guest_name":"...","check_in":"YYYY-MM-DD","nights":4,"total_price":2000,"cabin":"...","deposit":500,"phone":"","notes":""}',
  '{"intent":"modify","guest_name":"<existing guest>","changes":{"nights":5}}',
  '{"intent":"delete","guest_name":"<existing guest>"}',
  '{"intent":"query","question":"...","answer":"..."}',
  '{"intent":"unsupported","reason":"..."}',
]

export type ParseResult = { ok: true; reply: ModelReply } | { ok: false; error: string }

/** Extract the JSON object from a reply and validate it */
export function parseModelReply(raw: string): ParseResult {
  const jsonMatch = raw.match(/\{[\s\S]*\}/)
  if (!jsonMatch) return { ok: false, error: 'no JSON object found in the reply' }

  let data: unknown
  try {
    data = JSON.parse(jsonMatch[0])
  } catch (err) {
    return { ok: false, error: `invalid JSON: ${err instanceof Error ? err.message : String(err)}` }
  }

  const parsed = modelReplySchema.safeParse(data)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
    return { ok: false, error: issues.join('; ') }
  }
  return { ok: true, reply: parsed.data }
}
