import type { DateTime } from 'luxon'
import { addNights } from '../reservations/dates.js'
import { REPLY_EXAMPLES } from './schema.js'
import type { StoreSnapshot } from './types.js'

function describeBookings(snapshot: StoreSnapshot): string {
  if (snapshot.length === 0) return '(no reservations)'
  return snapshot
    .map(
      (r) =>
        `- ${r.guestName} | ${r.cabin} | ${r.checkInDate} to ${addNights(r.checkInDate, r.totalNights)} (${r.totalNights} nights) | total ${r.totalPrice}, deposit ${r.deposit}`,
    )
    .join('\n')
}

/**
 * System prompt for one interpretation: today's date, the intents and their
 * fields, the cabin labels and the current bookings.
 */
export function buildInterpreterPrompt(today: DateTime, cabins: readonly string[], snapshot: StoreSnapshot): string {
  const cabinList = cabins.length > 0 ? cabins.join(', ') : '(none yet, accept the label the operator uses)'

  return `You are a JSON-only reservation command parser for a cabin rental. You output raw JSON with no other text.

TODAY: ${today.toFormat('yyyy-MM-dd')} (${today.toFormat('cccc')})

RULES:
- Output ONLY a single JSON object. No explanation, no markdown, no code fences.
- Write dates as YYYY-MM-DD, resolving relative dates ("next friday", "tomorrow") against TODAY.
- Write nights and amounts as numbers. "two weeks" is 14 nights.
- Use the guest name exactly as it appears in CURRENT BOOKINGS for modify and delete.
- Leave out fields the operator did not mention. Never invent values.

INTENTS:
- create: a new booking. Required: guest_name, check_in, nights, total_price, cabin. Optional: deposit, phone, notes.
- modify: change an existing booking. guest_name identifies it; changes holds only the fields that change (a new guest name goes in changes.guest_name).
- delete: cancel an existing booking by guest_name.
- query: a question about bookings; put your answer, based on CURRENT BOOKINGS, in answer.
- unsupported: anything else.

CABINS: ${cabinList}

CURRENT BOOKINGS:
${describeBookings(snapshot)}

OUTPUT FORMAT (one of):
${REPLY_EXAMPLES.join('\n')}`
}

export function buildRetryPrompt(utterance: string, error: string): string {
  return `${utterance}

Your previous reply could not be used (${error}). Reply again with only the JSON object in the required format.`
}
