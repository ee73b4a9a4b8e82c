/**
 * Command Interpreter
 *
 * Turns one operator utterance into a single Intent. The language model does
 * the parsing; this class validates its reply, resolves dates and quantities
 * against the clock, and checks guest references against the snapshot.
 * It never touches the store.
 */

import type { DateTime } from 'luxon'
import { systemClock, type Clock } from '../clock.js'
import { errorMessage } from '../errors.js'
import { createLogger } from '../logger.js'
import { sameGuest } from '../reservations/validation.js'
import type { ReservationDraft, ReservationPatch } from '../reservations/types.js'
import { nearestNames } from './candidates.js'
import { buildInterpreterPrompt, buildRetryPrompt } from './prompt.js'
import { parseAmount, parseQuantity, resolveDate } from './quantities.js'
import { parseModelReply, type ModelReply, type ReservationFields } from './schema.js'
import {
  reject,
  type AudioInput,
  type Intent,
  type LanguageModel,
  type SpeechToText,
  type StoreSnapshot,
  type VoiceInterpretation,
} from './types.js'

const log = createLogger('interpreter')

const MAX_ATTEMPTS = 2

export interface CommandInterpreterOptions {
  model: LanguageModel
  /** Absent when voice is not configured */
  transcriber?: SpeechToText
  clock?: Clock
  /** Configured cabin labels, offered to the model alongside those in the store */
  knownCabins?: readonly string[]
}

type FieldResult<T> = { ok: true; value: T } | { ok: false; problem: string }

function convertDate(raw: string, today: DateTime): FieldResult<string> {
  const value = resolveDate(raw, today)
  return value ? { ok: true, value } : { ok: false, problem: `could not understand the date "${raw}"` }
}

function convertNights(raw: string | number): FieldResult<number> {
  const value = parseQuantity(raw)
  return value ? { ok: true, value } : { ok: false, problem: `could not understand the number of nights "${raw}"` }
}

function convertAmount(raw: string | number, label: string): FieldResult<number> {
  const value = parseAmount(raw)
  return value === null ? { ok: false, problem: `could not understand the ${label} "${raw}"` } : { ok: true, value }
}

function present<T>(value: T | null | undefined): value is T {
  return value !== null && value !== undefined && !(typeof value === 'string' && value.trim() === '')
}

export class CommandInterpreter {
  private readonly model: LanguageModel
  private readonly transcriber: SpeechToText | undefined
  private readonly clock: Clock
  private readonly knownCabins: readonly string[]

  constructor(options: CommandInterpreterOptions) {
    this.model = options.model
    this.transcriber = options.transcriber
    this.clock = options.clock ?? systemClock
    this.knownCabins = options.knownCabins ?? []
  }

  get voiceEnabled(): boolean {
    return this.transcriber !== undefined
  }

  /** Configured labels first, then any others found in the store */
  cabinLabels(snapshot: StoreSnapshot): string[] {
    const labels: string[] = []
    for (const label of [...this.knownCabins, ...snapshot.map((r) => r.cabin)]) {
      if (label.trim() && !labels.some((l) => l.toLowerCase() === label.trim().toLowerCase())) {
        labels.push(label.trim())
      }
    }
    return labels
  }

  async interpret(text: string, snapshot: StoreSnapshot): Promise<Intent> {
    const utterance = text.trim()
    if (!utterance) return reject('missing_fields', 'The message was empty')

    const today = this.clock()
    const systemPrompt = buildInterpreterPrompt(today, this.cabinLabels(snapshot), snapshot)
    let userPrompt = utterance
    let lastError = ''

    for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
      let raw: string
      try {
        raw = await this.model.complete(systemPrompt, userPrompt)
      } catch (err) {
        lastError = errorMessage(err)
        log.warn({ attempt, err: lastError }, 'Language model call failed')
        if (attempt < MAX_ATTEMPTS) continue
        return reject('model_unavailable', lastError)
      }

      const parsed = parseModelReply(raw)
      if (parsed.ok) {
        const intent = this.toIntent(parsed.reply, snapshot, today)
        log.debug({ kind: intent.kind }, 'Utterance interpreted')
        return intent
      }

      lastError = parsed.error
      log.warn({ attempt, err: parsed.error, reply: raw.slice(0, 200) }, 'Malformed model reply')
      userPrompt = buildRetryPrompt(utterance, parsed.error)
    }

    return reject('malformed_reply', lastError)
  }

  /** Transcribe, then interpret. Any transcription failure is a reject. */
  async interpretVoice(audio: AudioInput, snapshot: StoreSnapshot): Promise<VoiceInterpretation> {
    if (!this.transcriber) {
      return { transcript: null, intent: reject('transcription_failed', 'Voice messages are not enabled') }
    }

    let transcript: string
    try {
      transcript = (await this.transcriber.transcribe(audio)).trim()
    } catch (err) {
      log.warn({ err: errorMessage(err), mimeType: audio.mimeType }, 'Transcription failed')
      return { transcript: null, intent: reject('transcription_failed', errorMessage(err)) }
    }
    if (!transcript) {
      return { transcript: null, intent: reject('transcription_failed', 'No speech was recognized') }
    }

    return { transcript, intent: await this.interpret(transcript, snapshot) }
  }

  // -------------------------------------------------------------------
  // Reply → Intent
  // -------------------------------------------------------------------

  private toIntent(reply: ModelReply, snapshot: StoreSnapshot, today: DateTime): Intent {
    switch (reply.intent) {
      case 'create':
        return this.toCreate(reply, today)
      case 'modify': {
        const target = this.resolveGuest(reply.guest_name, snapshot)
        if (target.kind === 'reject') return target
        return this.toModify(target.guestName, reply.changes, today)
      }
      case 'delete': {
        const target = this.resolveGuest(reply.guest_name, snapshot)
        if (target.kind === 'reject') return target
        return { kind: 'delete', guestName: target.guestName }
      }
      case 'query':
        return present(reply.answer)
          ? { kind: 'query', question: reply.question, answer: reply.answer }
          : { kind: 'query', question: reply.question }
      case 'unsupported':
        return reject('unsupported', present(reply.reason) ? reply.reason : undefined)
    }
  }

  private resolveGuest(
    name: string,
    snapshot: StoreSnapshot,
  ): { kind: 'found'; guestName: string } | Extract<Intent, { kind: 'reject' }> {
    const match = snapshot.find((r) => sameGuest(r.guestName, name))
    if (match) return { kind: 'found', guestName: match.guestName }
    const candidates = nearestNames(
      name,
      snapshot.map((r) => r.guestName),
    )
    return reject('unknown_guest', `No reservation found for "${name.trim()}"`, candidates)
  }

  private toCreate(fields: ReservationFields, today: DateTime): Intent {
    const missing: string[] = []
    const problems: string[] = []

    const collect = <T>(result: FieldResult<T> | null): T | undefined => {
      if (result === null) return undefined
      if (result.ok) return result.value
      problems.push(result.problem)
      return undefined
    }

    const guestName = present(fields.guest_name) ? fields.guest_name.trim() : undefined
    if (!guestName) missing.push('guest name')
    const checkInDate = collect(present(fields.check_in) ? convertDate(fields.check_in, today) : null)
    if (!present(fields.check_in)) missing.push('check-in date')
    const totalNights = collect(present(fields.nights) ? convertNights(fields.nights) : null)
    if (!present(fields.nights)) missing.push('number of nights')
    const totalPrice = collect(present(fields.total_price) ? convertAmount(fields.total_price, 'total price') : null)
    if (!present(fields.total_price)) missing.push('total price')
    const cabin = present(fields.cabin) ? fields.cabin.trim() : undefined
    if (!cabin) missing.push('cabin')
    const deposit = collect(present(fields.deposit) ? convertAmount(fields.deposit, 'deposit') : null)

    if (
      missing.length > 0 ||
      problems.length > 0 ||
      guestName === undefined ||
      checkInDate === undefined ||
      totalNights === undefined ||
      totalPrice === undefined ||
      cabin === undefined
    ) {
      const parts: string[] = []
      if (missing.length > 0) parts.push(`Missing ${missing.join(', ')}`)
      parts.push(...problems)
      return reject('missing_fields', parts.join('; '))
    }

    const draft: ReservationDraft = { guestName, checkInDate, totalNights, totalPrice, cabin }
    if (deposit !== undefined) draft.deposit = deposit
    if (present(fields.phone)) draft.phone = fields.phone.trim()
    if (present(fields.notes)) draft.notes = fields.notes.trim()
    return { kind: 'create', draft }
  }

  private toModify(guestName: string, changes: ReservationFields, today: DateTime): Intent {
    const patch: ReservationPatch = {}
    const problems: string[] = []

    const apply = <T>(result: FieldResult<T>, set: (value: T) => void): void => {
      if (result.ok) set(result.value)
      else problems.push(result.problem)
    }

    if (present(changes.guest_name)) patch.guestName = changes.guest_name.trim()
    if (present(changes.check_in)) apply(convertDate(changes.check_in, today), (v) => (patch.checkInDate = v))
    if (present(changes.nights)) apply(convertNights(changes.nights), (v) => (patch.totalNights = v))
    if (present(changes.total_price)) {
      apply(convertAmount(changes.total_price, 'total price'), (v) => (patch.totalPrice = v))
    }
    if (present(changes.cabin)) patch.cabin = changes.cabin.trim()
    if (present(changes.deposit)) apply(convertAmount(changes.deposit, 'deposit'), (v) => (patch.deposit = v))
    if (present(changes.phone)) patch.phone = changes.phone.trim()
    if (present(changes.notes)) patch.notes = changes.notes.trim()

    if (problems.length > 0) return reject('missing_fields', problems.join('; '))
    if (Object.keys(patch).length === 0) {
      return reject('missing_fields', `No changes given for ${guestName}`)
    }
    return { kind: 'modify', guestName, patch }
  }
}
