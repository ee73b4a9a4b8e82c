import type { BookingErrorKind } from '../errors.js'
import type { Reservation, ReservationDraft, ReservationPatch } from '../reservations/types.js'

export type RejectReason =
  | 'transcription_failed'
  | 'unknown_guest'
  | 'malformed_reply'
  | 'missing_fields'
  | 'model_unavailable'
  | 'unsupported'

export type Intent =
  | { kind: 'create'; draft: ReservationDraft }
  | { kind: 'modify'; guestName: string; patch: ReservationPatch }
  | { kind: 'delete'; guestName: string }
  | { kind: 'query'; question: string; answer?: string }
  | { kind: 'reject'; reason: RejectReason; detail?: string; candidates?: string[] }

export type MutationIntent = Extract<Intent, { kind: 'create' | 'modify' | 'delete' }>

export type RejectIntent = Extract<Intent, { kind: 'reject' }>

/** The store contents the interpreter reasons about; never mutated */
export type StoreSnapshot = readonly Reservation[]

/** One-shot text completion */
export interface LanguageModel {
  complete(systemPrompt: string, userPrompt: string): Promise<string>
}

export interface AudioInput {
  data: Buffer
  /** Declared container/codec, e.g. `audio/ogg` */
  mimeType: string
  filename?: string
}

export interface SpeechToText {
  transcribe(audio: AudioInput): Promise<string>
}

export interface VoiceInterpretation {
  /** What was heard; null when transcription failed */
  transcript: string | null
  intent: Intent
}

export function reject(reason: RejectReason, detail?: string, candidates?: string[]): RejectIntent {
  const intent: RejectIntent = { kind: 'reject', reason }
  if (detail !== undefined) intent.detail = detail
  if (candidates !== undefined) intent.candidates = candidates
  return intent
}

export function isMutation(intent: Intent): intent is MutationIntent {
  return intent.kind === 'create' || intent.kind === 'modify' || intent.kind === 'delete'
}

/** Error kind reported for a rejected utterance */
export function rejectKind(intent: RejectIntent): BookingErrorKind {
  return intent.reason === 'transcription_failed' ? 'TranscriptionFailed' : 'InterpretAmbiguous'
}
