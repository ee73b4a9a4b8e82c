export { CommandInterpreter } from './interpreter.js'
export type { CommandInterpreterOptions } from './interpreter.js'
export { BrainLanguageModel } from './language-model.js'
export { WhisperTranscriber, audioFilename } from './transcription.js'
export type { WhisperTranscriberOptions } from './transcription.js'
export { parseQuantity, resolveDate, parseAmount } from './quantities.js'
export { editDistance, nearestNames } from './candidates.js'
export { parseModelReply, modelReplySchema } from './schema.js'
export type { ModelReply } from './schema.js'
export { reject, rejectKind, isMutation } from './types.js'
export type {
  Intent,
  MutationIntent,
  RejectIntent,
  RejectReason,
  StoreSnapshot,
  LanguageModel,
  SpeechToText,
  AudioInput,
  VoiceInterpretation,
} from './types.js'
