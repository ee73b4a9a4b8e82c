import OpenAI, { toFile } from 'openai'
import type { AudioInput, SpeechToText } from './types.js'

const EXTENSIONS: Record<string, string> = {
  'audio/ogg': 'ogg',
  'audio/opus': 'ogg',
  'audio/mpeg': 'mp3',
  'audio/mp4': 'm4a',
  'audio/x-m4a': 'm4a',
  'audio/wav': 'wav',
  'audio/webm': 'webm',
}

/** File name Whisper uses to detect the container */
export function audioFilename(audio: AudioInput): string {
  if (audio.filename) return audio.filename
  const ext = EXTENSIONS[audio.mimeType.split(';')[0].trim().toLowerCase()] ?? 'ogg'
  return `voice.${ext}`
}

export interface WhisperTranscriberOptions {
  apiKey: string
  model?: string
  /** Spoken language hint (ISO-639-1) */
  language?: string
}

/** Speech-to-text through the OpenAI transcription endpoint */
export class WhisperTranscriber implements SpeechToText {
  private readonly client: OpenAI
  private readonly model: string
  private readonly language: string | undefined

  constructor(options: WhisperTranscriberOptions) {
    this.client = new OpenAI({ apiKey: options.apiKey })
    this.model = options.model ?? 'whisper-1'
    this.language = options.language
  }

  async transcribe(audio: AudioInput): Promise<string> {
    const file = await toFile(audio.data, audioFilename(audio), { type: audio.mimeType })
    const result = await this.client.audio.transcriptions.create({
      file,
      model: this.model,
      ...(this.language ? { language: this.language } : {}),
    })
    return result.text
  }
}
