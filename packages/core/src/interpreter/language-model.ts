import { collectResponse, createBrainQuery } from '../brain.js'
import type { LanguageModel } from './types.js'

/** LanguageModel backed by a single no-tool Agent SDK turn */
export class BrainLanguageModel implements LanguageModel {
  constructor(private readonly model: string) {}

  async complete(systemPrompt: string, userPrompt: string): Promise<string> {
    const q = createBrainQuery(userPrompt, { model: this.model, systemPrompt, maxTurns: 1 })
    return collectResponse(q)
  }
}
