import { query, type Options, type Query } from '@anthropic-ai/claude-agent-sdk'
import { createLogger } from './logger.js'

const log = createLogger('brain')

export interface BrainSessionOptions {
  model: string
  systemPrompt?: string
  /** Conversation turns the model may take; one-shot prompts use 1 */
  maxTurns?: number
}

export function createBrainQuery(prompt: string, options: BrainSessionOptions): Query {
  log.debug({ model: options.model }, 'createBrainQuery')

  // Auth is resolved during config loading (LLM_API_KEY is exported there).
  if (!process.env.ANTHROPIC_API_KEY && !process.env.CLAUDE_CODE_OAUTH_TOKEN) {
    throw new Error('No language model credential configured. Set LLM_API_KEY (or ANTHROPIC_API_KEY).')
  }

  const queryOptions: Options = {
    model: options.model,
    systemPrompt: options.systemPrompt,
    // Pure text completion: the interpreter never lets the model act
    allowedTools: [],
    maxTurns: options.maxTurns ?? 1,
  }

  return query({ prompt, options: queryOptions })
}

/** Drain a query and return the final assistant text */
export async function collectResponse(q: Query): Promise<string> {
  let response = ''
  for await (const msg of q) {
    if (msg.type === 'assistant') {
      // The SDK may return other block types (tool_use, thinking) without text
      let text = ''
      for (const block of msg.message.content) {
        if (block.type === 'text') text += block.text
      }
      response = text
    }
    if (msg.type === 'result') break
  }
  return response
}
