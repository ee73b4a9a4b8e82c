/**
 * Configuration
 *
 * Environment variables override an optional YAML file (`CABIN_CONFIG`,
 * default `./config.yaml`), which overrides the defaults below.
 */

import * as path from 'node:path'
import { existsSync, readFileSync } from 'node:fs'
import { parse } from 'yaml'
import { z } from 'zod'
import type { FeedSource } from './imports/feed.js'

const DEFAULT_MODEL = 'claude-haiku-4-5'
const CONFIG_FILENAME = 'config.yaml'

const yamlSchema = z
  .object({
    interpreter: z.object({ model: z.string().optional() }).optional(),
    store: z.object({ path: z.string().optional() }).optional(),
    publish: z
      .object({
        root: z.string().optional(),
        remote: z.string().optional(),
        staticMirror: z.string().optional(),
        calendarUrl: z.string().optional(),
        calendarName: z.string().optional(),
      })
      .optional(),
    chat: z.object({ allowedIds: z.array(z.union([z.string(), z.number()])).optional() }).optional(),
    voice: z.object({ language: z.string().optional() }).optional(),
    server: z.object({ port: z.number().int().positive().optional(), host: z.string().optional() }).optional(),
    cabins: z.array(z.string().min(1)).optional(),
    feeds: z.array(z.object({ name: z.string().min(1), url: z.string().url(), cabin: z.string().min(1) })).optional(),
    feedSyncIntervalMinutes: z.number().positive().optional(),
    lockTimeoutMs: z.number().int().positive().optional(),
  })
  .strict()

type YamlConfig = z.infer<typeof yamlSchema>

export interface AppConfig {
  /** The YAML file that was read, if any */
  configPath: string | null
  interpreter: { apiKey?: string; model: string }
  chat: { token?: string; allowedIds: string[] }
  voice: { apiKey?: string; language?: string }
  store: { path: string }
  publish: {
    root?: string
    remote: string
    staticMirror?: string
    calendarUrl?: string
    calendarName: string
  }
  server: { port: number; host: string }
  cabins: string[]
  feeds: FeedSource[]
  feedSyncIntervalMinutes: number
  lockTimeoutMs: number
  logLevel: string
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

function loadYamlConfig(configPath: string): YamlConfig | null {
  if (!existsSync(configPath)) return null

  let data: unknown
  try {
    data = parse(readFileSync(configPath, 'utf-8'))
  } catch (err) {
    throw new ConfigError(`Could not parse ${configPath}: ${err instanceof Error ? err.message : String(err)}`)
  }
  if (data === null || data === undefined) return {}

  const parsed = yamlSchema.safeParse(data)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
    throw new ConfigError(`Invalid ${configPath}: ${issues.join('; ')}`)
  }
  return parsed.data
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim()
  return trimmed ? trimmed : undefined
}

function parsePort(raw: string): number {
  const port = Number(raw)
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new ConfigError(`PORT must be a TCP port number (got "${raw}")`)
  }
  return port
}

export function splitList(raw: string): string[] {
  return raw
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean)
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): AppConfig {
  const configPath = path.resolve(cwd, nonEmpty(env.CABIN_CONFIG) ?? CONFIG_FILENAME)
  const yaml = loadYamlConfig(configPath)
  const resolve = (p: string | undefined): string | undefined => (p ? path.resolve(cwd, p) : undefined)

  const portEnv = nonEmpty(env.PORT)
  const allowedEnv = nonEmpty(env.ALLOWED_CHAT_IDS)

  return {
    configPath: yaml ? configPath : null,
    interpreter: {
      apiKey: nonEmpty(env.LLM_API_KEY),
      model: nonEmpty(env.LLM_MODEL) ?? yaml?.interpreter?.model ?? DEFAULT_MODEL,
    },
    chat: {
      token: nonEmpty(env.CHAT_TOKEN),
      allowedIds: allowedEnv ? splitList(allowedEnv) : (yaml?.chat?.allowedIds ?? []).map(String),
    },
    voice: {
      apiKey: nonEmpty(env.STT_API_KEY),
      language: yaml?.voice?.language,
    },
    store: {
      path: path.resolve(cwd, nonEmpty(env.STORE_PATH) ?? yaml?.store?.path ?? './reservations.csv'),
    },
    publish: {
      root: resolve(nonEmpty(env.PUBLISH_ROOT) ?? yaml?.publish?.root),
      remote: nonEmpty(env.PUBLISH_REMOTE) ?? yaml?.publish?.remote ?? 'origin',
      staticMirror: resolve(nonEmpty(env.STATIC_MIRROR) ?? yaml?.publish?.staticMirror),
      calendarUrl: nonEmpty(env.CALENDAR_URL) ?? yaml?.publish?.calendarUrl,
      calendarName: yaml?.publish?.calendarName ?? 'Cabin Reservations',
    },
    server: {
      port: portEnv ? parsePort(portEnv) : (yaml?.server?.port ?? 4321),
      host: nonEmpty(env.HOST) ?? yaml?.server?.host ?? '127.0.0.1',
    },
    cabins: yaml?.cabins ?? [],
    feeds: yaml?.feeds ?? [],
    feedSyncIntervalMinutes: yaml?.feedSyncIntervalMinutes ?? 60,
    lockTimeoutMs: yaml?.lockTimeoutMs ?? 30_000,
    logLevel: nonEmpty(env.LOG_LEVEL) ?? 'info',
  }
}

/** Hand the language model credential to the Agent SDK, which reads ANTHROPIC_API_KEY */
export function exportCredentials(config: AppConfig, env: NodeJS.ProcessEnv = process.env): void {
  if (config.interpreter.apiKey && !env.ANTHROPIC_API_KEY) {
    env.ANTHROPIC_API_KEY = config.interpreter.apiKey
  }
}
