/**
 * Chat Channel Types
 *
 * Contract between chat transport plugins and the operator console:
 * inbound utterances (text or voice), one textual reply per message.
 */

// ─────────────────────────────────────────────────────────────────
// Status
// ─────────────────────────────────────────────────────────────────

/** Simple display status for the web UI */
export type ChannelDisplayStatus = 'disconnected' | 'connecting' | 'connected' | 'error' | 'unauthorized'

/** Status object emitted by plugins and tracked by the manager */
export interface ChannelStatus {
  running: boolean
  connected: boolean
  reconnectAttempts: number
  lastConnectedAt: Date | null
  lastDisconnect: {
    at: Date
    status: ChannelDisplayStatus
    error?: string
    /** The transport rejected the credential; reconnecting will not help */
    unauthorized?: boolean
  } | null
  lastMessageAt: Date | null
  lastError: string | null
}

export function toDisplayStatus(status: ChannelStatus): ChannelDisplayStatus {
  if (status.lastDisconnect?.unauthorized) return 'unauthorized'
  if (status.lastError && !status.connected) return 'error'
  if (status.connected) return 'connected'
  if (status.running) return 'connecting'
  return 'disconnected'
}

export function initialStatus(): ChannelStatus {
  return {
    running: false,
    connected: false,
    reconnectAttempts: 0,
    lastConnectedAt: null,
    lastDisconnect: null,
    lastMessageAt: null,
    lastError: null,
  }
}

// ─────────────────────────────────────────────────────────────────
// Resilience
// ─────────────────────────────────────────────────────────────────

/** Exponential backoff reconnect policy */
export interface ReconnectPolicy {
  initialMs: number
  maxMs: number
  factor: number
  jitter: number
  maxAttempts: number
}

// ─────────────────────────────────────────────────────────────────
// Messages
// ─────────────────────────────────────────────────────────────────

/** Voice note or other file delivered with a message */
export interface ChannelAttachment {
  filename: string
  mimeType: string
  data: Buffer
}

export interface IncomingMessage {
  /** Platform message ID, used for redelivery dedup */
  id: string
  /** Sender identity (user id) */
  from: string
  /** Conversation to reply into */
  chatId: string
  /** Text content; empty for a bare voice note */
  content: string
  timestamp: Date
  /** Channel instance ID */
  channelId: string
  attachments?: ChannelAttachment[]
  senderName?: string
}

export interface OutgoingMessage {
  content: string
  /** Platform message ID to reply to */
  replyTo?: string
}

// ─────────────────────────────────────────────────────────────────
// Plugin Interface
// ─────────────────────────────────────────────────────────────────

export interface ChannelInstanceConfig {
  /** Instance ID (e.g. "telegram_main") */
  id: string
  /** Plugin name (e.g. "telegram", "mock") */
  plugin: string
  /** Display identity (bot username, etc.) */
  identity: string
  /** Transport credential */
  token?: string
  /** Sender identities allowed to operate; empty allows everyone */
  ownerIdentities?: string[]
  reconnect?: Partial<ReconnectPolicy>
}

export interface ChannelPlugin {
  /** Plugin name (e.g. "mock", "telegram") */
  name: string
  init(config: ChannelInstanceConfig): Promise<void>
  connect(): Promise<void>
  disconnect(): Promise<void>
  /** Send a message into a chat */
  send(chatId: string, message: OutgoingMessage): Promise<void>
  on(event: 'message', handler: (msg: IncomingMessage) => void): void
  on(event: 'error', handler: (err: Error) => void): void
  on(event: 'status', handler: (status: ChannelStatus) => void): void
  status(): ChannelStatus
}

export type PluginFactory = (config: ChannelInstanceConfig) => ChannelPlugin

/** Channel info for the REST API */
export interface ChannelInfo {
  id: string
  plugin: string
  identity: string
  status: ChannelDisplayStatus
  statusDetail: ChannelStatus
}
