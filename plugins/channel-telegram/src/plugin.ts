import type {
  ChannelAttachment,
  ChannelInstanceConfig,
  ChannelPlugin,
  ChannelStatus,
  IncomingMessage,
  OutgoingMessage,
} from "@cabin-calendar/core";
import { createLogger, errorMessage, initialStatus } from "@cabin-calendar/core";
import {
  TelegramApi,
  TelegramApiError,
  type TelegramFileRef,
  type TelegramMessage,
  type TelegramUpdate,
} from "./api.js";

const log = createLogger("channel-telegram");

// ─────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────

type MessageHandler = (msg: IncomingMessage) => void;
type ErrorHandler = (err: Error) => void;
type StatusHandler = (status: ChannelStatus) => void;

interface HandlerMap {
  message: MessageHandler;
  error: ErrorHandler;
  status: StatusHandler;
}

type EventHandlers = { [E in keyof HandlerMap]: HandlerMap[E][] };

export interface TelegramPluginOptions {
  /** Injected for tests */
  fetch?: typeof fetch;
  apiBase?: string;
  /** Long-poll timeout passed to getUpdates */
  pollTimeoutSec?: number;
}

/** Telegram rejects messages longer than 4096 characters */
export const MAX_MESSAGE_LENGTH = 4000;

/**
 * Split a reply into chunks of at most `limit` characters, preferring line
 * breaks, then spaces, as cut points.
 */
export function chunkText(text: string, limit = MAX_MESSAGE_LENGTH): string[] {
  const chunks: string[] = [];
  let rest = text;
  while (rest.length > limit) {
    const window = rest.slice(0, limit);
    let cut = window.lastIndexOf("\n");
    if (cut <= 0) cut = window.lastIndexOf(" ");
    if (cut <= 0) cut = limit;
    chunks.push(rest.slice(0, cut));
    rest = rest.slice(cut).replace(/^[\n ]/, "");
  }
  if (rest.length > 0 || chunks.length === 0) chunks.push(rest);
  return chunks;
}

function audioRef(message: TelegramMessage): { ref: TelegramFileRef; kind: "voice" | "audio" } | null {
  if (message.voice) return { ref: message.voice, kind: "voice" };
  if (message.audio) return { ref: message.audio, kind: "audio" };
  return null;
}

// ─────────────────────────────────────────────────────────────────
// Plugin class
// ─────────────────────────────────────────────────────────────────

export class TelegramPlugin implements ChannelPlugin {
  name = "telegram";

  private config: ChannelInstanceConfig;
  private readonly options: TelegramPluginOptions;
  private api: TelegramApi | null = null;
  private _status: ChannelStatus;
  private offset: number | undefined;
  private active = false;
  private loop: Promise<void> | null = null;
  private abort: AbortController | null = null;

  private handlers: EventHandlers = {
    message: [],
    error: [],
    status: [],
  };

  constructor(config: ChannelInstanceConfig, options: TelegramPluginOptions = {}) {
    this.config = config;
    this.options = options;
    this._status = initialStatus();
  }

  // ── Lifecycle ──────────────────────────────────────────────────

  async init(config: ChannelInstanceConfig): Promise<void> {
    this.config = config;
    this.api = null;
  }

  /**
   * Check the token with getMe, then start long polling. Safe to call again
   * after a disconnect; a no-op while polling.
   */
  async connect(): Promise<void> {
    if (this.loop) return;
    const api = this.client();

    this._status = { ...this._status, running: true, connected: false };
    this.emitStatus();

    let username: string | undefined;
    try {
      const me = await api.getMe();
      username = me.username;
    } catch (err) {
      this.markDisconnected(err);
      throw err;
    }

    this.active = true;
    this.markConnected();
    log.info({ channel: this.config.id, bot: username }, "Telegram bot connected");
    this.loop = this.poll(api).finally(() => {
      this.loop = null;
    });
  }

  async disconnect(): Promise<void> {
    this.active = false;
    this.abort?.abort();
    if (this.loop) await this.loop;

    this._status = {
      ...this._status,
      running: false,
      connected: false,
    };
    this.emitStatus();
  }

  // ── Messaging ──────────────────────────────────────────────────

  async send(chatId: string, message: OutgoingMessage): Promise<void> {
    const api = this.client();
    const replyTo = message.replyTo ? Number(message.replyTo) : undefined;
    const chunks = chunkText(message.content);
    for (const [i, chunk] of chunks.entries()) {
      // Only the first chunk quotes the original message
      await api.sendMessage(chatId, chunk, i === 0 && Number.isInteger(replyTo) ? replyTo : undefined);
    }
  }

  // ── Event emitter ──────────────────────────────────────────────

  on<E extends keyof HandlerMap>(event: E, handler: HandlerMap[E]): void {
    this.handlers[event].push(handler);
  }

  // ── Status ─────────────────────────────────────────────────────

  status(): ChannelStatus {
    return { ...this._status };
  }

  // ── Private helpers ────────────────────────────────────────────

  private client(): TelegramApi {
    if (this.api) return this.api;
    if (!this.config.token) {
      throw new Error(`[channel-telegram] No bot token configured for ${this.config.id}`);
    }
    this.api = new TelegramApi({
      token: this.config.token,
      apiBase: this.options.apiBase,
      fetch: this.options.fetch,
    });
    return this.api;
  }

  private async poll(api: TelegramApi): Promise<void> {
    const timeoutSec = this.options.pollTimeoutSec ?? 25;

    while (this.active) {
      this.abort = new AbortController();
      let updates: TelegramUpdate[];
      try {
        updates = await api.getUpdates(this.offset, timeoutSec, this.abort.signal);
      } catch (err) {
        if (!this.active) return;
        // The manager reconnects with backoff unless the token was rejected
        this.markDisconnected(err);
        return;
      }

      for (const update of updates) {
        this.offset = update.update_id + 1;
        if (update.message) await this.handleMessage(api, update.message);
      }
    }
  }

  private async handleMessage(api: TelegramApi, message: TelegramMessage): Promise<void> {
    if (message.from?.is_bot) return;

    const content = message.text ?? message.caption ?? "";
    const attachments: ChannelAttachment[] = [];
    const audio = audioRef(message);
    if (audio) {
      try {
        const data = await api.downloadFile(audio.ref.file_id);
        const mimeType = audio.ref.mime_type ?? "audio/ogg";
        attachments.push({
          filename: audio.ref.file_name ?? `${audio.kind}-${message.message_id}.${mimeType === "audio/mpeg" ? "mp3" : "ogg"}`,
          mimeType,
          data,
        });
      } catch (err) {
        log.warn({ err: errorMessage(err), messageId: message.message_id }, "Failed to download voice note");
        this.emitError(err instanceof Error ? err : new Error(String(err)));
      }
    }

    // A voice note whose download failed is still delivered, empty
    if (!content && !audio) return;

    const senderName = message.from?.first_name ?? message.from?.username;
    const incoming: IncomingMessage = {
      id: String(message.message_id),
      from: String(message.from?.id ?? message.chat.id),
      chatId: String(message.chat.id),
      content,
      timestamp: new Date(message.date * 1000),
      channelId: this.config.id,
      ...(senderName ? { senderName } : {}),
      ...(attachments.length > 0 ? { attachments } : {}),
    };

    this._status = { ...this._status, lastMessageAt: new Date() };
    for (const handler of this.handlers.message) {
      handler(incoming);
    }
  }

  private markConnected(): void {
    this._status = {
      ...this._status,
      running: true,
      connected: true,
      lastConnectedAt: new Date(),
      reconnectAttempts: 0,
      lastError: null,
      lastDisconnect: null,
    };
    this.emitStatus();
  }

  private markDisconnected(err: unknown): void {
    const message = errorMessage(err);
    const unauthorized = err instanceof TelegramApiError && err.unauthorized;
    this.active = false;
    this._status = {
      ...this._status,
      running: !unauthorized,
      connected: false,
      lastError: message,
      lastDisconnect: {
        at: new Date(),
        status: unauthorized ? "unauthorized" : "disconnected",
        error: message,
        unauthorized,
      },
    };
    log.warn({ channel: this.config.id, err: message, unauthorized }, "Telegram connection lost");
    this.emitStatus();
  }

  private emitStatus(): void {
    for (const handler of this.handlers.status) {
      handler({ ...this._status });
    }
  }

  private emitError(err: Error): void {
    this._status = { ...this._status, lastError: err.message };
    for (const handler of this.handlers.error) {
      handler(err);
    }
  }
}

// ─────────────────────────────────────────────────────────────────
// Factory function
// ─────────────────────────────────────────────────────────────────

export function createTelegramPlugin(
  config: ChannelInstanceConfig,
  options?: TelegramPluginOptions,
): TelegramPlugin {
  return new TelegramPlugin(config, options);
}
