/**
 * Minimal Telegram Bot API client over fetch.
 *
 * Only the methods the channel needs: getMe, getUpdates, getFile,
 * sendMessage and file download. Responses are validated with zod.
 */

import { z } from "zod";

export const DEFAULT_API_BASE = "https://api.telegram.org";

// ─────────────────────────────────────────────────────────────────
// Schemas
// ─────────────────────────────────────────────────────────────────

const envelopeSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional(),
  error_code: z.number().optional(),
});

const userSchema = z.object({
  id: z.number(),
  is_bot: z.boolean().optional(),
  first_name: z.string().optional(),
  username: z.string().optional(),
});

const fileRefSchema = z.object({
  file_id: z.string(),
  mime_type: z.string().optional(),
  file_size: z.number().optional(),
  file_name: z.string().optional(),
});

const messageSchema = z.object({
  message_id: z.number(),
  date: z.number(),
  chat: z.object({ id: z.number() }),
  from: userSchema.optional(),
  text: z.string().optional(),
  caption: z.string().optional(),
  voice: fileRefSchema.optional(),
  audio: fileRefSchema.optional(),
});

const updateSchema = z.object({
  update_id: z.number(),
  message: messageSchema.optional(),
});

const fileSchema = z.object({
  file_id: z.string(),
  file_path: z.string().optional(),
});

export type TelegramUser = z.infer<typeof userSchema>;
export type TelegramMessage = z.infer<typeof messageSchema>;
export type TelegramUpdate = z.infer<typeof updateSchema>;
export type TelegramFileRef = z.infer<typeof fileRefSchema>;

// ─────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────

export class TelegramApiError extends Error {
  constructor(
    readonly method: string,
    /** HTTP status, or the API's error_code */
    readonly status: number,
    readonly description: string,
  ) {
    super(`Telegram ${method} failed (${status}): ${description}`);
    this.name = "TelegramApiError";
  }

  /** The bot token was rejected; retrying will not help */
  get unauthorized(): boolean {
    return this.status === 401;
  }
}

// ─────────────────────────────────────────────────────────────────
// Client
// ─────────────────────────────────────────────────────────────────

export interface TelegramApiOptions {
  token: string;
  apiBase?: string;
  fetch?: typeof fetch;
}

export class TelegramApi {
  private readonly token: string;
  private readonly apiBase: string;
  private readonly doFetch: typeof fetch;

  constructor(options: TelegramApiOptions) {
    this.token = options.token;
    this.apiBase = (options.apiBase ?? DEFAULT_API_BASE).replace(/\/+$/, "");
    this.doFetch = options.fetch ?? fetch;
  }

  getMe(): Promise<TelegramUser> {
    return this.call("getMe", {}, userSchema);
  }

  /** Long poll for new messages; resolves empty after `timeoutSec` */
  getUpdates(
    offset: number | undefined,
    timeoutSec: number,
    signal?: AbortSignal,
  ): Promise<TelegramUpdate[]> {
    const params: Record<string, unknown> = {
      timeout: timeoutSec,
      allowed_updates: ["message"],
    };
    if (offset !== undefined) params.offset = offset;
    return this.call("getUpdates", params, z.array(updateSchema), signal);
  }

  async sendMessage(
    chatId: string,
    text: string,
    replyTo?: number,
  ): Promise<void> {
    const params: Record<string, unknown> = { chat_id: chatId, text };
    if (replyTo !== undefined) {
      params.reply_parameters = {
        message_id: replyTo,
        allow_sending_without_reply: true,
      };
    }
    await this.call("sendMessage", params, z.unknown());
  }

  /** Download a file the bot received (voice notes, audio) */
  async downloadFile(fileId: string): Promise<Buffer> {
    const file = await this.call("getFile", { file_id: fileId }, fileSchema);
    if (!file.file_path) {
      throw new TelegramApiError("getFile", 404, "file is not available for download");
    }

    const res = await this.doFetch(
      `${this.apiBase}/file/bot${this.token}/${file.file_path}`,
    );
    if (!res.ok) {
      throw new TelegramApiError("downloadFile", res.status, res.statusText);
    }
    return Buffer.from(await res.arrayBuffer());
  }

  private async call<T>(
    method: string,
    params: Record<string, unknown>,
    schema: z.ZodType<T>,
    signal?: AbortSignal,
  ): Promise<T> {
    const res = await this.doFetch(`${this.apiBase}/bot${this.token}/${method}`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(params),
      signal,
    });

    let body: unknown;
    try {
      body = await res.json();
    } catch {
      throw new TelegramApiError(method, res.status, res.statusText || "invalid response body");
    }

    const envelope = envelopeSchema.safeParse(body);
    if (!envelope.success) {
      throw new TelegramApiError(method, res.status, "unexpected response shape");
    }
    if (!envelope.data.ok) {
      throw new TelegramApiError(
        method,
        envelope.data.error_code ?? res.status,
        envelope.data.description ?? "request failed",
      );
    }

    const result = schema.safeParse(envelope.data.result);
    if (!result.success) {
      throw new TelegramApiError(method, res.status, `unexpected result: ${result.error.message}`);
    }
    return result.data;
  }
}
