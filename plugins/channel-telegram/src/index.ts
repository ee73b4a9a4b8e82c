export { TelegramPlugin, createTelegramPlugin, chunkText, MAX_MESSAGE_LENGTH } from "./plugin.js";
export type { TelegramPluginOptions } from "./plugin.js";
export { TelegramApi, TelegramApiError, DEFAULT_API_BASE } from "./api.js";
export type { TelegramApiOptions, TelegramMessage, TelegramUpdate, TelegramUser } from "./api.js";
