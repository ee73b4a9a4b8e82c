/**
 * Channel Message Handler
 *
 * Routes incoming channel messages:
 * - Senders outside the channel's allow-list get a refusal
 * - Everyone else → OperatorConsole → one reply on the same chat
 *
 * Dedup is handled by ChannelManager before messages reach here.
 */

import type {
  AudioInput,
  ChannelInstanceConfig,
  IncomingMessage,
  OutgoingMessage,
} from "@cabin-calendar/core";
import { createLogger, errorMessage } from "@cabin-calendar/core";
import type { ConsoleReply, OperatorMessage } from "../operator/operator-console.js";

const log = createLogger("message-handler");

export const EMPTY_MESSAGE_REPLY = "I could not read that message. Please send it again, as text or a voice note.";

export const UNAUTHORIZED_REPLY =
  "You are not authorized to use this bot. Contact the administrator if you need access.";

interface MessageHandlerDeps {
  console: { handle(message: OperatorMessage): Promise<ConsoleReply> };
  sendViaChannel: (channelId: string, to: string, message: OutgoingMessage) => Promise<void>;
  getChannelConfig: (channelId: string) => ChannelInstanceConfig | undefined;
}

/** An empty allow-list lets everyone in */
export function isAllowedSender(config: ChannelInstanceConfig | undefined, sender: string): boolean {
  const allowed = config?.ownerIdentities ?? [];
  return allowed.length === 0 || allowed.some((id) => id.trim() === sender.trim());
}

function audioOf(msg: IncomingMessage): AudioInput | undefined {
  const attachment = msg.attachments?.find((a) => a.mimeType.startsWith("audio/"));
  return attachment
    ? { data: attachment.data, mimeType: attachment.mimeType, filename: attachment.filename }
    : undefined;
}

export class ChannelMessageHandler {
  private deps: MessageHandlerDeps;

  constructor(deps: MessageHandlerDeps) {
    this.deps = deps;
  }

  /**
   * Handle one incoming message (already deduped). Never throws: a failed
   * reply is logged.
   */
  async handleMessage(channelId: string, msg: IncomingMessage): Promise<void> {
    const sender = msg.senderName ? `${msg.senderName} (${msg.from})` : msg.from;

    let text: string;
    if (!isAllowedSender(this.deps.getChannelConfig(channelId), msg.from)) {
      log.warn({ channel: channelId, sender }, "Unauthorized sender");
      text = UNAUTHORIZED_REPLY;
    } else if (!msg.content.trim() && !audioOf(msg)) {
      // A voice note whose download failed arrives empty
      text = EMPTY_MESSAGE_REPLY;
    } else {
      const audio = audioOf(msg);
      log.info({ channel: channelId, sender, voice: audio !== undefined }, "Operator message");
      const reply = await this.deps.console.handle(audio ? { text: msg.content, audio, sender } : { text: msg.content, sender });
      text = reply.text;
    }

    try {
      await this.deps.sendViaChannel(channelId, msg.chatId, { content: text, replyTo: msg.id });
    } catch (err) {
      log.error({ channel: channelId, chatId: msg.chatId, err: errorMessage(err) }, "Failed to send reply");
    }
  }
}
