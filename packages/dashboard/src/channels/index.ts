export { ChannelManager } from "./manager.js";
export type { ChannelManagerOptions } from "./manager.js";
export { MockChannelPlugin } from "./mock-plugin.js";
export {
  ChannelMessageHandler,
  isAllowedSender,
  UNAUTHORIZED_REPLY,
  EMPTY_MESSAGE_REPLY,
} from "./message-handler.js";
