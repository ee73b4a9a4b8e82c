/**
 * Channel Manager
 *
 * Central registry for channel plugins with lifecycle management,
 * resilience features (reconnection, dedup), and message routing.
 */

import type {
  ChannelPlugin,
  PluginFactory,
  ChannelInstanceConfig,
  ChannelStatus,
  ChannelInfo,
  IncomingMessage,
  OutgoingMessage,
} from "@cabin-calendar/core";
import {
  toDisplayStatus,
  initialStatus,
  computeBackoff,
  resolvePolicy,
  DedupCache,
  createLogger,
  errorMessage,
} from "@cabin-calendar/core";

const log = createLogger("channels");

/** Internal channel entry */
interface ChannelEntry {
  config: ChannelInstanceConfig;
  plugin: ChannelPlugin;
  status: ChannelStatus;
  reconnectTimer: ReturnType<typeof setTimeout> | null;
  /** A connect() call is in flight; its own outcome decides on reconnecting */
  connecting: boolean;
  /** Disconnected on purpose; never reconnect */
  stopped: boolean;
}

/** Message handler signature */
type MessageHandler = (channelId: string, message: IncomingMessage) => void;

/** Status change handler signature */
type StatusChangeHandler = (channelId: string, status: ChannelStatus) => void;

export interface ChannelManagerOptions {
  dedup?: DedupCache;
  /** Jitter source for backoff */
  random?: () => number;
}

export class ChannelManager {
  private channels = new Map<string, ChannelEntry>();
  private pluginFactories = new Map<string, PluginFactory>();
  private dedup: DedupCache;
  private random: () => number;
  private messageHandler: MessageHandler | null = null;
  private statusChangeHandlers: StatusChangeHandler[] = [];

  constructor(options: ChannelManagerOptions = {}) {
    this.dedup = options.dedup ?? new DedupCache();
    this.random = options.random ?? Math.random;
  }

  /**
   * Register a plugin factory by name.
   */
  registerPlugin(name: string, factory: PluginFactory): void {
    this.pluginFactories.set(name, factory);
  }

  /**
   * Set the message handler (called after dedup).
   */
  onMessage(handler: MessageHandler): void {
    this.messageHandler = handler;
  }

  onStatusChange(handler: StatusChangeHandler): void {
    this.statusChangeHandlers.push(handler);
  }

  /**
   * Create, initialize and connect a channel. A failed first connection is
   * retried in the background; only a missing plugin factory throws.
   */
  async addChannel(config: ChannelInstanceConfig): Promise<ChannelInfo> {
    const id = config.id;
    if (this.channels.has(id)) {
      throw new Error(`Channel already exists: ${id}`);
    }

    const factory = this.pluginFactories.get(config.plugin);
    if (!factory) {
      throw new Error(`Plugin factory not found: ${config.plugin}`);
    }

    const plugin = factory(config);
    const entry: ChannelEntry = {
      config,
      plugin,
      status: initialStatus(),
      reconnectTimer: null,
      connecting: false,
      stopped: false,
    };

    // Wire up event handlers
    plugin.on("message", (msg) => this.handlePluginMessage(id, msg));
    plugin.on("error", (err) => {
      log.warn({ channel: id, err: err.message }, "Channel error");
      entry.status.lastError = err.message;
    });
    plugin.on("status", (status) => this.handlePluginStatus(id, status));

    this.channels.set(id, entry);

    try {
      await plugin.init(config);
      log.info({ channel: id, plugin: config.plugin }, "Initialized channel");
    } catch (err) {
      log.error({ channel: id, err: errorMessage(err) }, "Failed to initialize channel");
      entry.status.lastError = errorMessage(err);
      return this.info(id, entry);
    }

    await this.connectEntry(id, entry);
    return this.info(id, entry);
  }

  /**
   * Send a message through a channel.
   */
  async send(channelId: string, to: string, message: OutgoingMessage): Promise<void> {
    const entry = this.channels.get(channelId);
    if (!entry) {
      throw new Error(`Channel not found: ${channelId}`);
    }

    if (!entry.status.connected) {
      throw new Error(`Channel not connected: ${channelId}`);
    }

    await entry.plugin.send(to, message);
  }

  /**
   * Get all channel infos for REST API.
   */
  getChannelInfos(): ChannelInfo[] {
    return [...this.channels.entries()].map(([id, entry]) => this.info(id, entry));
  }

  getChannelInfo(id: string): ChannelInfo | null {
    const entry = this.channels.get(id);
    return entry ? this.info(id, entry) : null;
  }

  /**
   * Get raw channel config (used by the message handler to look up ownerIdentities).
   */
  getChannelConfig(id: string): ChannelInstanceConfig | undefined {
    return this.channels.get(id)?.config;
  }

  /**
   * Disconnect all channels and clear timers.
   */
  async disconnectAll(): Promise<void> {
    for (const [id, entry] of this.channels.entries()) {
      entry.stopped = true;
      this.clearReconnect(entry);

      try {
        await entry.plugin.disconnect();
        log.info({ channel: id }, "Disconnected channel");
      } catch (err) {
        log.error({ channel: id, err: errorMessage(err) }, "Error disconnecting channel");
      }
    }
  }

  // ── Private helpers ────────────────────────────────────────────

  private info(id: string, entry: ChannelEntry): ChannelInfo {
    return {
      id,
      plugin: entry.config.plugin,
      identity: entry.config.identity,
      status: toDisplayStatus(entry.status),
      statusDetail: { ...entry.status },
    };
  }

  private async connectEntry(id: string, entry: ChannelEntry): Promise<void> {
    entry.connecting = true;
    try {
      await entry.plugin.connect();
      log.info({ channel: id }, "Connected channel");
    } catch (err) {
      log.warn({ channel: id, err: errorMessage(err) }, "Failed to connect channel");
      entry.status.lastError = errorMessage(err);
    } finally {
      entry.connecting = false;
    }

    if (!entry.status.connected) this.scheduleReconnect(id, entry);
  }

  /**
   * Handle incoming message from a plugin (dedup → handler).
   */
  private handlePluginMessage(channelId: string, msg: IncomingMessage): void {
    const entry = this.channels.get(channelId);
    if (!entry) {
      log.warn({ channel: channelId }, "Message for unknown channel");
      return;
    }

    const dedupKey = `${channelId}:${msg.chatId}:${msg.id}`;
    if (this.dedup.isDuplicate(dedupKey)) {
      log.debug({ channel: channelId, messageId: msg.id }, "Duplicate message filtered");
      return;
    }

    entry.status.lastMessageAt = new Date();
    this.messageHandler?.(channelId, msg);
  }

  /**
   * Handle status change from a plugin.
   */
  private handlePluginStatus(channelId: string, newStatus: ChannelStatus): void {
    const entry = this.channels.get(channelId);
    if (!entry) return;

    // The manager owns the attempt counter
    entry.status = {
      ...newStatus,
      reconnectAttempts: newStatus.connected ? 0 : entry.status.reconnectAttempts,
    };

    for (const handler of this.statusChangeHandlers) {
      try {
        handler(channelId, entry.status);
      } catch (err) {
        log.error({ err: errorMessage(err) }, "Error in status change handler");
      }
    }

    if (newStatus.connected) {
      this.clearReconnect(entry);
    } else if (newStatus.running && !entry.connecting) {
      this.scheduleReconnect(channelId, entry);
    }
  }

  /**
   * Start reconnection with exponential backoff.
   */
  private scheduleReconnect(channelId: string, entry: ChannelEntry): void {
    if (entry.stopped) return;
    if (entry.status.lastDisconnect?.unauthorized) {
      log.error({ channel: channelId }, "Channel credential rejected, not reconnecting");
      return;
    }

    this.clearReconnect(entry);

    const policy = resolvePolicy(entry.config.reconnect);
    const delay = computeBackoff(policy, entry.status.reconnectAttempts, this.random);
    if (delay === null) {
      log.error({ channel: channelId, attempts: entry.status.reconnectAttempts }, "Max reconnect attempts reached");
      return;
    }

    entry.status.reconnectAttempts++;
    log.info({ channel: channelId, delay, attempt: entry.status.reconnectAttempts }, "Reconnecting");

    entry.reconnectTimer = setTimeout(() => {
      entry.reconnectTimer = null;
      void this.connectEntry(channelId, entry);
    }, delay);
  }

  private clearReconnect(entry: ChannelEntry): void {
    if (entry.reconnectTimer) {
      clearTimeout(entry.reconnectTimer);
      entry.reconnectTimer = null;
    }
  }
}
