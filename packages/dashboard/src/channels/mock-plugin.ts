import type {
  ChannelPlugin,
  ChannelInstanceConfig,
  ChannelStatus,
  IncomingMessage,
  OutgoingMessage,
} from "@cabin-calendar/core";
import { initialStatus } from "@cabin-calendar/core";

interface HandlerMap {
  message: (msg: IncomingMessage) => void;
  error: (err: Error) => void;
  status: (status: ChannelStatus) => void;
}

type EventHandlers = { [E in keyof HandlerMap]: HandlerMap[E][] };

/** In-process channel for tests and local runs without a chat token */
export class MockChannelPlugin implements ChannelPlugin {
  name = "mock";

  private config: ChannelInstanceConfig | null = null;
  private _status: ChannelStatus;
  private handlers: EventHandlers = { message: [], error: [], status: [] };

  /** Sent messages are captured here for testing */
  sentMessages: Array<{ to: string; message: OutgoingMessage }> = [];
  connectCalls = 0;
  /** Number of upcoming connect() calls that fail */
  failConnects = 0;

  constructor() {
    this._status = initialStatus();
  }

  async init(config: ChannelInstanceConfig): Promise<void> {
    this.config = config;
  }

  async connect(): Promise<void> {
    this.connectCalls++;
    if (this.failConnects > 0) {
      this.failConnects--;
      this._status = { ...this._status, running: true, connected: false, lastError: "connection refused" };
      this.emitStatus();
      throw new Error("connection refused");
    }
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

  async disconnect(): Promise<void> {
    this._status = {
      ...this._status,
      running: false,
      connected: false,
    };
    this.emitStatus();
  }

  async send(to: string, message: OutgoingMessage): Promise<void> {
    this.sentMessages.push({ to, message });
  }

  on<E extends keyof HandlerMap>(event: E, handler: HandlerMap[E]): void {
    this.handlers[event].push(handler);
  }

  status(): ChannelStatus {
    return { ...this._status };
  }

  // ── Test Methods ───────────────────────────────────────────────

  /** Simulate an incoming message */
  simulateIncoming(msg: Omit<IncomingMessage, "channelId" | "timestamp">): void {
    this._status.lastMessageAt = new Date();
    const full: IncomingMessage = {
      ...msg,
      timestamp: new Date(),
      channelId: this.config?.id ?? "mock",
    };
    for (const handler of this.handlers.message) {
      handler(full);
    }
  }

  /** Simulate a dropped connection (should trigger manager reconnection) */
  simulateDisconnect(): void {
    this._status = {
      ...this._status,
      connected: false,
      lastDisconnect: {
        at: new Date(),
        status: "disconnected",
      },
    };
    this.emitStatus();
  }

  /** Simulate a rejected credential (should NOT trigger reconnection) */
  simulateUnauthorized(): void {
    this._status = {
      ...this._status,
      connected: false,
      running: false,
      lastDisconnect: {
        at: new Date(),
        status: "unauthorized",
        unauthorized: true,
      },
    };
    this.emitStatus();
  }

  private emitStatus(): void {
    for (const handler of this.handlers.status) {
      handler({ ...this._status });
    }
  }
}
