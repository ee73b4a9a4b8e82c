import {
  BookingStore,
  BrainLanguageModel,
  CalendarPublisher,
  CommandInterpreter,
  ConfigError,
  FeedSyncScheduler,
  OperationCoordinator,
  WhisperTranscriber,
  createGitRunner,
  createLogger,
  errorMessage,
  exportCredentials,
  isBookingError,
  loadConfig,
  type AppConfig,
} from "@cabin-calendar/core";
import { createTelegramPlugin } from "@cabin-calendar/channel-telegram";
import { createServer } from "./server.js";
import { ChannelManager, ChannelMessageHandler } from "./channels/index.js";
import { OperatorConsole } from "./operator/operator-console.js";

const log = createLogger("dashboard");

// Clear CLAUDECODE env var so the Agent SDK can spawn its subprocess even
// when the dashboard is started from inside another agent session.
delete process.env.CLAUDECODE;

const SETUP_INSTRUCTIONS = [
  "Publishing needs a git working copy with a remote:",
  "  1. git clone <calendar repository> <dir>   (or git init + git remote add origin <url>)",
  "  2. git -C <dir> config user.name <name> && git -C <dir> config user.email <email>",
  "  3. set PUBLISH_ROOT=<dir> (or publish.root in config.yaml)",
].join("\n");

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      log.fatal({ err: err.message }, "Invalid configuration");
      process.exit(1);
    }
    throw err;
  }
}

async function main() {
  const config = readConfig();
  exportCredentials(config);
  log.info({ config: config.configPath ?? "(defaults and environment)" }, "Configuration loaded");

  if (!process.env.ANTHROPIC_API_KEY && !process.env.CLAUDE_CODE_OAUTH_TOKEN) {
    log.warn("No language model credential configured (LLM_API_KEY); every command will be rejected");
  }

  // ── Pipeline ─────────────────────────────────────────────────────

  const store = new BookingStore(config.store.path);
  const publisher = new CalendarPublisher({
    root: config.publish.root,
    remote: config.publish.remote,
    staticMirror: config.publish.staticMirror,
    git: createGitRunner(),
  });

  try {
    await publisher.verify();
  } catch (err) {
    if (isBookingError(err, "PublishUnconfigured")) {
      log.fatal({ err: err.message }, `Publication is not configured\n${SETUP_INSTRUCTIONS}`);
      process.exit(1);
    }
    throw err;
  }

  const coordinator = new OperationCoordinator({
    store,
    publisher,
    cabins: config.cabins,
    lockTimeoutMs: config.lockTimeoutMs,
    calendarName: config.publish.calendarName,
  });

  const interpreter = new CommandInterpreter({
    model: new BrainLanguageModel(config.interpreter.model),
    transcriber: config.voice.apiKey
      ? new WhisperTranscriber({ apiKey: config.voice.apiKey, language: config.voice.language })
      : undefined,
    knownCabins: config.cabins,
  });
  if (!interpreter.voiceEnabled) {
    log.info("STT_API_KEY not set, voice messages will be rejected");
  }

  const operatorConsole = new OperatorConsole({
    interpreter,
    coordinator,
    calendarUrl: config.publish.calendarUrl,
    calendarName: config.publish.calendarName,
  });

  // Bring the remote up to date with whatever accumulated while we were down
  const startup = await coordinator.sync();
  log.info({ publication: startup.publication?.state ?? null, warnings: startup.warnings }, "Startup sync");

  // ── Feed import ──────────────────────────────────────────────────

  const feedSync = new FeedSyncScheduler({
    sources: config.feeds,
    importer: coordinator,
    intervalMs: config.feedSyncIntervalMinutes * 60_000,
  });
  feedSync.start();

  // ── Chat channel ─────────────────────────────────────────────────

  const channelManager = new ChannelManager();
  channelManager.registerPlugin("telegram", (cfg) => createTelegramPlugin(cfg));

  const messageHandler = new ChannelMessageHandler({
    console: operatorConsole,
    sendViaChannel: (channelId, to, message) => channelManager.send(channelId, to, message),
    getChannelConfig: (channelId) => channelManager.getChannelConfig(channelId),
  });

  channelManager.onMessage((channelId, message) => {
    messageHandler.handleMessage(channelId, message).catch((err: unknown) => {
      log.error({ channel: channelId, err: errorMessage(err) }, "Error handling message");
    });
  });

  if (config.chat.token) {
    const info = await channelManager.addChannel({
      id: "telegram_main",
      plugin: "telegram",
      identity: "telegram",
      token: config.chat.token,
      ownerIdentities: config.chat.allowedIds,
    });
    log.info({ channel: info.id, status: info.status, allowList: config.chat.allowedIds.length }, "Chat channel added");
  } else {
    log.info("CHAT_TOKEN not set, chat channel disabled");
  }

  // ── Web server ───────────────────────────────────────────────────

  const server = await createServer({
    coordinator,
    operatorConsole,
    channelManager,
    calendarName: config.publish.calendarName,
    logLevel: config.logLevel,
  });

  try {
    await server.listen({ port: config.server.port, host: config.server.host });
  } catch (err) {
    log.fatal({ err: errorMessage(err) }, "Failed to start server");
    process.exit(1);
  }

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    log.info({ signal }, "Shutting down");
    try {
      await feedSync.stop();
      await channelManager.disconnectAll();
      await server.close();
      process.exit(0);
    } catch (err) {
      log.error({ err: errorMessage(err) }, "Error during shutdown");
      process.exit(1);
    }
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  log.fatal({ err: errorMessage(err) }, "Fatal error");
  process.exit(1);
});
