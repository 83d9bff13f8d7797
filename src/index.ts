import { HandlerSDKError, type AgentHandle } from "@relaybot/sdk";
import {
  loadConfig,
  getDefaultConfigPath,
  expandPath,
  requireStartupCredentials,
  ConfigError,
  type Config,
} from "./config/index.js";
import { TelegramBridge } from "./telegram/bridge.js";
import { MessageHandler } from "./telegram/handlers.js";
import { MessageQueue } from "./telegram/queue.js";
import { HandlerRegistry } from "./handlers/registry.js";
import { HotReloadMonitor } from "./handlers/monitor.js";
import { MessageDispatcher } from "./handlers/dispatcher.js";
import { ConversationHistoryStore } from "./memory/history.js";
import { PiAiBackend, backendOptionsFromConfig } from "./agent/client.js";
import { AgentSessionPool } from "./agent/sessions.js";
import { AgentFallback } from "./agent/fallback.js";
import { RestartFlag } from "./restart/flag.js";
import type { WebUIServer } from "./webui/server.js";
import { TELEGRAM_FLOOD_SLEEP_THRESHOLD } from "./constants/limits.js";
import { SHUTDOWN_TIMEOUT_MS } from "./constants/timeouts.js";
import { getErrorMessage } from "./utils/errors.js";
import { createLogger, initLoggerFromConfig } from "./utils/logger.js";

const log = createLogger("App");

export class RelayApp {
  private config: Config;
  private bridge: TelegramBridge;
  private registry: HandlerRegistry;
  private monitor: HotReloadMonitor;
  private history: ConversationHistoryStore;
  private sessions: AgentSessionPool;
  private messageHandler: MessageHandler;
  private queue = new MessageQueue();
  private running = false;
  private stopping: Promise<void> | null = null;
  private webuiServer: WebUIServer | null = null;
  private readonly startedAt = Date.now();

  constructor(configPath?: string) {
    this.config = loadConfig(configPath ?? getDefaultConfigPath());
    initLoggerFromConfig(this.config.logging);

    const credentials = requireStartupCredentials(this.config);
    const { telegram, agent, handlers, storage, restart, messages } = this.config;

    this.bridge = new TelegramBridge({
      apiId: credentials.apiId,
      apiHash: credentials.apiHash,
      botToken: credentials.botToken,
      sessionPath: expandPath(telegram.session_path),
      connectionRetries: telegram.connection_retries,
      autoReconnect: true,
      floodSleepThreshold: TELEGRAM_FLOOD_SLEEP_THRESHOLD,
    });

    this.registry = new HandlerRegistry({ directory: expandPath(handlers.directory) });
    this.monitor = new HotReloadMonitor(this.registry, {
      intervalMs: handlers.reload_check_interval_ms,
    });

    this.history = new ConversationHistoryStore({
      filePath: expandPath(storage.history_file),
      maxTurns: storage.history_max_turns,
    });
    this.history.load();

    this.sessions = new AgentSessionPool({
      backend: new PiAiBackend(backendOptionsFromConfig(agent, credentials.apiKey)),
      history: this.history,
      systemPrompt: agent.system_prompt,
    });

    const fallback = new AgentFallback({
      sessions: this.sessions,
      transport: this.bridge,
      history: this.history,
      preamble: agent.first_message_preamble,
      chunkSize: messages.chunk_size,
      maxLength: messages.max_length,
    });

    const dispatcher = new MessageDispatcher(
      this.registry,
      {
        transport: this.bridge,
        agent: handlers.expose_agent ? this.createAgentHandle() : undefined,
        chunkSize: messages.chunk_size,
        maxLength: messages.max_length,
        isConnected: () => this.bridge.isAvailable(),
      },
      { timeoutMs: handlers.timeout_ms }
    );

    this.messageHandler = new MessageHandler({
      dispatcher,
      fallback,
      monitor: this.monitor,
      restartFlag: new RestartFlag(restart.flag_file),
      onRestart: () => {
        this.restart(restart.exit_code).catch((err: unknown) => {
          log.error({ err }, "Restart failed");
          process.exit(restart.exit_code);
        });
      },
      ignoreBots: telegram.ignore_bots,
    });
  }

  /** Agent handle given to handlers; refuses while the bridge is not running */
  private createAgentHandle(): AgentHandle {
    return {
      ask: async (channelId: string, text: string) => {
        if (!this.running) {
          throw new HandlerSDKError("Agent is not running", "AGENT_UNAVAILABLE");
        }
        return this.sessions.ask(channelId, text);
      },
    };
  }

  async start(): Promise<void> {
    log.info("🚀 Starting relaybot...");

    if (this.config.webui.enabled) {
      try {
        const { WebUIServer } = await import("./webui/server.js");
        this.webuiServer = new WebUIServer({
          registry: this.registry,
          sessions: this.sessions,
          bridge: this.bridge,
          config: this.config.webui,
          startedAt: this.startedAt,
        });
        await this.webuiServer.start();
      } catch (error) {
        log.error({ err: error }, "❌ Failed to start WebUI server");
        log.warn("⚠️ Continuing without WebUI...");
      }
    }

    await this.registry.load();

    await this.bridge.connect();
    const username = this.bridge.getUsername();
    log.info(`✅ Connected to Telegram${username ? ` as @${username}` : ""}`);
    this.messageHandler.setOwnUserId(this.bridge.getOwnUserId());

    this.bridge.onNewMessage(
      (message) =>
        this.queue.enqueue(async () => {
          await this.messageHandler.handleMessage(message);
        }),
      { incoming: true }
    );
    this.running = true;

    log.info(`🤖 Bridge ready: ${this.registry.count} handler(s), model ${this.config.agent.model}`);
  }

  /** Signal shutdown and restart share one stop; later callers wait on it */
  stop(): Promise<void> {
    this.stopping ??= this.shutdown();
    return this.stopping;
  }

  /** Drain the queue, drop sessions, disconnect, stop the WebUI */
  private async shutdown(): Promise<void> {
    log.info("👋 Stopping relaybot...");
    this.running = false;

    // Each step is isolated so a failure in one doesn't skip the rest
    try {
      await this.queue.drain();
    } catch (e) {
      log.error({ err: e }, "⚠️ Message queue drain failed");
    }

    this.sessions.closeAll();

    try {
      await this.bridge.disconnect();
    } catch (e) {
      log.error({ err: e }, "⚠️ Bridge disconnect failed");
    }

    if (this.webuiServer) {
      try {
        await this.webuiServer.stop();
      } catch (e) {
        log.error({ err: e }, "⚠️ WebUI stop failed");
      }
    }
  }

  private async restart(exitCode: number): Promise<void> {
    await this.stop();
    log.info(`Exiting with code ${exitCode} for relaunch`);
    process.exit(exitCode);
  }
}

/**
 * Start the application
 */
export async function main(configPath?: string): Promise<void> {
  let app: RelayApp;
  try {
    app = new RelayApp(configPath);
  } catch (error) {
    if (error instanceof ConfigError) {
      log.error(`❌ ${error.message}`);
    } else {
      log.error({ err: error }, `Failed to initialize: ${getErrorMessage(error)}`);
    }
    process.exit(1);
  }

  process.on("unhandledRejection", (reason) => {
    log.error({ err: reason }, "⚠️ Unhandled promise rejection");
  });

  process.on("uncaughtException", (error) => {
    log.error({ err: error }, "💥 Uncaught exception");
    process.exit(1);
  });

  let shutdownInProgress = false;
  const gracefulShutdown = async () => {
    if (shutdownInProgress) return;
    shutdownInProgress = true;

    const forceExit = setTimeout(() => {
      log.error("⚠️ Shutdown timed out, forcing exit");
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExit.unref();
    await app.stop();
    clearTimeout(forceExit);
    process.exit(0);
  };

  process.on("SIGINT", gracefulShutdown);
  process.on("SIGTERM", gracefulShutdown);

  await app.start();
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error) => {
    log.fatal({ err: error }, "Fatal error");
    process.exit(1);
  });
}
