import type { ChatMessage } from "./bridge.js";
import type { MessageDispatcher } from "../handlers/dispatcher.js";
import type { HotReloadMonitor } from "../handlers/monitor.js";
import type { AgentFallback } from "../agent/fallback.js";
import type { RestartFlag } from "../restart/flag.js";
import { createLogger, verbose } from "../utils/logger.js";

const log = createLogger("Handler");

export interface MessageDecision {
  shouldProcess: boolean;
  reason?: string;
}

export type MessageOutcome =
  | { status: "skipped"; reason: string }
  | { status: "restart" }
  | { status: "handled" }
  | { status: "forwarded" }
  | { status: "ignored" };

export interface MessageHandlerOptions {
  dispatcher: MessageDispatcher;
  fallback: AgentFallback;
  monitor?: HotReloadMonitor;
  restartFlag?: RestartFlag;
  /** Called once when the restart flag is found */
  onRestart?: () => void;
  ignoreBots?: boolean;
}

/**
 * Per-message pipeline: restart flag, hot reload, handler dispatch, then
 * the agent for whatever no handler claimed.
 */
export class MessageHandler {
  private ownUserId?: string;
  private restarting = false;

  constructor(private options: MessageHandlerOptions) {}

  setOwnUserId(userId: string | undefined): void {
    this.ownUserId = userId;
  }

  analyzeMessage(message: ChatMessage): MessageDecision {
    if (message.isOutgoing || (this.ownUserId && message.senderId === this.ownUserId)) {
      return { shouldProcess: false, reason: "Own message" };
    }
    if (message.isBot && (this.options.ignoreBots ?? true)) {
      return { shouldProcess: false, reason: "Sender is a bot" };
    }
    if (this.restarting) {
      return { shouldProcess: false, reason: "Restart pending" };
    }
    return { shouldProcess: true };
  }

  async handleMessage(message: ChatMessage): Promise<MessageOutcome> {
    const msgType = message.isGroup ? "group" : message.isChannel ? "channel" : "dm";
    verbose(`📨 [Handler] Received ${msgType} message ${message.id} from ${message.senderId}`);

    const decision = this.analyzeMessage(message);
    if (!decision.shouldProcess) {
      const reason = decision.reason ?? "filtered";
      verbose(`Skipping message ${message.id}: ${reason}`);
      return { status: "skipped", reason };
    }

    const { dispatcher, fallback, monitor, restartFlag, onRestart } = this.options;

    if (restartFlag?.consume()) {
      this.restarting = true;
      onRestart?.();
      return { status: "restart" };
    }

    await monitor?.check();

    const handled = await dispatcher.dispatch(message);
    if (handled) {
      return { status: "handled" };
    }

    const result = await fallback.handle(message);
    if (result.status === "ignored") {
      return { status: "ignored" };
    }
    if (result.status === "failed") {
      log.warn(`⚠️ Agent fallback failed for message ${message.id}: ${result.error}`);
    }
    return { status: "forwarded" };
  }
}
