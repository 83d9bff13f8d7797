/**
 * Per-channel agent sessions. Each channel gets one conversation context,
 * created on first use and seeded from the persisted transcript.
 */

import type { Api, AssistantMessage, Context, Message, Model, UserMessage } from "@mariozechner/pi-ai";
import type { AgentBackend } from "./client.js";
import type { ConversationHistoryStore, ConversationTurn } from "../memory/history.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("Sessions");

function toUserMessage(content: string, timestamp: number): UserMessage {
  return { role: "user", content, timestamp };
}

function toAssistantMessage(model: Model<Api>, text: string, timestamp: number): AssistantMessage {
  return {
    role: "assistant",
    content: [{ type: "text", text }],
    api: model.api,
    provider: model.provider,
    model: model.id,
    usage: {
      input: 0,
      output: 0,
      cacheRead: 0,
      cacheWrite: 0,
      totalTokens: 0,
      cost: { input: 0, output: 0, cacheRead: 0, cacheWrite: 0, total: 0 },
    },
    stopReason: "stop",
    timestamp,
  };
}

/** Rebuild context messages from stored turns */
export function turnsToMessages(model: Model<Api>, turns: ConversationTurn[]): Message[] {
  return turns.map((turn) =>
    turn.role === "user"
      ? toUserMessage(turn.content, turn.timestamp ?? 0)
      : toAssistantMessage(model, turn.content, turn.timestamp ?? 0)
  );
}

export class AgentSession {
  private context: Context;
  private busy = false;

  constructor(
    readonly channelId: string,
    private backend: AgentBackend,
    systemPrompt?: string,
    seed: Message[] = []
  ) {
    this.context = { systemPrompt, messages: [...seed] };
  }

  get messageCount(): number {
    return this.context.messages.length;
  }

  /**
   * Send one user message and yield reply text as it streams in. The
   * exchange joins the session context only when the reply completes.
   */
  async *query(text: string): AsyncGenerator<string, void, undefined> {
    if (this.busy) {
      throw new Error(`Session ${this.channelId} is already answering`);
    }
    this.busy = true;
    try {
      const messages = [...this.context.messages, toUserMessage(text, Date.now())];
      let reply: AssistantMessage | undefined;

      for await (const event of this.backend.streamReply({ ...this.context, messages })) {
        if (event.type === "text") {
          yield event.delta;
        } else {
          reply = event.message;
        }
      }

      this.context = {
        ...this.context,
        messages: reply ? [...messages, reply] : messages,
      };
    } finally {
      this.busy = false;
    }
  }

  /** Full reply as one string */
  async ask(text: string): Promise<string> {
    const parts: string[] = [];
    for await (const part of this.query(text)) {
      parts.push(part);
    }
    return parts.join("");
  }
}

export interface AgentSessionPoolOptions {
  backend: AgentBackend;
  history?: ConversationHistoryStore;
  systemPrompt?: string;
}

export class AgentSessionPool {
  private sessions = new Map<string, AgentSession>();

  constructor(private options: AgentSessionPoolOptions) {}

  get size(): number {
    return this.sessions.size;
  }

  has(channelId: string): boolean {
    return this.sessions.has(channelId);
  }

  channelIds(): string[] {
    return [...this.sessions.keys()];
  }

  get(channelId: string): AgentSession {
    const existing = this.sessions.get(channelId);
    if (existing) return existing;

    const { backend, history, systemPrompt } = this.options;
    const seed = history ? turnsToMessages(backend.model, history.get(channelId)) : [];
    const session = new AgentSession(channelId, backend, systemPrompt, seed);
    this.sessions.set(channelId, session);
    log.debug(`Created agent session for ${channelId} (${seed.length} seeded messages)`);
    return session;
  }

  ask(channelId: string, text: string): Promise<string> {
    return this.get(channelId).ask(text);
  }

  closeAll(): void {
    const count = this.sessions.size;
    this.sessions.clear();
    if (count > 0) log.info(`Closed ${count} agent session(s)`);
  }
}
