/**
 * Forwards messages no handler claimed to the channel's agent session and
 * relays the reply back in platform-sized chunks.
 */

import type { AgentSessionPool } from "./sessions.js";
import type { ChatMessage, ChatTransport } from "../telegram/bridge.js";
import type { ConversationHistoryStore } from "../memory/history.js";
import { sendChunked } from "../utils/chunk.js";
import { createLogger } from "../utils/logger.js";
import { getErrorMessage } from "../utils/errors.js";

const log = createLogger("Fallback");

export const EMPTY_REPLY_TEXT = "I processed your request but didn't generate a text response.";

function formatAgentError(error: unknown): string {
  return `Sorry, I encountered an error: ${getErrorMessage(error)}`;
}

export function withPreamble(preamble: string, text: string): string {
  return `${preamble}\n\nUser's message: ${text}`;
}

export interface AgentFallbackOptions {
  sessions: AgentSessionPool;
  transport: ChatTransport;
  history?: ConversationHistoryStore;
  preamble?: string;
  chunkSize?: number;
  maxLength?: number;
}

export type FallbackResult =
  | { status: "ignored" }
  | { status: "replied"; reply: string; chunks: number }
  | { status: "failed"; error: string };

export class AgentFallback {
  constructor(private options: AgentFallbackOptions) {}

  async handle(message: ChatMessage): Promise<FallbackResult> {
    const content = message.text.trim();
    if (!content) return { status: "ignored" };

    const { sessions, transport, history, preamble, chunkSize, maxLength } = this.options;
    const channelId = message.chatId;
    const send = (text: string) =>
      sendChunked(
        (chunk) => transport.sendMessage({ chatId: channelId, text: chunk }),
        text,
        chunkSize,
        maxLength
      );

    const prompt =
      preamble && !sessions.has(channelId) ? withPreamble(preamble, content) : content;

    await transport.setTyping(channelId);

    try {
      const parts: string[] = [];
      for await (const part of sessions.get(channelId).query(prompt)) {
        parts.push(part);
      }
      const reply = parts.join("").trim() || EMPTY_REPLY_TEXT;

      history?.append(channelId, { role: "user", content, timestamp: message.timestamp.getTime() });
      history?.append(channelId, { role: "assistant", content: reply });

      const chunks = await send(reply);
      log.info(`💬 Replied in ${channelId} (${reply.length} chars, ${chunks} message(s))`);
      return { status: "replied", reply, chunks };
    } catch (err) {
      log.error({ err }, `❌ Agent reply failed in ${channelId}`);
      const error = getErrorMessage(err);
      try {
        await send(formatAgentError(err));
      } catch (sendErr) {
        log.error({ err: sendErr }, `❌ Could not report the error to ${channelId}`);
      }
      return { status: "failed", error };
    }
  }
}
