import {
  HandlerSDKError,
  type AgentHandle,
  type AutoResponseContext,
  type ChatSender,
  type InboundMessage,
  type MessageAuthor,
  type MessageGroup,
} from "@relaybot/sdk";
import type { ChatMessage, ChatTransport } from "../telegram/bridge.js";
import { sendChunked } from "../utils/chunk.js";
import { getErrorMessage } from "../utils/errors.js";

export interface ContextDependencies {
  transport: ChatTransport;
  agent?: AgentHandle;
  chunkSize?: number;
  maxLength?: number;
  /** When given and false, sends fail with BRIDGE_NOT_CONNECTED */
  isConnected?: () => boolean;
}

/** Chat handle given to handlers; long text is chunked like agent replies */
export function createChatSender(deps: ContextDependencies): ChatSender {
  const { transport, chunkSize, maxLength, isConnected } = deps;
  const ensureConnected = () => {
    if (isConnected && !isConnected()) {
      throw new HandlerSDKError("Telegram bridge is not connected", "BRIDGE_NOT_CONNECTED");
    }
  };
  return Object.freeze({
    async sendMessage(chatId: string, text: string): Promise<void> {
      ensureConnected();
      try {
        await sendChunked(
          (chunk) => transport.sendMessage({ chatId, text: chunk }),
          text,
          chunkSize,
          maxLength
        );
      } catch (error) {
        throw new HandlerSDKError(
          `Failed to send message: ${getErrorMessage(error)}`,
          "OPERATION_FAILED"
        );
      }
    },
    async setTyping(chatId: string): Promise<void> {
      ensureConnected();
      await transport.setTyping(chatId);
    },
  });
}

function authorDisplayName(message: ChatMessage): string {
  return message.senderFirstName ?? message.senderUsername ?? `User:${message.senderId}`;
}

/**
 * One immutable context per inbound message. Every handler in a dispatch
 * receives the same instance.
 */
export function buildHandlerContext(
  message: ChatMessage,
  deps: ContextDependencies,
  chat: ChatSender = createChatSender(deps)
): AutoResponseContext {
  const payload: InboundMessage = Object.freeze({
    id: message.id,
    text: message.text,
    chatId: message.chatId,
    senderId: message.senderId,
    timestamp: message.timestamp,
  });

  const author: MessageAuthor = Object.freeze({
    id: message.senderId,
    username: message.senderUsername,
    displayName: authorDisplayName(message),
    isBot: message.isBot,
  });

  const channel = Object.freeze({ id: message.chatId, title: message.chatTitle });

  const group: MessageGroup | null =
    message.isGroup || message.isChannel
      ? Object.freeze({ id: message.chatId, title: message.chatTitle })
      : null;

  const ctx: AutoResponseContext = {
    message: payload,
    author,
    channel,
    group,
    content: message.text,
    chat,
    reply: (text: string) => chat.sendMessage(message.chatId, text),
  };

  return Object.freeze(deps.agent ? { ...ctx, agent: deps.agent } : ctx);
}
