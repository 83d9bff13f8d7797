/**
 * Bridge between relaybot and Telegram using GramJS
 */

import { Api } from "telegram";
import type { NewMessageEvent } from "telegram/events/NewMessage.js";
import { TelegramBotClient, type TelegramClientConfig } from "./client.js";
import { SENDER_FETCH_TIMEOUT_MS } from "../constants/timeouts.js";
import { createLogger } from "../utils/logger.js";
import { getErrorMessage } from "../utils/errors.js";

const log = createLogger("Bridge");

export interface ChatMessage {
  id: number;
  chatId: string;
  chatTitle?: string;
  senderId: string;
  senderUsername?: string;
  senderFirstName?: string;
  text: string;
  isGroup: boolean;
  isChannel: boolean;
  isBot: boolean; // Whether sender is a bot
  isOutgoing: boolean;
  timestamp: Date;
}

export interface SendMessageOptions {
  chatId: string;
  text: string;
}

/** Outbound side of the bridge, as seen by the fallback path and handlers */
export interface ChatTransport {
  sendMessage(options: SendMessageOptions): Promise<void>;
  setTyping(chatId: string): Promise<void>;
}

export class TelegramBridge implements ChatTransport {
  private client: TelegramBotClient;
  private ownUserId?: string;
  private ownUsername?: string;
  private peerCache: Map<string, Api.TypePeer> = new Map();

  constructor(config: TelegramClientConfig) {
    this.client = new TelegramBotClient(config);
  }

  async connect(): Promise<void> {
    await this.client.connect();
    const me = this.client.getMe();
    if (me) {
      this.ownUserId = me.id.toString();
      this.ownUsername = me.username ?? undefined;
    }
  }

  async disconnect(): Promise<void> {
    await this.client.disconnect();
  }

  isAvailable(): boolean {
    return this.client.isConnected();
  }

  getOwnUserId(): string | undefined {
    return this.ownUserId;
  }

  getUsername(): string | undefined {
    return this.ownUsername;
  }

  async sendMessage(options: SendMessageOptions): Promise<void> {
    // Use cached peer if available, otherwise let GramJS resolve the chat ID
    const peer = this.peerCache.get(options.chatId) ?? options.chatId;
    try {
      await this.client.sendMessage(peer, options.text);
    } catch (error) {
      log.error({ err: error }, `Error sending message to ${options.chatId}`);
      throw error;
    }
  }

  async setTyping(chatId: string): Promise<void> {
    try {
      await this.client.setTyping(this.peerCache.get(chatId) ?? chatId);
    } catch (error) {
      // Typing is cosmetic; never fail a reply over it
      log.debug(`Could not set typing in ${chatId}: ${getErrorMessage(error)}`);
    }
  }

  onNewMessage(
    handler: (message: ChatMessage) => void | Promise<void>,
    filters?: {
      incoming?: boolean;
      outgoing?: boolean;
      chats?: string[];
    }
  ): void {
    this.client.addNewMessageHandler(
      async (event: NewMessageEvent) => {
        const message = await this.parseMessage(event.message);
        await handler(message);
      },
      {
        incoming: filters?.incoming,
        outgoing: filters?.outgoing,
        chats: filters?.chats,
      }
    );
  }

  /**
   * Parse GramJS message to ChatMessage.
   * Sender and chat lookups are best-effort and time-boxed.
   */
  private async parseMessage(msg: Api.Message): Promise<ChatMessage> {
    const chatId = msg.chatId?.toString() ?? "unknown";
    const senderId = msg.senderId?.toString() ?? "0";

    const isChannel = msg.post ?? false;
    const isGroup = !isChannel && chatId.startsWith("-");

    if (msg.peerId) {
      this.peerCache.set(chatId, msg.peerId);
    }

    let senderUsername: string | undefined;
    let senderFirstName: string | undefined;
    let isBot = false;
    try {
      const sender = await withTimeout(msg.getSender(), SENDER_FETCH_TIMEOUT_MS);
      if (sender instanceof Api.User) {
        senderUsername = sender.username ?? undefined;
        senderFirstName = sender.firstName ?? undefined;
        isBot = sender.bot ?? false;
      } else if (sender instanceof Api.Channel) {
        senderUsername = sender.username ?? undefined;
        senderFirstName = sender.title;
      }
    } catch (error) {
      log.debug(`Sender lookup failed for message ${msg.id}: ${getErrorMessage(error)}`);
    }

    let chatTitle: string | undefined;
    if (isGroup || isChannel) {
      try {
        const chat = await withTimeout(msg.getChat(), SENDER_FETCH_TIMEOUT_MS);
        if (chat instanceof Api.Chat || chat instanceof Api.Channel) {
          chatTitle = chat.title;
        }
      } catch (error) {
        log.debug(`Chat lookup failed for ${chatId}: ${getErrorMessage(error)}`);
      }
    }

    return {
      id: msg.id,
      chatId,
      chatTitle,
      senderId,
      senderUsername,
      senderFirstName,
      text: msg.message ?? "",
      isGroup,
      isChannel,
      isBot,
      isOutgoing: msg.out ?? false,
      timestamp: new Date(msg.date * 1000),
    };
  }
}

function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T | undefined> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<undefined>((resolve) => {
    timer = setTimeout(() => resolve(undefined), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}
