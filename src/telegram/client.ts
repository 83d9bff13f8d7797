/**
 * Thin wrapper around the GramJS TelegramClient, logged in as a bot account.
 */

import { existsSync, readFileSync, writeFileSync } from "fs";
import { Api, TelegramClient } from "telegram";
import { StringSession } from "telegram/sessions/index.js";
import { NewMessage, type NewMessageEvent } from "telegram/events/NewMessage.js";
import { LogLevel } from "telegram/extensions/Logger.js";
import { createLogger } from "../utils/logger.js";
import { getErrorMessage } from "../utils/errors.js";

const log = createLogger("TelegramClient");

export interface TelegramClientConfig {
  apiId: number;
  apiHash: string;
  botToken: string;
  sessionPath: string;
  connectionRetries: number;
  autoReconnect: boolean;
  floodSleepThreshold: number;
}

export class TelegramBotClient {
  private client: TelegramClient;
  private session: StringSession;
  private me: Api.User | undefined;

  constructor(private config: TelegramClientConfig) {
    this.session = new StringSession(this.readSession());
    this.client = new TelegramClient(this.session, config.apiId, config.apiHash, {
      connectionRetries: config.connectionRetries,
      autoReconnect: config.autoReconnect,
      floodSleepThreshold: config.floodSleepThreshold,
    });
    this.client.setLogLevel(LogLevel.ERROR);
  }

  private readSession(): string {
    if (!existsSync(this.config.sessionPath)) return "";
    try {
      return readFileSync(this.config.sessionPath, "utf-8").trim();
    } catch (error) {
      log.warn(`Could not read session file, starting fresh: ${getErrorMessage(error)}`);
      return "";
    }
  }

  private saveSession(): void {
    try {
      writeFileSync(this.config.sessionPath, this.session.save(), {
        encoding: "utf-8",
        mode: 0o600,
      });
    } catch (error) {
      log.warn(`Could not persist session file: ${getErrorMessage(error)}`);
    }
  }

  async connect(): Promise<void> {
    await this.client.start({ botAuthToken: this.config.botToken });
    this.saveSession();
    const me = await this.client.getMe();
    this.me = me instanceof Api.User ? me : undefined;
  }

  async disconnect(): Promise<void> {
    await this.client.disconnect();
  }

  isConnected(): boolean {
    return this.client.connected === true;
  }

  getMe(): Api.User | undefined {
    return this.me;
  }

  async sendMessage(peer: string | Api.TypePeer, text: string): Promise<Api.Message> {
    return this.client.sendMessage(peer, { message: text });
  }

  async setTyping(peer: string | Api.TypePeer): Promise<void> {
    await this.client.invoke(
      new Api.messages.SetTyping({
        peer,
        action: new Api.SendMessageTypingAction(),
      })
    );
  }

  addNewMessageHandler(
    handler: (event: NewMessageEvent) => Promise<void>,
    filters: { incoming?: boolean; outgoing?: boolean; chats?: string[] } = {}
  ): void {
    this.client.addEventHandler(handler, new NewMessage(filters));
  }
}
