/**
 * relaybot handler SDK — public type definitions.
 *
 * These interfaces define the contract between the bridge and the
 * auto-response handlers it loads from the handler directory.
 *
 * @module @relaybot/sdk
 * @version 1.0.0
 */

// ─── Message Views ───────────────────────────────────────────────

/** Raw inbound message payload */
export interface InboundMessage {
  /** Platform message ID */
  id: number;
  /** Message text (empty string for media-only messages) */
  text: string;
  /** Chat the message was posted in */
  chatId: string;
  /** Platform user ID of the sender */
  senderId: string;
  /** Message timestamp */
  timestamp: Date;
}

/** Who sent the message */
export interface MessageAuthor {
  id: string;
  /** @username without the leading @ */
  username?: string;
  /** First name, username, or `User:<id>` when neither is known */
  displayName: string;
  isBot: boolean;
}

/** Where the message was posted (and where replies go) */
export interface MessageChannel {
  id: string;
  title?: string;
}

/** The group containing the channel; `null` in direct messages */
export interface MessageGroup {
  id: string;
  title?: string;
}

// ─── Handles ─────────────────────────────────────────────────────

/** Outbound messaging available to handlers */
export interface ChatSender {
  /** Send text to a chat. Long text is split into platform-sized chunks. */
  sendMessage(chatId: string, text: string): Promise<void>;
  /** Show the typing indicator in a chat */
  setTyping(chatId: string): Promise<void>;
}

/** Conversational agent access (only present when enabled in config) */
export interface AgentHandle {
  /** Ask the agent session of a channel and wait for the full reply */
  ask(channelId: string, text: string): Promise<string>;
}

// ─── Handler Contract ────────────────────────────────────────────

/** Read-only view of one inbound message, shared by every handler */
export interface AutoResponseContext {
  readonly message: Readonly<InboundMessage>;
  readonly author: Readonly<MessageAuthor>;
  readonly channel: Readonly<MessageChannel>;
  readonly group: Readonly<MessageGroup> | null;
  /** Same as `message.text` */
  readonly content: string;
  readonly chat: ChatSender;
  readonly agent?: AgentHandle;
  /** Send text to the channel the message came from */
  reply(text: string): Promise<void>;
}

/**
 * Handler entry point. Return `true` when the message was handled, so the
 * bridge does not forward it to the agent. Every handler still runs.
 *
 * Only the boolean `true` claims a message. Any other value, truthy ones such
 * as `1` or `"yes"` included, counts as passed and is logged as a warning.
 */
export type AutoResponseHandler = (ctx: AutoResponseContext) => boolean | Promise<boolean>;

/** Exports a handler file may provide */
export interface AutoResponseModule {
  handleMessage?: AutoResponseHandler;
  default?: AutoResponseHandler | { handleMessage?: AutoResponseHandler };
}
