/**
 * @relaybot/sdk — types for relaybot auto-response handlers
 *
 * A handler is a `.js`, `.mjs` or `.cjs` file in the handler directory
 * exporting `handleMessage`. The file name (minus extension) is the
 * handler's name; handlers run in file-name order.
 *
 * @example
 * ```typescript
 * import type { AutoResponseHandler } from "@relaybot/sdk";
 *
 * export const handleMessage: AutoResponseHandler = async (ctx) => {
 *   if (ctx.content.trim().toLowerCase() !== "ping") return false;
 *   await ctx.reply("pong");
 *   return true;
 * };
 * ```
 *
 * @packageDocumentation
 */

export type {
  InboundMessage,
  MessageAuthor,
  MessageChannel,
  MessageGroup,
  ChatSender,
  AgentHandle,
  AutoResponseContext,
  AutoResponseHandler,
  AutoResponseModule,
} from "./types.js";

export { HandlerSDKError, type SDKErrorCode } from "./errors.js";
