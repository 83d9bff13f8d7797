/**
 * Runs every registered handler against one message context.
 *
 * Handlers run one at a time in registry order. A handler that throws,
 * rejects or times out is logged and counted as not having handled the
 * message; the remaining handlers still run. There is no short-circuit:
 * a claim by one handler does not stop the ones after it.
 */

import type { AutoResponseContext } from "@relaybot/sdk";
import type { HandlerRegistration, HandlerRegistry } from "./registry.js";
import { buildHandlerContext, type ContextDependencies } from "./context.js";
import type { ChatMessage } from "../telegram/bridge.js";
import { createLogger } from "../utils/logger.js";
import { getErrorMessage } from "../utils/errors.js";

const log = createLogger("Dispatcher");

export type HandlerStatus = "claimed" | "passed" | "failed";

export interface HandlerOutcome {
  name: string;
  status: HandlerStatus;
  error?: string;
}

export interface DispatchResult {
  /** OR of every handler's result */
  handled: boolean;
  outcomes: HandlerOutcome[];
}

export interface DispatchOptions {
  /** Per-handler limit in ms; 0 disables it */
  timeoutMs?: number;
}

class HandlerTimeoutError extends Error {
  constructor(ms: number) {
    super(`timed out after ${ms}ms`);
    this.name = "HandlerTimeoutError";
  }
}

async function invoke(
  registration: HandlerRegistration,
  ctx: AutoResponseContext,
  timeoutMs: number
): Promise<unknown> {
  // Wrapping in an async function turns synchronous throws into rejections
  const run = (async () => registration.handle(ctx))();
  if (timeoutMs <= 0) return run;

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new HandlerTimeoutError(timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([run, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export async function dispatchMessage(
  handlers: readonly HandlerRegistration[],
  ctx: AutoResponseContext,
  options: DispatchOptions = {}
): Promise<DispatchResult> {
  const timeoutMs = options.timeoutMs ?? 0;
  const outcomes: HandlerOutcome[] = [];
  let handled = false;

  for (const registration of handlers) {
    try {
      const result = await invoke(registration, ctx, timeoutMs);
      if (typeof result !== "boolean") {
        log.warn(
          `⚠️ [${registration.name}] handleMessage returned ${typeof result}, expected boolean; treating as not handled`
        );
        outcomes.push({ name: registration.name, status: "passed" });
        continue;
      }
      if (result) handled = true;
      outcomes.push({ name: registration.name, status: result ? "claimed" : "passed" });
    } catch (err) {
      log.error({ err }, `❌ [${registration.name}] handleMessage error`);
      outcomes.push({ name: registration.name, status: "failed", error: getErrorMessage(err) });
    }
  }

  return { handled, outcomes };
}

/** Builds the context for a chat message and dispatches it over the current registry */
export class MessageDispatcher {
  constructor(
    private registry: HandlerRegistry,
    private contextDeps: ContextDependencies,
    private options: DispatchOptions = {}
  ) {}

  async dispatch(message: ChatMessage): Promise<boolean> {
    const result = await this.dispatchWithResult(message);
    return result.handled;
  }

  async dispatchWithResult(message: ChatMessage): Promise<DispatchResult> {
    // One snapshot per dispatch; a reload mid-dispatch does not affect it
    const handlers = this.registry.snapshot();
    const ctx = buildHandlerContext(message, this.contextDeps);
    const result = await dispatchMessage(handlers, ctx, this.options);
    if (result.handled) {
      const claimedBy = result.outcomes.filter((o) => o.status === "claimed").map((o) => o.name);
      log.debug(`Message ${message.id} in ${message.chatId} handled by ${claimedBy.join(", ")}`);
    }
    return result;
  }
}
