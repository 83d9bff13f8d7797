import { createLogger } from "../utils/logger.js";

const log = createLogger("Queue");

/**
 * Runs inbound message work one item at a time, in arrival order.
 * A failing item is logged and does not block the ones after it.
 */
export class MessageQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;
  private closed = false;

  get size(): number {
    return this.pending;
  }

  enqueue(work: () => Promise<void>): Promise<void> {
    if (this.closed) {
      log.debug("Queue closed, dropping message");
      return Promise.resolve();
    }
    this.pending++;
    const run = this.tail.then(async () => {
      try {
        await work();
      } catch (err) {
        log.error({ err }, "Error processing message");
      } finally {
        this.pending--;
      }
    });
    this.tail = run;
    return run;
  }

  /** Stop accepting work and wait for what is already queued */
  async drain(): Promise<void> {
    this.closed = true;
    await this.tail;
  }
}
