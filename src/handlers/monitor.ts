/**
 * Time-gated hot reload of the handler directory.
 *
 * At most once per interval the directory is re-listed and the number of
 * eligible files compared with the number of registered handlers. A
 * different count triggers a full registry reload. Replacing a file with
 * another (same count) or editing a file in place is not detected; a later
 * count change or a forced reload picks those up.
 */

import { HandlerRegistry, listHandlerCandidates } from "./registry.js";
import { HANDLER_RELOAD_CHECK_INTERVAL_MS } from "../constants/timeouts.js";
import { createLogger } from "../utils/logger.js";
import { getErrorMessage } from "../utils/errors.js";

const log = createLogger("HotReload");

export interface HotReloadMonitorOptions {
  directory?: string;
  intervalMs?: number;
  now?: () => number;
}

export class HotReloadMonitor {
  private readonly directory: string;
  private readonly intervalMs: number;
  private readonly now: () => number;
  private lastCheck: number;

  constructor(
    private registry: HandlerRegistry,
    options: HotReloadMonitorOptions = {}
  ) {
    this.directory = options.directory ?? registry.directory;
    this.intervalMs = options.intervalMs ?? HANDLER_RELOAD_CHECK_INTERVAL_MS;
    this.now = options.now ?? Date.now;
    this.lastCheck = this.now();
  }

  get lastCheckAt(): number {
    return this.lastCheck;
  }

  /** Returns true when a reload ran */
  async check(): Promise<boolean> {
    const now = this.now();
    if (now - this.lastCheck <= this.intervalMs) return false;
    this.lastCheck = now;

    let fileCount: number;
    try {
      fileCount = listHandlerCandidates(this.directory).length;
    } catch (err) {
      log.warn(`⚠️ Handler directory check failed: ${getErrorMessage(err)}`);
      return false;
    }

    const before = this.registry.count;
    if (fileCount === before) return false;

    log.info(`Detected changes in ${this.directory}, reloading handlers...`);
    try {
      await this.registry.load(this.directory);
    } catch (err) {
      log.error({ err }, "❌ Handler reload failed");
      return false;
    }
    log.info(`Reloaded handlers: ${before} → ${this.registry.count}`);
    return true;
  }
}
