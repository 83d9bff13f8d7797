import { existsSync, unlinkSync } from "fs";
import { resolve } from "path";
import { createLogger } from "../utils/logger.js";
import { getErrorMessage } from "../utils/errors.js";

const log = createLogger("Restart");

/**
 * Sentinel file asking the process to restart. Checked once per inbound
 * message; the supervisor relaunches the process after it exits with the
 * restart exit code.
 */
export class RestartFlag {
  readonly path: string;

  constructor(flagFile: string = "restart.flag") {
    this.path = resolve(flagFile);
  }

  isSet(): boolean {
    return existsSync(this.path);
  }

  /**
   * Returns true (and deletes the file) when a restart was requested.
   * A flag that cannot be deleted is still honored once.
   */
  consume(): boolean {
    if (!this.isSet()) return false;
    try {
      unlinkSync(this.path);
    } catch (err) {
      log.warn(`⚠️ Could not remove ${this.path}: ${getErrorMessage(err)}`);
    }
    log.info("🔄 Restart flag detected, restarting...");
    return true;
  }
}
