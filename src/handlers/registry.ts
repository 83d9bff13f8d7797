/**
 * Auto-response handler registry — discovers and loads handler files from
 * the handler directory (default ./auto_responses/).
 *
 * A handler file exports its entry point in one of three ways:
 *
 *   export function handleMessage(ctx) {...}            ← preferred
 *   export default function (ctx) {...}
 *   export default { handleMessage(ctx) {...} }
 *
 * The entry point takes the message context and returns (or resolves to)
 * `true` when it handled the message. Files are loaded in file-name order;
 * a file that fails to import or exports no usable entry point is skipped.
 */

import { existsSync, readdirSync, statSync } from "fs";
import { basename, extname, join, resolve } from "path";
import { pathToFileURL } from "url";
import type { AutoResponseContext } from "@relaybot/sdk";
import { HANDLER_FILE_EXTENSIONS } from "../constants/limits.js";
import { createLogger } from "../utils/logger.js";
import { getErrorMessage } from "../utils/errors.js";

const log = createLogger("Handlers");

/**
 * Entry point as loaded. The return value is checked at dispatch time, since
 * nothing at load time guarantees a handler keeps the boolean contract.
 */
export type LoadedHandler = (ctx: AutoResponseContext) => unknown;

export interface HandlerRegistration {
  /** File name without extension */
  name: string;
  /** Absolute path of the handler file */
  file: string;
  handle: LoadedHandler;
}

export type HandlerLoadOutcome =
  | { status: "loaded"; name: string; file: string }
  | { status: "skipped"; name: string; file: string; reason: string }
  | { status: "error"; name: string; file: string; error: string };

export interface HandlerLoadReport {
  directory: string;
  loaded: string[];
  outcomes: HandlerLoadOutcome[];
}

/** Evaluates a handler file and returns its module namespace */
export type HandlerImporter = (file: string, version: number) => Promise<unknown>;

export interface HandlerRegistryOptions {
  directory: string;
  importer?: HandlerImporter;
}

// The query suffix makes the ESM loader evaluate an edited file again
// instead of returning the cached module.
const defaultImporter: HandlerImporter = (file, version) =>
  import(`${pathToFileURL(file).href}?mtime=${version}`);

function isCandidateName(fileName: string): boolean {
  if (fileName.startsWith(".") || fileName.startsWith("_")) return false;
  const ext = extname(fileName);
  if (!HANDLER_FILE_EXTENSIONS.some((allowed) => allowed === ext)) return false;
  return basename(fileName, ext) !== "index";
}

/**
 * Eligible handler files in `directory`, sorted by file name.
 * Throws when the directory cannot be read.
 */
export function listHandlerCandidates(directory: string): string[] {
  return readdirSync(directory, { withFileTypes: true })
    .filter((entry) => (entry.isFile() || entry.isSymbolicLink()) && isCandidateName(entry.name))
    .map((entry) => entry.name)
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
    .map((name) => join(directory, name));
}

export function handlerNameFromFile(file: string): string {
  return basename(file, extname(file));
}

function isCallable(value: unknown): value is LoadedHandler {
  return typeof value === "function";
}

function readProperty(value: unknown, key: string): unknown {
  if ((typeof value !== "object" && typeof value !== "function") || value === null) {
    return undefined;
  }
  return Reflect.get(value, key);
}

/**
 * Entry point of a handler module: `handleMessage`, else a default export
 * function, else `default.handleMessage`.
 */
export function resolveEntryPoint(mod: unknown): LoadedHandler | undefined {
  const named = readProperty(mod, "handleMessage");
  if (isCallable(named)) return named;

  const fallback = readProperty(mod, "default");
  if (isCallable(fallback)) return fallback;

  const nested = readProperty(fallback, "handleMessage");
  if (isCallable(nested)) return nested;

  return undefined;
}

export class HandlerRegistry {
  private handlers: readonly HandlerRegistration[] = Object.freeze([]);
  private currentDirectory: string;
  private importer: HandlerImporter;
  private report: HandlerLoadReport | null = null;
  private loadChain: Promise<unknown> = Promise.resolve();

  constructor(options: HandlerRegistryOptions) {
    this.currentDirectory = resolve(options.directory);
    this.importer = options.importer ?? defaultImporter;
  }

  get directory(): string {
    return this.currentDirectory;
  }

  get count(): number {
    return this.handlers.length;
  }

  get names(): string[] {
    return this.handlers.map((h) => h.name);
  }

  get lastReport(): HandlerLoadReport | null {
    return this.report;
  }

  /** Current ordered registrations. Never mutated; replaced on each load. */
  snapshot(): readonly HandlerRegistration[] {
    return this.handlers;
  }

  /**
   * Scan `directory` and replace the handler set. Loads run one at a time in
   * call order, so the set always reflects the most recently requested scan.
   */
  load(directory?: string): Promise<HandlerLoadReport> {
    if (directory !== undefined) this.currentDirectory = resolve(directory);
    const dir = this.currentDirectory;
    const run = this.loadChain.then(() => this.scanAndSwap(dir));
    // A failed load still rejects for its caller; the next one runs regardless
    this.loadChain = run.catch(() => undefined);
    return run;
  }

  private async scanAndSwap(dir: string): Promise<HandlerLoadReport> {
    let candidates: string[];
    if (!existsSync(dir)) {
      log.warn(`⚠️ Handler directory not found: ${dir}`);
      candidates = [];
    } else {
      try {
        candidates = listHandlerCandidates(dir);
      } catch (err) {
        log.error({ err }, `❌ Cannot read handler directory ${dir}`);
        candidates = [];
      }
    }

    const registrations: HandlerRegistration[] = [];
    const outcomes: HandlerLoadOutcome[] = [];

    for (const file of candidates) {
      const name = handlerNameFromFile(file);
      const outcome = await this.loadOne(file, name);
      outcomes.push(outcome.result);
      if (!outcome.registration) continue;

      const existing = registrations.findIndex((r) => r.name === name);
      if (existing >= 0) {
        log.warn(
          `⚠️ Handler "${name}" defined by both ${basename(registrations[existing].file)} and ${basename(file)}, using ${basename(file)}`
        );
        registrations[existing] = outcome.registration;
      } else {
        registrations.push(outcome.registration);
      }
    }

    this.handlers = Object.freeze(registrations.map((r) => Object.freeze(r)));
    const report: HandlerLoadReport = {
      directory: dir,
      loaded: this.handlers.map((h) => h.name),
      outcomes,
    };
    this.report = report;

    log.info(`Loaded ${this.handlers.length} auto response handler(s)`);
    return report;
  }

  /** Full reload from the last used directory */
  reload(): Promise<HandlerLoadReport> {
    return this.load(this.currentDirectory);
  }

  private async loadOne(
    file: string,
    name: string
  ): Promise<{ result: HandlerLoadOutcome; registration?: HandlerRegistration }> {
    let mod: unknown;
    try {
      mod = await this.importer(file, statSync(file).mtimeMs);
    } catch (err) {
      const error = getErrorMessage(err);
      log.error(`❌ Failed to load handler ${basename(file)}: ${error}`);
      return { result: { status: "error", name, file, error } };
    }

    const handle = resolveEntryPoint(mod);
    if (!handle) {
      const reason = "no handleMessage function exported";
      log.warn(`⚠️ Skipped ${basename(file)}: ${reason}`);
      return { result: { status: "skipped", name, file, reason } };
    }
    if (handle.length > 1) {
      const reason = `handleMessage takes ${handle.length} parameters, expected one (ctx)`;
      log.warn(`⚠️ Skipped ${basename(file)}: ${reason}`);
      return { result: { status: "skipped", name, file, reason } };
    }

    log.info(`✓ Loaded handler: ${name}`);
    return { result: { status: "loaded", name, file }, registration: { name, file, handle } };
  }
}
