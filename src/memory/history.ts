/**
 * Per-channel conversation transcript, kept in one JSON file:
 *
 *   { "<channelId>": [{ "role": "user", "content": "...", "timestamp": 1700000000000 }, ...] }
 *
 * Each channel keeps its most recent turns only; the whole file is
 * rewritten on every append. Read and write failures are logged and never
 * interrupt message handling.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { dirname, resolve } from "path";
import { z } from "zod";
import { HISTORY_MAX_TURNS_PER_CHANNEL } from "../constants/limits.js";
import { createLogger } from "../utils/logger.js";
import { getErrorMessage } from "../utils/errors.js";

const log = createLogger("History");

const ConversationTurnSchema = z.object({
  role: z.enum(["user", "assistant"]),
  content: z.string(),
  timestamp: z.number().optional(),
});

const HistoryFileSchema = z.record(z.string(), z.array(z.unknown()));

export type ConversationTurn = z.infer<typeof ConversationTurnSchema>;

export interface ConversationHistoryOptions {
  filePath: string;
  maxTurns?: number;
}

export class ConversationHistoryStore {
  private readonly filePath: string;
  private readonly maxTurns: number;
  private channels = new Map<string, ConversationTurn[]>();

  constructor(options: ConversationHistoryOptions) {
    this.filePath = resolve(options.filePath);
    this.maxTurns = options.maxTurns ?? HISTORY_MAX_TURNS_PER_CHANNEL;
  }

  get path(): string {
    return this.filePath;
  }

  /** Read the file into memory. A missing file means an empty history. */
  load(): void {
    this.channels.clear();
    if (!existsSync(this.filePath)) return;

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.filePath, "utf-8"));
    } catch (err) {
      log.warn(`⚠️ Could not read conversation history ${this.filePath}: ${getErrorMessage(err)}`);
      return;
    }

    const parsed = HistoryFileSchema.safeParse(raw);
    if (!parsed.success) {
      log.warn(`⚠️ Ignoring conversation history ${this.filePath}: not a channel map`);
      return;
    }

    let dropped = 0;
    for (const [channelId, entries] of Object.entries(parsed.data)) {
      const turns: ConversationTurn[] = [];
      for (const entry of entries) {
        const turn = ConversationTurnSchema.safeParse(entry);
        if (turn.success) turns.push(turn.data);
        else dropped++;
      }
      this.channels.set(channelId, turns.slice(-this.maxTurns));
    }
    if (dropped > 0) {
      log.warn(`⚠️ Dropped ${dropped} malformed history entries`);
    }
    log.debug(`Loaded conversation history for ${this.channels.size} channel(s)`);
  }

  /** Turns of one channel, oldest first */
  get(channelId: string): ConversationTurn[] {
    return [...(this.channels.get(channelId) ?? [])];
  }

  channelIds(): string[] {
    return [...this.channels.keys()];
  }

  append(channelId: string, turn: ConversationTurn): void {
    const turns = this.channels.get(channelId) ?? [];
    turns.push({ ...turn, timestamp: turn.timestamp ?? Date.now() });
    if (turns.length > this.maxTurns) {
      turns.splice(0, turns.length - this.maxTurns);
    }
    this.channels.set(channelId, turns);
    this.save();
  }

  clear(channelId: string): void {
    if (this.channels.delete(channelId)) this.save();
  }

  private save(): void {
    try {
      mkdirSync(dirname(this.filePath), { recursive: true });
      const payload = Object.fromEntries(this.channels);
      writeFileSync(this.filePath, `${JSON.stringify(payload, null, 2)}\n`, "utf-8");
    } catch (err) {
      log.warn(`⚠️ Could not save conversation history: ${getErrorMessage(err)}`);
    }
  }
}
