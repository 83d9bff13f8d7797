import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { basename, join } from "path";
import { vi } from "vitest";
import type { ChatMessage, ChatTransport, SendMessageOptions } from "../../telegram/bridge.js";
import type { HandlerImporter } from "../registry.js";

export function makeChatMessage(overrides: Partial<ChatMessage> = {}): ChatMessage {
  return {
    id: 42,
    chatId: "-100200",
    chatTitle: "Test Group",
    senderId: "1001",
    senderUsername: "alice",
    senderFirstName: "Alice",
    text: "hello there",
    isGroup: true,
    isChannel: false,
    isBot: false,
    isOutgoing: false,
    timestamp: new Date("2026-01-02T03:04:05Z"),
    ...overrides,
  };
}

export interface FakeTransport extends ChatTransport {
  sent: SendMessageOptions[];
  typing: string[];
}

export function createFakeTransport(): FakeTransport {
  const sent: SendMessageOptions[] = [];
  const typing: string[] = [];
  return {
    sent,
    typing,
    sendMessage: vi.fn(async (options: SendMessageOptions) => {
      sent.push(options);
    }),
    setTyping: vi.fn(async (chatId: string) => {
      typing.push(chatId);
    }),
  };
}

/** Temporary handler directory; file contents are irrelevant with a fake importer */
export function createHandlerDir(files: string[] = []): {
  dir: string;
  add: (name: string) => string;
  remove: (name: string) => void;
  cleanup: () => void;
} {
  const dir = mkdtempSync(join(tmpdir(), "relaybot-handlers-"));
  const add = (name: string) => {
    const file = join(dir, name);
    writeFileSync(file, "export function handleMessage(ctx) { return false; }\n");
    return file;
  };
  for (const file of files) add(file);
  return {
    dir,
    add,
    remove: (name: string) => rmSync(join(dir, name)),
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  };
}

/**
 * Importer that returns prepared module namespaces by file name, or throws
 * the prepared error.
 */
export function createFakeImporter(
  modules: Record<string, unknown | Error>
): HandlerImporter & { calls: string[] } {
  const calls: string[] = [];
  const importer = async (file: string) => {
    const name = basename(file);
    calls.push(name);
    const mod = modules[name];
    if (mod instanceof Error) throw mod;
    if (mod === undefined) throw new Error(`Cannot find module '${file}'`);
    return mod;
  };
  return Object.assign(importer, { calls });
}
