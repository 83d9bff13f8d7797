import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";

vi.mock("../../utils/logger.js", () => ({
  createLogger: vi.fn(() => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  })),
}));

import { AgentFallback, EMPTY_REPLY_TEXT, withPreamble } from "../fallback.js";
import { AgentSessionPool } from "../sessions.js";
import { ConversationHistoryStore } from "../../memory/history.js";
import { createFakeTransport, makeChatMessage } from "../../handlers/__tests__/helpers.js";
import { FakeBackend } from "./helpers.js";

describe("AgentFallback", () => {
  let backend: FakeBackend;
  let transport: ReturnType<typeof createFakeTransport>;
  let sessions: AgentSessionPool;

  beforeEach(() => {
    backend = new FakeBackend();
    transport = createFakeTransport();
    sessions = new AgentSessionPool({ backend });
  });

  it("sends a short reply as a single message with the original text as prompt", async () => {
    const reply = "r".repeat(50);
    backend.queue([reply.slice(0, 20), reply.slice(20)]);
    const fallback = new AgentFallback({ sessions, transport });

    const result = await fallback.handle(makeChatMessage({ text: "what is up" }));

    expect(result).toEqual({ status: "replied", reply, chunks: 1 });
    expect(transport.sent).toEqual([{ chatId: "-100200", text: reply }]);
    expect(backend.contexts[0].messages[0]).toMatchObject({ role: "user", content: "what is up" });
  });

  it("ignores whitespace-only messages", async () => {
    const fallback = new AgentFallback({ sessions, transport });

    const result = await fallback.handle(makeChatMessage({ text: "   \n" }));

    expect(result).toEqual({ status: "ignored" });
    expect(backend.contexts).toHaveLength(0);
    expect(transport.typing).toEqual([]);
  });

  it("prepends the preamble only to the first message of a channel", async () => {
    backend.queue(["one"]);
    backend.queue(["two"]);
    const fallback = new AgentFallback({ sessions, transport, preamble: "Be brief." });

    await fallback.handle(makeChatMessage({ text: "  first  " }));
    await fallback.handle(makeChatMessage({ text: "second" }));

    expect(backend.contexts[0].messages[0]).toMatchObject({
      content: "Be brief.\n\nUser's message: first",
    });
    expect(backend.contexts[1].messages[2]).toMatchObject({ content: "second" });
  });

  it("shows the typing indicator before asking the agent", async () => {
    backend.queue(["ok"]);
    const fallback = new AgentFallback({ sessions, transport });

    await fallback.handle(makeChatMessage());

    expect(transport.typing).toEqual(["-100200"]);
  });

  it("substitutes a notice for an empty reply", async () => {
    backend.queue(["  ", "\n"]);
    const fallback = new AgentFallback({ sessions, transport });

    await fallback.handle(makeChatMessage());

    expect(transport.sent).toEqual([{ chatId: "-100200", text: EMPTY_REPLY_TEXT }]);
  });

  it("splits a long reply into ordered chunks", async () => {
    const reply = "a".repeat(1900) + "b".repeat(1900) + "c".repeat(700);
    backend.queue([reply]);
    const fallback = new AgentFallback({ sessions, transport });

    const result = await fallback.handle(makeChatMessage());

    expect(result).toMatchObject({ status: "replied", chunks: 3 });
    expect(transport.sent.map((s) => s.text)).toEqual([
      "a".repeat(1900),
      "b".repeat(1900),
      "c".repeat(700),
    ]);
  });

  it("reports agent errors in the chat", async () => {
    backend.queue(new Error("rate limited"));
    const fallback = new AgentFallback({ sessions, transport });

    const result = await fallback.handle(makeChatMessage());

    expect(result).toEqual({ status: "failed", error: "rate limited" });
    expect(transport.sent).toEqual([
      { chatId: "-100200", text: "Sorry, I encountered an error: rate limited" },
    ]);
  });

  it("does not throw when the error notice cannot be delivered either", async () => {
    backend.queue(new Error("rate limited"));
    transport.sendMessage = vi.fn(async () => {
      throw new Error("chat not found");
    });
    const fallback = new AgentFallback({ sessions, transport });

    await expect(fallback.handle(makeChatMessage())).resolves.toEqual({
      status: "failed",
      error: "rate limited",
    });
  });

  describe("with history", () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), "relaybot-fallback-"));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it("records the user text and the reply", async () => {
      const history = new ConversationHistoryStore({ filePath: join(dir, "h.json") });
      backend.queue(["sure"]);
      const fallback = new AgentFallback({ sessions, transport, history, preamble: "Intro." });

      await fallback.handle(
        makeChatMessage({ text: "can you help", timestamp: new Date(5_000) })
      );

      const turns = history.get("-100200");
      expect(turns).toHaveLength(2);
      expect(turns[0]).toEqual({ role: "user", content: "can you help", timestamp: 5_000 });
      expect(turns[1]).toMatchObject({ role: "assistant", content: "sure" });
    });

    it("records nothing when the agent fails", async () => {
      const history = new ConversationHistoryStore({ filePath: join(dir, "h.json") });
      backend.queue(new Error("down"));
      const fallback = new AgentFallback({ sessions, transport, history });

      await fallback.handle(makeChatMessage());

      expect(history.get("-100200")).toEqual([]);
    });
  });
});

describe("withPreamble", () => {
  it("joins preamble and message", () => {
    expect(withPreamble("P", "m")).toBe("P\n\nUser's message: m");
  });
});
