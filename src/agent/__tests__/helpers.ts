import type { AssistantMessage, Context, Model } from "@mariozechner/pi-ai";
import type { AgentBackend, ReplyEvent } from "../client.js";

export const TEST_MODEL: Model<"openai-completions"> = {
  id: "test-model",
  name: "Test Model",
  api: "openai-completions",
  provider: "test",
  baseUrl: "http://localhost:0/v1",
  reasoning: false,
  input: ["text"],
  cost: { input: 0, output: 0, cacheRead: 0, cacheWrite: 0 },
  contextWindow: 8192,
  maxTokens: 1024,
};

function assistantMessage(text: string): AssistantMessage {
  return {
    role: "assistant",
    content: [{ type: "text", text }],
    api: TEST_MODEL.api,
    provider: TEST_MODEL.provider,
    model: TEST_MODEL.id,
    usage: {
      input: 0,
      output: 0,
      cacheRead: 0,
      cacheWrite: 0,
      totalTokens: 0,
      cost: { input: 0, output: 0, cacheRead: 0, cacheWrite: 0, total: 0 },
    },
    stopReason: "stop",
    timestamp: 0,
  };
}

export type ScriptedReply = string[] | Error;

/**
 * Backend that streams scripted replies in order and records every context
 * it was asked with.
 */
export class FakeBackend implements AgentBackend {
  readonly model = TEST_MODEL;
  readonly contexts: Context[] = [];

  constructor(private replies: ScriptedReply[] = []) {}

  queue(reply: ScriptedReply): void {
    this.replies.push(reply);
  }

  async *streamReply(context: Context): AsyncIterable<ReplyEvent> {
    this.contexts.push({ ...context, messages: [...context.messages] });
    const reply = this.replies.shift() ?? [];
    if (reply instanceof Error) throw reply;
    for (const delta of reply) {
      yield { type: "text", delta };
    }
    yield { type: "done", message: assistantMessage(reply.join("")) };
  }
}
