import {
  getModel,
  stream,
  type Api,
  type AssistantMessage,
  type Context,
  type Model,
} from "@mariozechner/pi-ai";
import type { AgentConfig } from "../config/schema.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("LLM");

const modelCache = new Map<string, Model<Api>>();

function getProviderModel(provider: string, modelId: string): Model<Api> {
  const cacheKey = `${provider}:${modelId}`;
  const cached = modelCache.get(cacheKey);
  if (cached) return cached;

  // getModel takes literal provider/model types; config values are plain strings
  const model: Model<Api> | undefined = getModel(provider as never, modelId as never);
  if (!model) {
    throw new Error(`Unknown model ${modelId} for provider ${provider}`);
  }
  modelCache.set(cacheKey, model);
  return model;
}

export type ReplyEvent =
  | { type: "text"; delta: string }
  | { type: "done"; message: AssistantMessage };

/** Streaming LLM access used by agent sessions */
export interface AgentBackend {
  readonly model: Model<Api>;
  streamReply(context: Context): AsyncIterable<ReplyEvent>;
}

export interface PiAiBackendOptions {
  provider: string;
  model: string;
  apiKey: string;
  maxTokens: number;
  temperature?: number;
}

export function backendOptionsFromConfig(config: AgentConfig, apiKey: string): PiAiBackendOptions {
  return {
    provider: config.provider,
    model: config.model,
    apiKey,
    maxTokens: config.max_tokens,
    temperature: config.temperature,
  };
}

export class PiAiBackend implements AgentBackend {
  readonly model: Model<Api>;

  constructor(private options: PiAiBackendOptions) {
    this.model = getProviderModel(options.provider, options.model);
  }

  async *streamReply(context: Context): AsyncIterable<ReplyEvent> {
    const events = stream(this.model, context, {
      apiKey: this.options.apiKey,
      maxTokens: this.options.maxTokens,
      temperature: this.options.temperature,
    });

    for await (const event of events) {
      if (event.type === "text_delta") {
        yield { type: "text", delta: event.delta };
      } else if (event.type === "done") {
        yield { type: "done", message: event.message };
      } else if (event.type === "error") {
        const reason = event.error.errorMessage ?? `request ${event.reason}`;
        log.error(`${this.model.provider}/${this.model.id} stream failed: ${reason}`);
        throw new Error(reason);
      }
    }
  }
}
