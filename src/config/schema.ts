import { z } from "zod";
import {
  HISTORY_MAX_TURNS_PER_CHANNEL,
  MAX_MESSAGE_LENGTH,
  MESSAGE_CHUNK_SIZE,
  RESTART_EXIT_CODE,
  TELEGRAM_CONNECTION_RETRIES,
} from "../constants/limits.js";
import { HANDLER_RELOAD_CHECK_INTERVAL_MS } from "../constants/timeouts.js";

export const DEFAULT_FIRST_MESSAGE_PREAMBLE =
  "You are a chat bot in a Telegram group. Answer directly and keep replies short.";

export const TelegramConfigSchema = z.object({
  api_id: z.number().int().positive().optional(),
  api_hash: z.string().optional(),
  bot_token: z.string().optional(),
  session_path: z.string().default("./telegram_session.txt"),
  connection_retries: z.number().int().min(0).default(TELEGRAM_CONNECTION_RETRIES),
  ignore_bots: z.boolean().default(true),
});

export const AgentConfigSchema = z.object({
  provider: z.string().default("anthropic"),
  api_key: z.string().optional(),
  model: z.string().default("claude-sonnet-4-0"),
  max_tokens: z.number().int().positive().default(4096),
  temperature: z.number().min(0).max(2).optional(),
  system_prompt: z.string().optional(),
  first_message_preamble: z.string().default(DEFAULT_FIRST_MESSAGE_PREAMBLE),
});

export const HandlersConfigSchema = z.object({
  directory: z.string().default("./auto_responses"),
  reload_check_interval_ms: z.number().int().min(0).default(HANDLER_RELOAD_CHECK_INTERVAL_MS),
  timeout_ms: z.number().int().min(0).default(0),
  expose_agent: z.boolean().default(true),
});

export const StorageConfigSchema = z.object({
  history_file: z.string().default("./conversation_history.json"),
  history_max_turns: z.number().int().positive().default(HISTORY_MAX_TURNS_PER_CHANNEL),
});

export const RestartConfigSchema = z.object({
  flag_file: z.string().default("restart.flag"),
  exit_code: z.number().int().min(1).max(255).default(RESTART_EXIT_CODE),
});

export const MessagesConfigSchema = z
  .object({
    max_length: z.number().int().positive().default(MAX_MESSAGE_LENGTH),
    chunk_size: z.number().int().positive().default(MESSAGE_CHUNK_SIZE),
  })
  .refine((m) => m.chunk_size <= m.max_length, "chunk_size must not exceed max_length");

export const LoggingConfigSchema = z.object({
  level: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  pretty: z.boolean().default(false),
});

export const WebUIConfigSchema = z.object({
  enabled: z.boolean().default(false),
  host: z.string().default("127.0.0.1"),
  port: z.number().int().min(1024).max(65535).default(7777),
  auth_token: z.string().optional(),
  log_requests: z.boolean().default(false),
});

export const ConfigSchema = z.object({
  telegram: TelegramConfigSchema.default({}),
  agent: AgentConfigSchema.default({}),
  handlers: HandlersConfigSchema.default({}),
  storage: StorageConfigSchema.default({}),
  restart: RestartConfigSchema.default({}),
  messages: MessagesConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
  webui: WebUIConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type AgentConfig = z.infer<typeof AgentConfigSchema>;
export type WebUIConfig = z.infer<typeof WebUIConfigSchema>;
