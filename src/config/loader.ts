import { readFileSync, existsSync } from "fs";
import { parse } from "yaml";
import { homedir } from "os";
import { join, resolve } from "path";
import { ConfigSchema, type Config } from "./schema.js";
import { createLogger } from "../utils/logger.js";
import { getErrorMessage } from "../utils/errors.js";

const log = createLogger("Config");

const DEFAULT_CONFIG_PATH = "./config.yaml";

/** Invalid or incomplete startup configuration (fatal) */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function expandPath(path: string): string {
  if (path.startsWith("~")) {
    return join(homedir(), path.slice(1));
  }
  return resolve(path);
}

export function loadConfig(configPath: string = DEFAULT_CONFIG_PATH): Config {
  const fullPath = expandPath(configPath);

  if (!existsSync(fullPath)) {
    throw new ConfigError(
      `Config file not found: ${fullPath}\nCopy config.example.yaml to config.yaml and fill it in.`
    );
  }

  let content: string;
  try {
    content = readFileSync(fullPath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${fullPath}: ${getErrorMessage(error)}`);
  }

  let raw: unknown;
  try {
    raw = parse(content);
  } catch (error) {
    throw new ConfigError(`Invalid YAML in ${fullPath}: ${getErrorMessage(error)}`);
  }

  // An empty file parses to null; every section has defaults
  const result = ConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(`Invalid config: ${result.error.message}`);
  }

  return applyEnvOverrides(result.data);
}

export function applyEnvOverrides(config: Config, env: NodeJS.ProcessEnv = process.env): Config {
  if (env.RELAYBOT_BOT_TOKEN) {
    config.telegram.bot_token = env.RELAYBOT_BOT_TOKEN;
  }
  if (env.RELAYBOT_TG_API_ID) {
    const apiId = parseInt(env.RELAYBOT_TG_API_ID, 10);
    if (isNaN(apiId)) {
      throw new ConfigError(
        `Invalid RELAYBOT_TG_API_ID environment variable: "${env.RELAYBOT_TG_API_ID}" is not a valid integer`
      );
    }
    config.telegram.api_id = apiId;
  }
  if (env.RELAYBOT_TG_API_HASH) {
    config.telegram.api_hash = env.RELAYBOT_TG_API_HASH;
  }
  if (env.RELAYBOT_API_KEY) {
    config.agent.api_key = env.RELAYBOT_API_KEY;
  }

  if (env.RELAYBOT_WEBUI_ENABLED) {
    config.webui.enabled = env.RELAYBOT_WEBUI_ENABLED === "true";
  }
  if (env.RELAYBOT_WEBUI_PORT) {
    const port = parseInt(env.RELAYBOT_WEBUI_PORT, 10);
    if (!isNaN(port) && port >= 1024 && port <= 65535) {
      config.webui.port = port;
    } else {
      log.warn(`Ignoring invalid RELAYBOT_WEBUI_PORT "${env.RELAYBOT_WEBUI_PORT}"`);
    }
  }

  const level = env.RELAYBOT_LOG_LEVEL;
  if (level) {
    const parsed = ConfigSchema.shape.logging.safeParse({ ...config.logging, level });
    if (parsed.success) {
      config.logging = parsed.data;
    } else {
      log.warn(`Ignoring invalid RELAYBOT_LOG_LEVEL "${level}"`);
    }
  }

  return config;
}

export interface StartupCredentials {
  apiId: number;
  apiHash: string;
  botToken: string;
  apiKey: string;
}

/**
 * Credentials without which the bridge cannot run. Checked once, before the
 * Telegram client connects.
 */
export function requireStartupCredentials(config: Config): StartupCredentials {
  const missing: string[] = [];
  if (!config.telegram.bot_token) missing.push("telegram.bot_token (or RELAYBOT_BOT_TOKEN)");
  if (!config.telegram.api_id) missing.push("telegram.api_id (or RELAYBOT_TG_API_ID)");
  if (!config.telegram.api_hash) missing.push("telegram.api_hash (or RELAYBOT_TG_API_HASH)");
  if (!config.agent.api_key) missing.push("agent.api_key (or RELAYBOT_API_KEY)");

  const { bot_token, api_id, api_hash } = config.telegram;
  const { api_key } = config.agent;
  if (!bot_token || !api_id || !api_hash || !api_key) {
    throw new ConfigError(`Missing required configuration:\n  - ${missing.join("\n  - ")}`);
  }

  return { apiId: api_id, apiHash: api_hash, botToken: bot_token, apiKey: api_key };
}

export function configExists(configPath: string = DEFAULT_CONFIG_PATH): boolean {
  return existsSync(expandPath(configPath));
}

export function getDefaultConfigPath(): string {
  return DEFAULT_CONFIG_PATH;
}
