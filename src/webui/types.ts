import type { HandlerRegistry } from "../handlers/registry.js";
import type { AgentSessionPool } from "../agent/sessions.js";
import type { WebUIConfig } from "../config/schema.js";

/** Connection facts the status route reports */
export interface BridgeStatus {
  isAvailable(): boolean;
  getUsername(): string | undefined;
}

export interface WebUIServerDeps {
  registry: HandlerRegistry;
  sessions: AgentSessionPool;
  bridge: BridgeStatus;
  config: WebUIConfig;
  /** Process start, epoch ms */
  startedAt: number;
}

export interface APIResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}

export interface StatusResponse {
  uptime: number;
  connected: boolean;
  botUsername: string | null;
  handlerCount: number;
  sessionCount: number;
}

export interface HandlerInfo {
  name: string;
  file: string;
}

export interface HandlerReloadResponse {
  directory: string;
  loaded: string[];
  skipped: Array<{ name: string; reason: string }>;
  errors: Array<{ name: string; error: string }>;
}
