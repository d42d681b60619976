import { DEFAULT_FORWARDED_TOOLS, DEFAULT_TOOL_TIMEOUT_MS, type LogLevel } from "@agentline/core";
import { PathHelper } from "@agentline/shared";

export interface PoolConfig {
  maxConcurrentRounds: number;
  queueCapacity: number;
}

export interface ToolsConfig {
  timeoutMs: number;
  forwarded: string[];
}

export interface SessionConfig {
  closeConnectionAfterRound: boolean;
  heartbeatIntervalMs: number;
}

export interface StorageConfig {
  dbPath: string;
}

export interface ProviderSettings {
  name: string;
  model?: string;
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
}

export interface LimitsConfig {
  maxSteps: number;
}

export interface ShutdownConfig {
  drainTimeoutMs: number;
}

export interface LoggingConfig {
  directory: string;
  level: LogLevel;
  console: boolean;
}

export interface ServerConfig {
  host: string;
  port: number;
  pool: PoolConfig;
  tools: ToolsConfig;
  session: SessionConfig;
  storage: StorageConfig;
  provider: ProviderSettings;
  limits: LimitsConfig;
  shutdown: ShutdownConfig;
  logging: LoggingConfig;
  systemPrompt?: string;
}

/** A config source before merging: every section is optional and partial. */
export type ConfigSource = Partial<
  Omit<ServerConfig, "pool" | "tools" | "session" | "storage" | "provider" | "limits" | "shutdown" | "logging">
> & {
  pool?: Partial<PoolConfig>;
  tools?: Partial<ToolsConfig>;
  session?: Partial<SessionConfig>;
  storage?: Partial<StorageConfig>;
  provider?: Partial<ProviderSettings>;
  limits?: Partial<LimitsConfig>;
  shutdown?: Partial<ShutdownConfig>;
  logging?: Partial<LoggingConfig>;
};

export const DEFAULT_SYSTEM_PROMPT =
  "You are a code analysis assistant working inside the user's IDE. " +
  "Use the available tools to read and search the project before answering.";

export const defaultServerConfig = (cwd: string = process.cwd()): ServerConfig => ({
  host: "127.0.0.1",
  port: 8089,
  pool: {
    maxConcurrentRounds: 32,
    queueCapacity: 0,
  },
  tools: {
    timeoutMs: DEFAULT_TOOL_TIMEOUT_MS,
    forwarded: [...DEFAULT_FORWARDED_TOOLS],
  },
  session: {
    closeConnectionAfterRound: true,
    heartbeatIntervalMs: 0,
  },
  storage: {
    dbPath: PathHelper.getGlobalDbPath(),
  },
  provider: {
    name: "openai-compatible",
    baseUrl: "https://api.openai.com/v1",
    timeoutMs: 120_000,
  },
  limits: {
    maxSteps: 25,
  },
  shutdown: {
    drainTimeoutMs: 30_000,
  },
  logging: {
    directory: PathHelper.getWorkspaceLogDir(cwd),
    level: "info",
    console: true,
  },
  systemPrompt: DEFAULT_SYSTEM_PROMPT,
});
