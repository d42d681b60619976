import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { isLogLevel } from "@agentline/core";
import {
  defaultServerConfig,
  type ConfigSource,
  type LoggingConfig,
  type PoolConfig,
  type ProviderSettings,
  type ServerConfig,
  type SessionConfig,
  type ToolsConfig,
} from "./ServerConfig.js";

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  cli?: ConfigSource;
  configPath?: string;
  /** Require a provider model, needed when the default reasoning loop is used. */
  requireProvider?: boolean;
}

export const CONFIG_FILE_NAMES = ["agentline.config.json", "agentline.config.yaml", "agentline.config.yml"];

const parseNumberStrict = (value: string | undefined, label: string): number | undefined => {
  if (!value) return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Invalid ${label}: expected number.`);
  }
  return parsed;
};

const parseBooleanStrict = (value: string | undefined, label: string): boolean | undefined => {
  if (!value) return undefined;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  throw new Error(`Invalid ${label}: expected boolean.`);
};

const parseList = (value: string | undefined): string[] | undefined => {
  if (!value) return undefined;
  const items = value
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean);
  return items.length ? items : undefined;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/** Drops undefined entries so spreads never overwrite a lower layer with nothing. */
const compact = <T extends object>(value: T): Partial<T> => {
  const result: Partial<T> = {};
  for (const key in value) {
    if (value[key] !== undefined) result[key] = value[key];
  }
  return result;
};

/**
 * Reads a parsed config file field by field. Values of the wrong type are
 * collected as errors instead of being passed through.
 */
class SourceReader {
  readonly errors: string[] = [];

  section(record: Record<string, unknown>, key: string): Record<string, unknown> | undefined {
    const value = record[key];
    if (value === undefined || value === null) return undefined;
    if (!isRecord(value)) {
      this.errors.push(key);
      return undefined;
    }
    return value;
  }

  string(record: Record<string, unknown>, key: string, label: string): string | undefined {
    const value = record[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== "string") {
      this.errors.push(label);
      return undefined;
    }
    return value;
  }

  number(record: Record<string, unknown>, key: string, label: string): number | undefined {
    const value = record[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== "number" || !Number.isFinite(value)) {
      this.errors.push(label);
      return undefined;
    }
    return value;
  }

  boolean(record: Record<string, unknown>, key: string, label: string): boolean | undefined {
    const value = record[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== "boolean") {
      this.errors.push(label);
      return undefined;
    }
    return value;
  }

  list(record: Record<string, unknown>, key: string, label: string): string[] | undefined {
    const value = record[key];
    if (value === undefined || value === null) return undefined;
    if (!Array.isArray(value) || !value.every((entry): entry is string => typeof entry === "string")) {
      this.errors.push(label);
      return undefined;
    }
    return value;
  }
}

export const normalizeConfigSource = (value: unknown, origin: string): ConfigSource => {
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) {
    throw new Error(`Invalid config file ${origin}: expected an object.`);
  }
  const reader = new SourceReader();
  const source: ConfigSource = compact({
    host: reader.string(value, "host", "host"),
    port: reader.number(value, "port", "port"),
    systemPrompt: reader.string(value, "systemPrompt", "systemPrompt"),
  });

  const pool = reader.section(value, "pool");
  if (pool) {
    source.pool = compact({
      maxConcurrentRounds: reader.number(pool, "maxConcurrentRounds", "pool.maxConcurrentRounds"),
      queueCapacity: reader.number(pool, "queueCapacity", "pool.queueCapacity"),
    });
  }
  const tools = reader.section(value, "tools");
  if (tools) {
    source.tools = compact({
      timeoutMs: reader.number(tools, "timeoutMs", "tools.timeoutMs"),
      forwarded: reader.list(tools, "forwarded", "tools.forwarded"),
    });
  }
  const session = reader.section(value, "session");
  if (session) {
    source.session = compact({
      closeConnectionAfterRound: reader.boolean(
        session,
        "closeConnectionAfterRound",
        "session.closeConnectionAfterRound",
      ),
      heartbeatIntervalMs: reader.number(session, "heartbeatIntervalMs", "session.heartbeatIntervalMs"),
    });
  }
  const storage = reader.section(value, "storage");
  if (storage) {
    source.storage = compact({ dbPath: reader.string(storage, "dbPath", "storage.dbPath") });
  }
  const provider = reader.section(value, "provider");
  if (provider) {
    source.provider = compact({
      name: reader.string(provider, "name", "provider.name"),
      model: reader.string(provider, "model", "provider.model"),
      apiKey: reader.string(provider, "apiKey", "provider.apiKey"),
      baseUrl: reader.string(provider, "baseUrl", "provider.baseUrl"),
      timeoutMs: reader.number(provider, "timeoutMs", "provider.timeoutMs"),
    });
  }
  const limits = reader.section(value, "limits");
  if (limits) {
    source.limits = compact({ maxSteps: reader.number(limits, "maxSteps", "limits.maxSteps") });
  }
  const shutdown = reader.section(value, "shutdown");
  if (shutdown) {
    source.shutdown = compact({
      drainTimeoutMs: reader.number(shutdown, "drainTimeoutMs", "shutdown.drainTimeoutMs"),
    });
  }
  const logging = reader.section(value, "logging");
  if (logging) {
    const level = reader.string(logging, "level", "logging.level");
    if (level !== undefined && !isLogLevel(level)) reader.errors.push("logging.level");
    source.logging = compact({
      directory: reader.string(logging, "directory", "logging.directory"),
      level: isLogLevel(level) ? level : undefined,
      console: reader.boolean(logging, "console", "logging.console"),
    });
  }

  if (reader.errors.length) {
    throw new Error(`Invalid config values in ${origin}: ${reader.errors.join(", ")}`);
  }
  return source;
};

export const resolveConfigPath = (cwd: string, configPath?: string): string | undefined => {
  if (configPath) return path.resolve(cwd, configPath);
  for (const name of CONFIG_FILE_NAMES) {
    const candidatePath = path.join(cwd, name);
    if (existsSync(candidatePath)) {
      return candidatePath;
    }
  }
  return undefined;
};

const readConfigFile = async (configPath?: string): Promise<ConfigSource | undefined> => {
  if (!configPath) return undefined;
  if (!existsSync(configPath)) return undefined;
  const content = await readFile(configPath, "utf8");
  if (!content.trim()) return undefined;
  const extension = path.extname(configPath).toLowerCase();
  const parsed: unknown = extension === ".yaml" || extension === ".yml" ? parseYaml(content) : JSON.parse(content);
  return normalizeConfigSource(parsed, configPath);
};

const loadEnvConfig = (env: NodeJS.ProcessEnv): ConfigSource => {
  const level = env.AGENTLINE_LOG_LEVEL?.trim().toLowerCase();
  if (level && !isLogLevel(level)) {
    throw new Error("Invalid AGENTLINE_LOG_LEVEL: expected debug, info, warn or error.");
  }

  const pool: Partial<PoolConfig> = compact({
    maxConcurrentRounds: parseNumberStrict(env.AGENTLINE_POOL_MAX_CONCURRENT, "AGENTLINE_POOL_MAX_CONCURRENT"),
    queueCapacity: parseNumberStrict(env.AGENTLINE_POOL_QUEUE_CAPACITY, "AGENTLINE_POOL_QUEUE_CAPACITY"),
  });
  const tools: Partial<ToolsConfig> = compact({
    timeoutMs: parseNumberStrict(env.AGENTLINE_TOOL_TIMEOUT_MS, "AGENTLINE_TOOL_TIMEOUT_MS"),
    forwarded: parseList(env.AGENTLINE_FORWARDED_TOOLS),
  });
  const session: Partial<SessionConfig> = compact({
    closeConnectionAfterRound: parseBooleanStrict(env.AGENTLINE_CLOSE_AFTER_ROUND, "AGENTLINE_CLOSE_AFTER_ROUND"),
    heartbeatIntervalMs: parseNumberStrict(env.AGENTLINE_HEARTBEAT_MS, "AGENTLINE_HEARTBEAT_MS"),
  });
  const provider: Partial<ProviderSettings> = compact({
    name: env.AGENTLINE_PROVIDER || undefined,
    model: env.AGENTLINE_MODEL || undefined,
    apiKey: env.AGENTLINE_API_KEY || undefined,
    baseUrl: env.AGENTLINE_BASE_URL || undefined,
    timeoutMs: parseNumberStrict(env.AGENTLINE_PROVIDER_TIMEOUT_MS, "AGENTLINE_PROVIDER_TIMEOUT_MS"),
  });
  const logging: Partial<LoggingConfig> = compact({
    directory: env.AGENTLINE_LOG_DIR || undefined,
    level: isLogLevel(level) ? level : undefined,
    console: parseBooleanStrict(env.AGENTLINE_LOG_CONSOLE, "AGENTLINE_LOG_CONSOLE"),
  });
  const maxSteps = parseNumberStrict(env.AGENTLINE_MAX_STEPS, "AGENTLINE_MAX_STEPS");
  const drainTimeoutMs = parseNumberStrict(env.AGENTLINE_DRAIN_TIMEOUT_MS, "AGENTLINE_DRAIN_TIMEOUT_MS");

  const config: ConfigSource = compact({
    host: env.AGENTLINE_HOST || undefined,
    port: parseNumberStrict(env.AGENTLINE_PORT, "AGENTLINE_PORT"),
    systemPrompt: env.AGENTLINE_SYSTEM_PROMPT || undefined,
  });
  if (Object.keys(pool).length) config.pool = pool;
  if (Object.keys(tools).length) config.tools = tools;
  if (Object.keys(session).length) config.session = session;
  if (env.AGENTLINE_DB_PATH) config.storage = { dbPath: env.AGENTLINE_DB_PATH };
  if (Object.keys(provider).length) config.provider = provider;
  if (maxSteps !== undefined) config.limits = { maxSteps };
  if (drainTimeoutMs !== undefined) config.shutdown = { drainTimeoutMs };
  if (Object.keys(logging).length) config.logging = logging;
  return config;
};

const mergeConfigs = (
  defaults: ServerConfig,
  fileConfig?: ConfigSource,
  envConfig?: ConfigSource,
  cliConfig?: ConfigSource,
): ServerConfig => {
  const pool = {
    ...defaults.pool,
    ...fileConfig?.pool,
    ...envConfig?.pool,
    ...cliConfig?.pool,
  };
  const tools = {
    ...defaults.tools,
    ...fileConfig?.tools,
    ...envConfig?.tools,
    ...cliConfig?.tools,
  };
  const session = {
    ...defaults.session,
    ...fileConfig?.session,
    ...envConfig?.session,
    ...cliConfig?.session,
  };
  const storage = {
    ...defaults.storage,
    ...fileConfig?.storage,
    ...envConfig?.storage,
    ...cliConfig?.storage,
  };
  const provider = {
    ...defaults.provider,
    ...fileConfig?.provider,
    ...envConfig?.provider,
    ...cliConfig?.provider,
  };
  const limits = {
    ...defaults.limits,
    ...fileConfig?.limits,
    ...envConfig?.limits,
    ...cliConfig?.limits,
  };
  const shutdown = {
    ...defaults.shutdown,
    ...fileConfig?.shutdown,
    ...envConfig?.shutdown,
    ...cliConfig?.shutdown,
  };
  const logging = {
    ...defaults.logging,
    ...fileConfig?.logging,
    ...envConfig?.logging,
    ...cliConfig?.logging,
  };
  return {
    ...defaults,
    ...fileConfig,
    ...envConfig,
    ...cliConfig,
    pool,
    tools,
    session,
    storage,
    provider,
    limits,
    shutdown,
    logging,
  };
};

const finalizeConfig = (cwd: string, config: ServerConfig): ServerConfig => ({
  ...config,
  storage: {
    ...config.storage,
    dbPath: config.storage.dbPath === ":memory:" ? config.storage.dbPath : path.resolve(cwd, config.storage.dbPath),
  },
  logging: {
    ...config.logging,
    directory: path.resolve(cwd, config.logging.directory),
  },
});

const assertRequired = (config: ServerConfig, requireProvider: boolean): void => {
  const missing: string[] = [];
  if (!config.host) missing.push("host");
  if (!config.storage.dbPath) missing.push("storage.dbPath");
  if (requireProvider && !config.provider.model) missing.push("provider.model");
  if (requireProvider && !config.provider.baseUrl) missing.push("provider.baseUrl");
  if (missing.length) {
    throw new Error(`Missing required config: ${missing.join(", ")}`);
  }
};

const assertValid = (config: ServerConfig): void => {
  const errors: string[] = [];
  if (!Number.isInteger(config.port) || config.port < 0 || config.port > 65_535) errors.push("port");
  if (!Number.isInteger(config.pool.maxConcurrentRounds) || config.pool.maxConcurrentRounds < 1) {
    errors.push("pool.maxConcurrentRounds");
  }
  if (!Number.isInteger(config.pool.queueCapacity) || config.pool.queueCapacity < 0) {
    errors.push("pool.queueCapacity");
  }
  if (config.tools.timeoutMs <= 0) errors.push("tools.timeoutMs");
  if (config.session.heartbeatIntervalMs < 0) errors.push("session.heartbeatIntervalMs");
  if (!Number.isInteger(config.limits.maxSteps) || config.limits.maxSteps < 1) errors.push("limits.maxSteps");
  if (config.shutdown.drainTimeoutMs < 0) errors.push("shutdown.drainTimeoutMs");
  if (config.provider.timeoutMs !== undefined && config.provider.timeoutMs <= 0) {
    errors.push("provider.timeoutMs");
  }
  if (errors.length) {
    throw new Error(`Invalid config values: ${errors.join(", ")}`);
  }
};

/** Layers defaults, the config file, `AGENTLINE_*` env vars and CLI flags, in that order. */
export const loadConfig = async (options: LoadConfigOptions = {}): Promise<ServerConfig> => {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const configPath = resolveConfigPath(cwd, options.configPath);
  if (options.configPath && configPath && !existsSync(configPath)) {
    throw new Error(`Config file not found: ${configPath}`);
  }
  const fileConfig = await readConfigFile(configPath);
  const envConfig = loadEnvConfig(env);
  const merged = mergeConfigs(defaultServerConfig(cwd), fileConfig, envConfig, options.cli);
  const finalized = finalizeConfig(cwd, merged);
  assertRequired(finalized, options.requireProvider ?? false);
  assertValid(finalized);
  return finalized;
};
