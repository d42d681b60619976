import { constants } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { errorMessage } from "@agentline/core";
import { loadConfig } from "../config/ConfigLoader.js";
import type { ConfigSource, ServerConfig } from "../config/ServerConfig.js";

export interface DoctorCheck {
  name: string;
  ok: boolean;
  detail: string;
}

export interface DoctorOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  configPath?: string;
  cli?: ConfigSource;
}

export const DOCTOR_USAGE = "Usage: agentline doctor [--config <file>] [--db <path>]";

/** Walks up to the first directory that exists and reports whether it is writable. */
const writableTarget = async (target: string): Promise<boolean> => {
  let current = path.resolve(target);
  for (;;) {
    try {
      const stats = await fs.stat(current);
      if (!stats.isDirectory()) return false;
      await fs.access(current, constants.W_OK);
      return true;
    } catch (error) {
      const parent = path.dirname(current);
      if (parent === current || !(error instanceof Error && "code" in error && error.code === "ENOENT")) {
        return false;
      }
      current = parent;
    }
  }
};

const storageCheck = async (config: ServerConfig): Promise<DoctorCheck> => {
  const { dbPath } = config.storage;
  if (dbPath === ":memory:") {
    return { name: "storage", ok: true, detail: "in-memory database, nothing is kept across restarts" };
  }
  const ok = await writableTarget(path.dirname(dbPath));
  return { name: "storage", ok, detail: ok ? dbPath : `cannot write ${path.dirname(dbPath)}` };
};

const providerCheck = (config: ServerConfig): DoctorCheck => {
  const { provider } = config;
  if (!provider.model) {
    return { name: "provider", ok: false, detail: "provider.model is not set (AGENTLINE_MODEL)" };
  }
  const key = provider.apiKey ? "api key set" : "no api key";
  return { name: "provider", ok: true, detail: `${provider.name} ${provider.model} at ${provider.baseUrl ?? "?"} (${key})` };
};

const loggingCheck = async (config: ServerConfig): Promise<DoctorCheck> => {
  const { directory } = config.logging;
  const ok = await writableTarget(directory);
  return { name: "logs", ok, detail: ok ? directory : `cannot write ${directory}` };
};

export const runDoctorChecks = async (options: DoctorOptions = {}): Promise<DoctorCheck[]> => {
  let config: ServerConfig;
  try {
    config = await loadConfig({ cwd: options.cwd, env: options.env, configPath: options.configPath, cli: options.cli });
  } catch (error) {
    return [{ name: "config", ok: false, detail: errorMessage(error) }];
  }
  return [
    { name: "config", ok: true, detail: `listening on ${config.host}:${config.port}` },
    await storageCheck(config),
    providerCheck(config),
    await loggingCheck(config),
  ];
};

export const formatDoctorReport = (checks: DoctorCheck[]): string =>
  [
    "agentline doctor",
    `Node: ${process.version}`,
    ...checks.map((check) => `[${check.ok ? "ok" : "fail"}] ${check.name}: ${check.detail}`),
  ].join("\n");

export class DoctorCommand {
  /** Prints the report and resolves false when any check failed. */
  static async run(argv: string[]): Promise<boolean> {
    const options: DoctorOptions = {};
    for (let i = 0; i < argv.length; i += 1) {
      const arg = argv[i];
      const next = argv[i + 1];
      if (arg === "--config" && next) {
        options.configPath = next;
        i += 1;
        continue;
      }
      if (arg === "--db" && next) {
        options.cli = { storage: { dbPath: next } };
        i += 1;
        continue;
      }
      throw new Error(`Unknown option: ${arg}\n${DOCTOR_USAGE}`);
    }
    const checks = await runDoctorChecks(options);
    // eslint-disable-next-line no-console
    console.log(formatDoctorReport(checks));
    return checks.every((check) => check.ok);
  }
}
