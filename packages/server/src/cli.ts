#!/usr/bin/env node
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { DoctorCommand } from "./cli/DoctorCommand.js";
import { ServeCommand } from "./cli/ServeCommand.js";

const HELP_TEXT =
  "Usage: agentline serve [--host <host>] [--port <port>] [--config <file>] [--db <path>]\n" +
  "\n" +
  "Commands:\n" +
  "  serve    Accept IDE connections and run conversation rounds.\n" +
  "  doctor   Check config, storage, provider and log settings.\n" +
  "\n" +
  "Options:\n" +
  "  --help, -h     Show help\n" +
  "  --version, -v  Show version\n";

const resolveReal = (value: string): string => {
  try {
    return fs.realpathSync(value);
  } catch {
    return path.resolve(value);
  }
};

const packageRoot = (): string => path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..");

const readVersion = (): string => {
  const pkgJson = path.join(packageRoot(), "package.json");
  if (!fs.existsSync(pkgJson)) return "dev";
  const parsed: unknown = JSON.parse(fs.readFileSync(pkgJson, "utf8"));
  if (typeof parsed === "object" && parsed !== null && "version" in parsed && typeof parsed.version === "string") {
    return parsed.version;
  }
  return "dev";
};

export const runCli = async (argv: string[] = process.argv.slice(2)): Promise<void> => {
  if (argv.includes("--help") || argv.includes("-h") || argv.length === 0) {
    // eslint-disable-next-line no-console
    console.log(HELP_TEXT);
    return;
  }

  const [command, ...rest] = argv;
  if (command === "--version" || command === "-v" || command === "version") {
    // eslint-disable-next-line no-console
    console.log(readVersion());
    return;
  }

  if (command === "doctor") {
    if (!(await DoctorCommand.run(rest))) {
      process.exitCode = 1;
    }
    return;
  }

  if (command === "serve") {
    await ServeCommand.run(rest);
    return;
  }

  throw new Error(HELP_TEXT);
};

const isMain = (() => {
  const scriptPath = process.argv[1];
  if (!scriptPath) return false;
  const current = fileURLToPath(import.meta.url);
  return resolveReal(scriptPath) === resolveReal(current);
})();

if (isMain) {
  runCli().catch((error) => {
    // eslint-disable-next-line no-console
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
}
