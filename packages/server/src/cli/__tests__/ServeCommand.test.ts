import test from "node:test";
import assert from "node:assert/strict";
import { parseServeArgs } from "../ServeCommand.js";

test("parseServeArgs maps flags onto config overrides", () => {
  const parsed = parseServeArgs([
    "--host",
    "0.0.0.0",
    "--port",
    "9001",
    "--config",
    "conf/agentline.yaml",
    "--db",
    "/tmp/agentline-test.db",
    "--log-level",
    "debug",
    "--quiet",
  ]);
  assert.deepEqual(parsed, {
    configPath: "conf/agentline.yaml",
    cli: {
      host: "0.0.0.0",
      port: 9001,
      storage: { dbPath: "/tmp/agentline-test.db" },
      logging: { level: "debug", console: false },
    },
  });
});

test("parseServeArgs rejects bad values and unknown flags", () => {
  assert.throws(() => parseServeArgs(["--port", "http"]), { message: "Invalid --port: http" });
  assert.throws(() => parseServeArgs(["--log-level", "loud"]), { message: "Invalid --log-level: loud" });
  assert.throws(() => parseServeArgs(["--verbose"]), /Unknown option: --verbose/);
});

test("parseServeArgs returns empty overrides without flags", () => {
  assert.deepEqual(parseServeArgs([]), { cli: {} });
});
