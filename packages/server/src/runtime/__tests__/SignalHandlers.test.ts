import test from "node:test";
import assert from "node:assert/strict";
import { registerShutdownSignals } from "../SignalHandlers.js";

test("registerShutdownSignals runs the handler once per process", { concurrency: false }, async () => {
  const seen: NodeJS.Signals[] = [];
  let finish: () => void = () => undefined;
  const done = new Promise<void>((resolve) => {
    finish = resolve;
  });
  const dispose = registerShutdownSignals({
    signals: ["SIGUSR2"],
    exitOnSignal: false,
    onSignal: async (signal) => {
      seen.push(signal);
      finish();
    },
  });
  try {
    process.emit("SIGUSR2", "SIGUSR2");
    await done;
    assert.deepEqual(seen, ["SIGUSR2"]);
    assert.equal(process.listenerCount("SIGUSR2"), 0);
  } finally {
    dispose();
  }
});

test("registerShutdownSignals reports handler failures", { concurrency: false }, async () => {
  let reported: unknown;
  let finish: () => void = () => undefined;
  const done = new Promise<void>((resolve) => {
    finish = resolve;
  });
  const dispose = registerShutdownSignals({
    signals: ["SIGUSR2"],
    exitOnSignal: false,
    onSignal: async () => {
      throw new Error("close failed");
    },
    onError: (error) => {
      reported = error;
      finish();
    },
  });
  try {
    process.emit("SIGUSR2", "SIGUSR2");
    await done;
    assert.ok(reported instanceof Error);
    assert.equal(reported.message, "close failed");
  } finally {
    dispose();
  }
});

test("registerShutdownSignals disposer removes listeners", () => {
  const before = process.listenerCount("SIGUSR2");
  const dispose = registerShutdownSignals({ signals: ["SIGUSR2"], exitOnSignal: false, onSignal: async () => undefined });
  assert.equal(process.listenerCount("SIGUSR2"), before + 1);
  dispose();
  assert.equal(process.listenerCount("SIGUSR2"), before);
});
