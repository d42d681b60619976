import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { ConversationSnapshot } from "@agentline/shared";
import { ConversationRepository } from "../repositories/conversation/ConversationRepository.js";
import { Database, integer } from "../sqlite/database.js";

const T0 = "2024-05-01T10:00:00.000Z";
const T1 = "2024-05-01T10:00:05.000Z";

const buildSnapshot = (id: string): ConversationSnapshot => ({
  id,
  projectKey: "proj",
  status: "completed",
  createdAt: T0,
  updatedAt: T1,
  messages: [
    {
      id: `${id}-m1`,
      conversationId: id,
      role: "user",
      kind: "input",
      content: "find the bug",
      parts: [],
      createdAt: T0,
      updatedAt: T0,
    },
    {
      id: `${id}-m2`,
      conversationId: id,
      role: "assistant",
      kind: "input",
      content: "",
      createdAt: T0,
      updatedAt: T1,
      parts: [
        {
          id: `${id}-p1`,
          messageId: `${id}-m2`,
          conversationId: id,
          type: "text",
          text: "looking",
          createdAt: T0,
          updatedAt: T0,
        },
        {
          id: `${id}-p2`,
          messageId: `${id}-m2`,
          conversationId: id,
          type: "tool",
          toolName: "read_file",
          state: {
            status: "completed",
            input: { relativePath: "src/main.ts" },
            output: "body",
            title: "src/main.ts",
            content: "body",
            startedAt: T0,
            endedAt: T1,
          },
          createdAt: T0,
          updatedAt: T1,
        },
      ],
    },
  ],
});

const withRepo = async (fn: (repo: ConversationRepository) => Promise<void>): Promise<void> => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "agentline-db-"));
  const repo = await ConversationRepository.create(path.join(dir, "agentline.db"));
  try {
    await fn(repo);
  } finally {
    await repo.close();
    await fs.rm(dir, { recursive: true, force: true });
  }
};

test("ConversationRepository save then load returns the same snapshot", async () => {
  await withRepo(async (repo) => {
    const snapshot = buildSnapshot("c1");
    await repo.save(snapshot);
    assert.deepEqual(await repo.load("c1"), snapshot);
  });
});

test("ConversationRepository load returns undefined for unknown ids", async () => {
  await withRepo(async (repo) => {
    assert.equal(await repo.load("missing"), undefined);
    assert.equal(await repo.exists("missing"), false);
  });
});

test("ConversationRepository save replaces earlier messages", async () => {
  await withRepo(async (repo) => {
    const snapshot = buildSnapshot("c1");
    await repo.save(snapshot);
    const shorter: ConversationSnapshot = {
      ...snapshot,
      status: "idle",
      messages: snapshot.messages.slice(0, 1),
    };
    await repo.save(shorter);
    const loaded = await repo.load("c1");
    assert.equal(loaded?.status, "idle");
    assert.equal(loaded?.messages.length, 1);
    const partCount = await repo.getDb().get(`SELECT COUNT(*) AS count FROM parts WHERE conversation_id = ?`, "c1");
    assert.equal(partCount ? integer(partCount, "count") : undefined, 0);
  });
});

test("ConversationRepository serializes concurrent saves", async () => {
  await withRepo(async (repo) => {
    await Promise.all([repo.save(buildSnapshot("a")), repo.save(buildSnapshot("b")), repo.save(buildSnapshot("c"))]);
    assert.deepEqual((await repo.listIds()).sort(), ["a", "b", "c"]);
  });
});

test("ConversationRepository delete removes the conversation and its parts", async () => {
  await withRepo(async (repo) => {
    await repo.save(buildSnapshot("c1"));
    assert.equal(await repo.delete("c1"), true);
    assert.equal(await repo.delete("c1"), false);
    assert.equal(await repo.exists("c1"), false);
    const parts = await repo.getDb().get(`SELECT COUNT(*) AS count FROM parts`);
    assert.equal(parts ? integer(parts, "count") : undefined, 0);
  });
});

test("ConversationRepository keeps saved conversations across reopening the file", async () => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "agentline-db-"));
  const dbPath = path.join(dir, "nested", "agentline.db");
  try {
    const first = await ConversationRepository.create(dbPath);
    await first.save(buildSnapshot("c1"));
    await first.close();

    const second = await ConversationRepository.create(dbPath);
    try {
      assert.deepEqual(await second.load("c1"), buildSnapshot("c1"));
      assert.equal(await second.delete("c1"), true);
      const parts = await second.getDb().get(`SELECT COUNT(*) AS count FROM parts`);
      assert.equal(parts ? integer(parts, "count") : undefined, 0);
    } finally {
      await second.close();
    }
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
});

test("Database runs statements on an in-memory file", async () => {
  const db = await Database.open(":memory:");
  try {
    await db.exec("CREATE TABLE t (id TEXT PRIMARY KEY, n INTEGER)");
    assert.deepEqual(await db.run("INSERT INTO t (id, n) VALUES (?, ?)", "a", 1), { changes: 1 });
    assert.deepEqual(await db.all("SELECT id, n FROM t"), [{ id: "a", n: 1 }]);
    assert.equal(await db.get("SELECT id FROM t WHERE id = ?", "missing"), undefined);
  } finally {
    await db.close();
  }
});
