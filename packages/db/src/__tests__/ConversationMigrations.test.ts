import test from "node:test";
import assert from "node:assert/strict";
import { ConversationMigrations } from "../migrations/conversation/ConversationMigrations.js";
import { Database, text } from "../sqlite/database.js";

const openDb = (): Promise<Database> => Database.open(":memory:");

const columnNames = async (db: Database, table: string): Promise<string[]> => {
  const rows = await db.all(`PRAGMA table_info(${table})`);
  return rows.map((row) => text(row, "name"));
};

test("ConversationMigrations creates conversation, message and part tables", async () => {
  const db = await openDb();
  try {
    await ConversationMigrations.run(db);
    assert.deepEqual(await columnNames(db, "conversations"), [
      "id",
      "project_key",
      "status",
      "created_at",
      "updated_at",
    ]);
    assert.deepEqual(await columnNames(db, "messages"), [
      "id",
      "conversation_id",
      "position",
      "role",
      "kind",
      "content",
      "created_at",
      "updated_at",
    ]);
    assert.deepEqual(await columnNames(db, "parts"), [
      "id",
      "message_id",
      "conversation_id",
      "position",
      "type",
      "data_json",
      "created_at",
      "updated_at",
    ]);
  } finally {
    await db.close();
  }
});

test("ConversationMigrations can run twice", async () => {
  const db = await openDb();
  try {
    await ConversationMigrations.run(db);
    await ConversationMigrations.run(db);
    const tables = await db.all(`SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name`);
    assert.deepEqual(
      tables.map((row) => text(row, "name")),
      ["conversations", "messages", "parts"],
    );
  } finally {
    await db.close();
  }
});
