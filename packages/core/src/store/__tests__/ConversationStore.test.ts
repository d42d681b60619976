import test from "node:test";
import assert from "node:assert/strict";
import { ConversationStore, InMemoryConversationPersistence } from "../ConversationStore.js";

test("ConversationStore creates unknown conversations without saving them", async () => {
  const persistence = new InMemoryConversationPersistence();
  const store = new ConversationStore(persistence);
  const conversation = await store.loadOrCreate("c1", "proj");
  assert.equal(conversation.id, "c1");
  assert.equal(conversation.projectKey, "proj");
  assert.deepEqual(persistence.ids(), []);
});

test("ConversationStore saves and reloads history", async () => {
  const store = new ConversationStore(new InMemoryConversationPersistence());
  const conversation = await store.loadOrCreate("c1");
  conversation.appendUserMessage("hello");
  await store.save(conversation);

  const reloaded = await store.loadOrCreate("c1", "late-key");
  assert.equal(reloaded.messages.length, 1);
  assert.equal(reloaded.messages[0].content, "hello");
  assert.equal(reloaded.projectKey, "late-key");
});

test("ConversationStore.markCompleted only touches idle conversations", async () => {
  const store = new ConversationStore(new InMemoryConversationPersistence());
  assert.equal(await store.markCompleted("missing"), false);

  const conversation = await store.loadOrCreate("c1");
  await store.save(conversation);
  assert.equal(await store.markCompleted("c1"), true);
  assert.equal((await store.load("c1"))?.status, "completed");
  assert.equal(await store.markCompleted("c1"), false);

  const busy = await store.loadOrCreate("c2");
  busy.markProcessing();
  await store.save(busy);
  assert.equal(await store.markCompleted("c2"), false);
});
