import { randomUUID } from "node:crypto";
import type {
  ConversationSnapshot,
  ConversationStatus,
  MessageKind,
  MessageRecord,
  Part,
} from "@agentline/shared";
import { IllegalToolTransitionError, PartOwnershipError } from "../errors/SessionErrors.js";
import { nowIso } from "./Parts.js";

const assertToolTransition = (stored: Part, incoming: Part): void => {
  if (stored.type !== "tool") return;
  const from = stored.state.status;
  if (from !== "completed" && from !== "error") return;
  const to = incoming.type === "tool" ? incoming.state.status : incoming.type;
  if (to !== from) {
    throw new IllegalToolTransitionError(stored.id, from, to);
  }
};

export class Conversation {
  private data: ConversationSnapshot;

  private constructor(data: ConversationSnapshot) {
    this.data = data;
  }

  static create(id: string, projectKey?: string): Conversation {
    const timestamp = nowIso();
    const data: ConversationSnapshot = {
      id,
      status: "idle",
      messages: [],
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    if (projectKey) data.projectKey = projectKey;
    return new Conversation(data);
  }

  static fromSnapshot(snapshot: ConversationSnapshot): Conversation {
    return new Conversation(structuredClone(snapshot));
  }

  get id(): string {
    return this.data.id;
  }

  get projectKey(): string | undefined {
    return this.data.projectKey;
  }

  set projectKey(value: string | undefined) {
    if (value) this.data.projectKey = value;
  }

  get status(): ConversationStatus {
    return this.data.status;
  }

  get messages(): readonly MessageRecord[] {
    return this.data.messages;
  }

  get updatedAt(): string {
    return this.data.updatedAt;
  }

  markProcessing(): void {
    this.setStatus("processing");
  }

  markIdle(): void {
    this.setStatus("idle");
  }

  markCompleted(): void {
    this.setStatus("completed");
  }

  appendUserMessage(content: string, kind: MessageKind = "input"): MessageRecord {
    return this.append({ role: "user", kind, content });
  }

  appendAssistantMessage(): MessageRecord {
    return this.append({ role: "assistant", kind: "input", content: "" });
  }

  findMessage(messageId: string): MessageRecord | undefined {
    return this.data.messages.find((message) => message.id === messageId);
  }

  /**
   * Adds the part to its message, or replaces the part with the same id so a
   * tool part can move through its states in place. A stored tool part that is
   * completed or errored only accepts the same state again.
   */
  upsertPart(part: Part): MessageRecord {
    if (part.conversationId !== this.data.id) {
      throw new PartOwnershipError(part.id, `conversation ${part.conversationId}`, `conversation ${this.data.id}`);
    }
    const message = this.findMessage(part.messageId);
    if (!message) {
      throw new PartOwnershipError(part.id, `message ${part.messageId}`, `a message of conversation ${this.data.id}`);
    }
    const index = message.parts.findIndex((existing) => existing.id === part.id);
    if (index >= 0) {
      assertToolTransition(message.parts[index], part);
      message.parts[index] = part;
    } else {
      message.parts.push(part);
    }
    message.updatedAt = part.updatedAt;
    this.touch();
    return message;
  }

  latestMessage(): MessageRecord | undefined {
    return this.data.messages.at(-1);
  }

  latestAssistant(): MessageRecord | undefined {
    return this.data.messages.findLast((message) => message.role === "assistant");
  }

  latestUser(): MessageRecord | undefined {
    return this.data.messages.findLast((message) => message.role === "user");
  }

  /** User messages after the last assistant message, oldest first. */
  unansweredUserMessages(): MessageRecord[] {
    const result: MessageRecord[] = [];
    for (let index = this.data.messages.length - 1; index >= 0; index -= 1) {
      const message = this.data.messages[index];
      if (message.role === "assistant") break;
      result.unshift(message);
    }
    return result;
  }

  newestUnansweredUser(): MessageRecord | undefined {
    return this.unansweredUserMessages().at(-1);
  }

  /** Messages strictly before the given one, or the whole history if it is absent. */
  historyBefore(messageId: string): MessageRecord[] {
    const index = this.data.messages.findIndex((message) => message.id === messageId);
    return index < 0 ? [...this.data.messages] : this.data.messages.slice(0, index);
  }

  toSnapshot(): ConversationSnapshot {
    return structuredClone(this.data);
  }

  private append(input: Pick<MessageRecord, "role" | "kind" | "content">): MessageRecord {
    const timestamp = nowIso();
    const message: MessageRecord = {
      id: randomUUID(),
      conversationId: this.data.id,
      role: input.role,
      kind: input.kind,
      content: input.content,
      parts: [],
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    this.data.messages.push(message);
    this.touch(timestamp);
    return message;
  }

  private setStatus(status: ConversationStatus): void {
    this.data.status = status;
    this.touch();
  }

  private touch(timestamp: string = nowIso()): void {
    this.data.updatedAt = timestamp;
  }
}
