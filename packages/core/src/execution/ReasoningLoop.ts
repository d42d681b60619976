import type { MessageRecord, Part } from "@agentline/shared";
import type { Conversation } from "../model/Conversation.js";
import type { ToolOutcome } from "../tools/ToolExecutor.js";

/** What a reasoning loop sees of the round it runs. */
export interface RoundContext {
  readonly conversation: Conversation;
  /** The user message that started the round. */
  readonly input: MessageRecord;
  /** The assistant message every emitted part belongs to. */
  readonly assistantMessage: MessageRecord;
  /** Stores the part in the assistant message and streams it to the client, in call order. */
  emit(part: Part): Promise<void>;
  invokeTool(toolName: string, params: Record<string, unknown>): Promise<ToolOutcome>;
}

export interface ReasoningLoop {
  process(round: RoundContext): Promise<void>;
}
