import type { MessageRecord, Part } from "@agentline/shared";

/** The assistant message of the running round, for tools that add parts to it. */
export interface ToolPartSink {
  message: MessageRecord;
  emit(part: Part): Promise<void>;
}

export interface ToolContext {
  conversationId: string;
  projectKey?: string;
  parts?: ToolPartSink;
}

export interface ToolHandlerResult {
  output: string;
  title?: string;
  data?: unknown;
}

export interface ToolExecutionResult extends ToolHandlerResult {
  ok: boolean;
  error?: string;
}

export type ToolHandler = (args: unknown, context: ToolContext) => Promise<ToolHandlerResult>;

export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema?: Record<string, unknown>;
}

export interface ToolDefinition extends ToolDescriptor {
  handler: ToolHandler;
}
