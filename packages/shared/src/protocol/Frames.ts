export type WirePartType = "TEXT" | "REASONING" | "TOOL" | "GOAL" | "PROGRESS" | "TODO" | "SUBTASK";

export interface WirePart {
  id: string;
  messageId: string;
  sessionId: string;
  type: WirePartType;
  createdTime: string;
  updatedTime: string;
  data: Record<string, unknown>;
}

export interface ToolResultPayload {
  success?: boolean;
  result?: string;
  error?: string;
  relativePath?: string;
  relatedFilePaths?: string[];
  metadata?: Record<string, unknown>;
}

export type SubmitFrameType = "chat" | "analyze";

export interface SubmitFrame {
  type: SubmitFrameType;
  sessionId: string;
  projectKey?: string;
  input: string;
}

export interface ToolResultFrame extends ToolResultPayload {
  type: "TOOL_RESULT";
  toolCallId: string;
}

export type ClientFrame =
  | { type: "ping"; timestamp?: number }
  | { type: "pong"; timestamp?: number }
  | SubmitFrame
  | ToolResultFrame;

export interface ToolCallFrame {
  type: "TOOL_CALL";
  toolCallId: string;
  toolName: string;
  params: Record<string, unknown>;
}

export type ServerFrame =
  | { type: "connected"; message: string }
  | { type: "ping"; timestamp: number }
  | { type: "pong"; timestamp: number }
  | { type: "part"; sessionId: string; part: WirePart }
  | { type: "complete"; sessionId: string }
  | { type: "error"; message: string }
  | ToolCallFrame
  | { type: "shutdown"; message: string; timestamp: number };

export interface ConsumedJsonLines {
  messages: unknown[];
  remainder: string;
}

export const encodeFrame = (frame: ServerFrame | ClientFrame): string => `${JSON.stringify(frame)}\n`;

/**
 * Splits a newline-delimited JSON buffer. The trailing partial line is returned
 * as `remainder` so the caller can prepend it to the next chunk.
 */
export const consumeJsonLines = (buffer: string): ConsumedJsonLines => {
  const lines = buffer.split("\n");
  const remainder = lines.pop() ?? "";
  const messages: unknown[] = [];

  for (const line of lines) {
    const trimmed = line.trim();
    if (!trimmed) continue;
    try {
      messages.push(JSON.parse(trimmed));
    } catch {
      // malformed lines are skipped; the peer keeps its connection
    }
  }

  return { messages, remainder };
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const optionalString = (value: unknown): string | undefined =>
  typeof value === "string" ? value : undefined;

const optionalNumber = (value: unknown): number | undefined =>
  typeof value === "number" && Number.isFinite(value) ? value : undefined;

const parseToolResult = (record: Record<string, unknown>): ToolResultFrame | null => {
  const toolCallId = optionalString(record.toolCallId);
  if (!toolCallId) return null;
  const frame: ToolResultFrame = { type: "TOOL_RESULT", toolCallId };
  if (typeof record.success === "boolean") frame.success = record.success;
  if (record.result !== undefined && record.result !== null) {
    frame.result = typeof record.result === "string" ? record.result : JSON.stringify(record.result);
  }
  const error = optionalString(record.error);
  if (error !== undefined) frame.error = error;
  const relativePath = optionalString(record.relativePath);
  if (relativePath !== undefined) frame.relativePath = relativePath;
  if (Array.isArray(record.relatedFilePaths)) {
    frame.relatedFilePaths = record.relatedFilePaths.filter(
      (entry): entry is string => typeof entry === "string",
    );
  }
  if (isRecord(record.metadata)) frame.metadata = record.metadata;
  return frame;
};

export const parseClientFrame = (value: unknown): ClientFrame | null => {
  if (!isRecord(value)) return null;
  const type = value.type;
  if (type === "ping" || type === "pong") {
    const timestamp = optionalNumber(value.timestamp);
    return timestamp === undefined ? { type } : { type, timestamp };
  }
  if (type === "chat" || type === "analyze") {
    const sessionId = optionalString(value.sessionId);
    const input = optionalString(value.input);
    if (!sessionId || input === undefined) return null;
    const frame: SubmitFrame = { type, sessionId, input };
    const projectKey = optionalString(value.projectKey);
    if (projectKey) frame.projectKey = projectKey;
    return frame;
  }
  if (type === "TOOL_RESULT" || type === "tool_result") {
    return parseToolResult(value);
  }
  return null;
};
