export type ConversationStatus = "idle" | "processing" | "completed";

export type MessageRole = "user" | "assistant";

/**
 * `continuation` marks a user message that arrived while a round was running.
 * It is replayed after the round as a low-priority note instead of being
 * forwarded to the model mid-round.
 */
export type MessageKind = "input" | "continuation";

export type PartType = "text" | "reasoning" | "tool" | "goal" | "progress" | "todo" | "subtask";

export const PART_TYPES: readonly PartType[] = [
  "text",
  "reasoning",
  "tool",
  "goal",
  "progress",
  "todo",
  "subtask",
];

export interface PartBase {
  id: string;
  messageId: string;
  conversationId: string;
  createdAt: string;
  updatedAt: string;
}

export interface TextPart extends PartBase {
  type: "text";
  text: string;
}

export interface ReasoningPart extends PartBase {
  type: "reasoning";
  text: string;
}

export type ToolInput = Record<string, unknown>;

export type ToolState =
  | { status: "pending"; input: ToolInput }
  | { status: "running"; input: ToolInput; startedAt: string }
  | {
      status: "completed";
      input: ToolInput;
      output: unknown;
      title: string;
      content: string;
      startedAt: string;
      endedAt: string;
    }
  | { status: "error"; input: ToolInput; error: string; failedAt: string };

export type ToolStatus = ToolState["status"];

export interface ToolPart extends PartBase {
  type: "tool";
  toolName: string;
  state: ToolState;
}

export type GoalStatus = "pending" | "in_progress" | "completed" | "cancelled";

export interface GoalPart extends PartBase {
  type: "goal";
  title: string;
  description: string;
  status: GoalStatus;
}

export interface ProgressPart extends PartBase {
  type: "progress";
  currentStep: number;
  totalSteps: number;
  stepName: string;
}

export type TodoStatus = "pending" | "in_progress" | "completed" | "cancelled";

export interface TodoItem {
  id: string;
  content: string;
  status: TodoStatus;
}

export interface TodoPart extends PartBase {
  type: "todo";
  items: TodoItem[];
}

export type SubTaskStatus = "pending" | "in_progress" | "completed" | "blocked" | "cancelled";

export interface SubTaskPart extends PartBase {
  type: "subtask";
  target: string;
  question: string;
  reason: string;
  requiredTools: string[];
  dependsOn: string[];
  status: SubTaskStatus;
  conclusion?: string;
  blockReason?: string;
}

export type Part =
  | TextPart
  | ReasoningPart
  | ToolPart
  | GoalPart
  | ProgressPart
  | TodoPart
  | SubTaskPart;

export interface MessageRecord {
  id: string;
  conversationId: string;
  role: MessageRole;
  kind: MessageKind;
  content: string;
  parts: Part[];
  createdAt: string;
  updatedAt: string;
}

export interface ConversationSnapshot {
  id: string;
  projectKey?: string;
  status: ConversationStatus;
  messages: MessageRecord[];
  createdAt: string;
  updatedAt: string;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isPartType = (value: unknown): value is PartType =>
  typeof value === "string" && PART_TYPES.some((type) => type === value);

/**
 * Structural check used when parts come back from storage. It validates the
 * discriminant and the fields shared by every variant.
 */
export const isPart = (value: unknown): value is Part => {
  if (!isRecord(value)) return false;
  if (!isPartType(value.type)) return false;
  return (
    typeof value.id === "string" &&
    typeof value.messageId === "string" &&
    typeof value.conversationId === "string" &&
    typeof value.createdAt === "string" &&
    typeof value.updatedAt === "string"
  );
};
