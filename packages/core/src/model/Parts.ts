import { randomUUID } from "node:crypto";
import type {
  GoalPart,
  GoalStatus,
  MessageRecord,
  Part,
  PartBase,
  ProgressPart,
  ReasoningPart,
  SubTaskPart,
  TextPart,
  TodoItem,
  TodoPart,
  TodoStatus,
  ToolInput,
  ToolPart,
  WirePart,
  WirePartType,
} from "@agentline/shared";
import { IllegalToolTransitionError } from "../errors/SessionErrors.js";

export const nowIso = (): string => new Date().toISOString();

const basePart = (message: Pick<MessageRecord, "id" | "conversationId">): PartBase => {
  const timestamp = nowIso();
  return {
    id: randomUUID(),
    messageId: message.id,
    conversationId: message.conversationId,
    createdAt: timestamp,
    updatedAt: timestamp,
  };
};

type Owner = Pick<MessageRecord, "id" | "conversationId">;

export const createTextPart = (message: Owner, text: string): TextPart => ({
  ...basePart(message),
  type: "text",
  text,
});

export const createReasoningPart = (message: Owner, text: string): ReasoningPart => ({
  ...basePart(message),
  type: "reasoning",
  text,
});

export const createToolPart = (message: Owner, toolName: string, input: ToolInput): ToolPart => ({
  ...basePart(message),
  type: "tool",
  toolName,
  state: { status: "pending", input },
});

export const createGoalPart = (
  message: Owner,
  title: string,
  description: string,
  status: GoalStatus = "pending",
): GoalPart => ({
  ...basePart(message),
  type: "goal",
  title,
  description,
  status,
});

export const createProgressPart = (
  message: Owner,
  currentStep: number,
  totalSteps: number,
  stepName: string,
): ProgressPart => ({
  ...basePart(message),
  type: "progress",
  currentStep,
  totalSteps,
  stepName,
});

export const createTodoPart = (message: Owner, items: TodoItem[] = []): TodoPart => ({
  ...basePart(message),
  type: "todo",
  items,
});

export interface SubTaskInput {
  target: string;
  question: string;
  reason?: string;
  requiredTools?: string[];
  dependsOn?: string[];
}

export const createSubTaskPart = (message: Owner, input: SubTaskInput): SubTaskPart => ({
  ...basePart(message),
  type: "subtask",
  target: input.target,
  question: input.question,
  reason: input.reason ?? "",
  requiredTools: input.requiredTools ?? [],
  dependsOn: Array.from(new Set(input.dependsOn ?? [])),
  status: "pending",
});

// Tool state machine. Completed and error are terminal.

export const startTool = (part: ToolPart): ToolPart => {
  if (part.state.status !== "pending") {
    throw new IllegalToolTransitionError(part.id, part.state.status, "running");
  }
  const startedAt = nowIso();
  return { ...part, updatedAt: startedAt, state: { status: "running", input: part.state.input, startedAt } };
};

export interface ToolCompletion {
  output: unknown;
  title: string;
  content: string;
}

export const completeTool = (part: ToolPart, completion: ToolCompletion): ToolPart => {
  if (part.state.status !== "running") {
    throw new IllegalToolTransitionError(part.id, part.state.status, "completed");
  }
  const endedAt = nowIso();
  return {
    ...part,
    updatedAt: endedAt,
    state: {
      status: "completed",
      input: part.state.input,
      output: completion.output,
      title: completion.title,
      content: completion.content,
      startedAt: part.state.startedAt,
      endedAt,
    },
  };
};

export const failTool = (part: ToolPart, error: string): ToolPart => {
  if (part.state.status === "completed" || part.state.status === "error") {
    throw new IllegalToolTransitionError(part.id, part.state.status, "error");
  }
  const failedAt = nowIso();
  return { ...part, updatedAt: failedAt, state: { status: "error", input: part.state.input, error, failedAt } };
};

export const isToolTerminal = (part: ToolPart): boolean =>
  part.state.status === "completed" || part.state.status === "error";

// Todo lists

export const addTodoItem = (part: TodoPart, content: string, status: TodoStatus = "pending"): TodoPart => ({
  ...part,
  updatedAt: nowIso(),
  items: [...part.items, { id: randomUUID(), content, status }],
});

export const updateTodoItemStatus = (part: TodoPart, itemId: string, status: TodoStatus): TodoPart => {
  if (!part.items.some((item) => item.id === itemId)) {
    return part;
  }
  return {
    ...part,
    updatedAt: nowIso(),
    items: part.items.map((item) => (item.id === itemId ? { ...item, status } : item)),
  };
};

export const todoCompletedCount = (part: TodoPart): number =>
  part.items.filter((item) => item.status === "completed").length;

export const todoProgress = (part: TodoPart): number =>
  part.items.length === 0 ? 0 : todoCompletedCount(part) / part.items.length;

// Sub-tasks

export const startSubTask = (part: SubTaskPart): SubTaskPart => ({
  ...part,
  updatedAt: nowIso(),
  status: "in_progress",
});

export const completeSubTask = (part: SubTaskPart, conclusion: string): SubTaskPart => ({
  ...part,
  updatedAt: nowIso(),
  status: "completed",
  conclusion,
});

export const blockSubTask = (part: SubTaskPart, blockReason: string): SubTaskPart => ({
  ...part,
  updatedAt: nowIso(),
  status: "blocked",
  blockReason,
});

export const cancelSubTask = (part: SubTaskPart): SubTaskPart => ({
  ...part,
  updatedAt: nowIso(),
  status: "cancelled",
});

export const addSubTaskDependency = (part: SubTaskPart, subTaskId: string): SubTaskPart => {
  if (!subTaskId || part.dependsOn.includes(subTaskId)) return part;
  return { ...part, updatedAt: nowIso(), dependsOn: [...part.dependsOn, subTaskId] };
};

/** True once every dependency is completed; a task without dependencies is eligible at once. */
export const isSubTaskEligible = (
  part: SubTaskPart,
  statusOf: (subTaskId: string) => SubTaskPart["status"] | undefined,
): boolean => part.dependsOn.every((dependency) => statusOf(dependency) === "completed");

// Wire form

const toolData = (part: ToolPart): Record<string, unknown> => {
  const state = part.state;
  const data: Record<string, unknown> = {
    toolName: part.toolName,
    state: state.status.toUpperCase(),
    parameters: state.input,
  };
  switch (state.status) {
    case "completed":
      data.title = state.title;
      data.content = state.content;
      break;
    case "error":
      data.error = state.error;
      break;
    case "pending":
    case "running":
      break;
  }
  return data;
};

const assertNever = (value: never): never => {
  throw new Error(`Unhandled part: ${JSON.stringify(value)}`);
};

const wireBody = (part: Part): { type: WirePartType; data: Record<string, unknown> } => {
  switch (part.type) {
    case "text":
      return { type: "TEXT", data: { text: part.text } };
    case "reasoning":
      return { type: "REASONING", data: { text: part.text } };
    case "tool":
      return { type: "TOOL", data: toolData(part) };
    case "goal":
      return {
        type: "GOAL",
        data: { title: part.title, description: part.description, status: part.status.toUpperCase() },
      };
    case "progress":
      return {
        type: "PROGRESS",
        data: { currentStep: part.currentStep, totalSteps: part.totalSteps, stepName: part.stepName },
      };
    case "todo":
      return {
        type: "TODO",
        data: {
          items: part.items.map((item) => ({
            id: item.id,
            content: item.content,
            status: item.status.toUpperCase(),
          })),
        },
      };
    case "subtask": {
      const data: Record<string, unknown> = {
        target: part.target,
        question: part.question,
        reason: part.reason,
        requiredTools: part.requiredTools,
        dependsOn: part.dependsOn,
        status: part.status.toUpperCase(),
      };
      if (part.conclusion !== undefined) data.conclusion = part.conclusion;
      if (part.blockReason !== undefined) data.blockReason = part.blockReason;
      return { type: "SUBTASK", data };
    }
    default:
      return assertNever(part);
  }
};

export const toWirePart = (part: Part): WirePart => {
  const body = wireBody(part);
  return {
    id: part.id,
    messageId: part.messageId,
    sessionId: part.conversationId,
    type: body.type,
    createdTime: part.createdAt,
    updatedTime: part.updatedAt,
    data: body.data,
  };
};
