import type { MessageRecord, ProgressPart } from "@agentline/shared";
import type { ReasoningLoop, RoundContext } from "../execution/ReasoningLoop.js";
import { NOOP_LOGGER, type SessionLogger } from "../logging/EventLog.js";
import { createProgressPart, createReasoningPart, createTextPart, createToolPart, nowIso } from "../model/Parts.js";
import type { Provider, ProviderMessage, ProviderToolCall, ProviderUsage } from "../providers/ProviderTypes.js";
import { executeToolPart } from "../tools/ToolPartRunner.js";
import type { ToolDescriptor } from "../tools/ToolTypes.js";

export interface ProviderReasoningLoopOptions {
  provider: Provider;
  tools: ToolDescriptor[];
  maxSteps: number;
  systemPrompt?: string;
  maxTokens?: number;
  temperature?: number;
  logger?: SessionLogger;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const toolParams = (call: ProviderToolCall): Record<string, unknown> =>
  isRecord(call.args) ? call.args : {};

export const continuationNote = (content: string): string =>
  [
    "<system-reminder>",
    "The user sent this message while you were working on the previous request. Take it into account:",
    content,
    "</system-reminder>",
  ].join("\n");

const assistantText = (message: MessageRecord): string =>
  message.parts
    .flatMap((part) => (part.type === "text" ? [part.text] : []))
    .join("\n")
    .trim();

/**
 * Provider history for a round: everything before the round's assistant
 * message. User messages absorbed mid-round are wrapped as notes; the round's
 * own input is passed as-is.
 */
export const buildProviderHistory = (round: RoundContext, systemPrompt?: string): ProviderMessage[] => {
  const messages: ProviderMessage[] = [];
  if (systemPrompt) {
    messages.push({ role: "system", content: systemPrompt });
  }
  for (const message of round.conversation.historyBefore(round.assistantMessage.id)) {
    if (message.role === "user") {
      const content =
        message.kind === "continuation" && message.id !== round.input.id
          ? continuationNote(message.content)
          : message.content;
      messages.push({ role: "user", content });
      continue;
    }
    const text = assistantText(message);
    if (text) messages.push({ role: "assistant", content: text });
  }
  return messages;
};

export class ProviderReasoningLoop implements ReasoningLoop {
  private provider: Provider;
  private tools: ToolDescriptor[];
  private maxSteps: number;
  private systemPrompt?: string;
  private maxTokens?: number;
  private temperature?: number;
  private logger: SessionLogger;

  constructor(options: ProviderReasoningLoopOptions) {
    this.provider = options.provider;
    this.tools = options.tools;
    this.maxSteps = options.maxSteps;
    this.systemPrompt = options.systemPrompt;
    this.maxTokens = options.maxTokens;
    this.temperature = options.temperature;
    this.logger = options.logger ?? NOOP_LOGGER;
  }

  async process(round: RoundContext): Promise<void> {
    const conversationId = round.conversation.id;
    const messages = buildProviderHistory(round, this.systemPrompt);
    let progress: ProgressPart = createProgressPart(round.assistantMessage, 0, this.maxSteps, "thinking");
    let usageTotals: ProviderUsage | undefined;
    let toolCallsExecuted = 0;

    const recordUsage = (usage?: ProviderUsage): void => {
      if (!usage) return;
      if (!usageTotals) usageTotals = {};
      if (usage.inputTokens !== undefined) {
        usageTotals.inputTokens = (usageTotals.inputTokens ?? 0) + usage.inputTokens;
      }
      if (usage.outputTokens !== undefined) {
        usageTotals.outputTokens = (usageTotals.outputTokens ?? 0) + usage.outputTokens;
      }
      if (usage.totalTokens !== undefined) {
        usageTotals.totalTokens = (usageTotals.totalTokens ?? 0) + usage.totalTokens;
      }
    };

    for (let step = 0; step < this.maxSteps; step += 1) {
      progress = { ...progress, currentStep: step + 1, stepName: "thinking", updatedAt: nowIso() };
      await round.emit(progress);

      const response = await this.provider.generate({
        messages,
        tools: this.tools.map((tool) => ({
          name: tool.name,
          description: tool.description,
          inputSchema: tool.inputSchema,
        })),
        toolChoice: "auto",
        maxTokens: this.maxTokens,
        temperature: this.temperature,
      });
      recordUsage(response.usage);
      messages.push(response.message);
      this.logger.debug("provider_response", {
        conversationId,
        step: step + 1,
        toolCalls: response.toolCalls?.map((call) => call.name) ?? [],
        usage: response.usage,
      });

      const text = response.message.content.trim();
      const toolCalls = response.toolCalls ?? [];
      const finalStep = toolCalls.length === 0;
      if (text) {
        // text alongside tool calls is reasoning; only the last step answers
        await round.emit(
          finalStep ? createTextPart(round.assistantMessage, text) : createReasoningPart(round.assistantMessage, text),
        );
      }

      if (finalStep) {
        this.logger.info("loop_finished", {
          conversationId,
          steps: step + 1,
          toolCallsExecuted,
          usage: usageTotals,
        });
        return;
      }

      for (const call of toolCalls) {
        progress = { ...progress, stepName: call.name, updatedAt: nowIso() };
        await round.emit(progress);
        const { outcome } = await executeToolPart(
          round,
          createToolPart(round.assistantMessage, call.name, toolParams(call)),
        );
        toolCallsExecuted += 1;
        messages.push({
          role: "tool",
          toolCallId: call.id,
          name: call.name,
          content: outcome.ok ? outcome.content : `ERROR: ${outcome.error ?? "tool failed"}`,
        });
      }
    }

    throw new Error(`Reasoning step limit exceeded (${this.maxSteps})`);
  }
}
