import type { SubTaskPart } from "@agentline/shared";
import type { Provider } from "../providers/ProviderTypes.js";
import type { SubTaskRunner } from "../tools/PlanningTools.js";

export interface ProviderSubTaskRunnerOptions {
  provider: Provider;
  systemPrompt?: string;
  maxTokens?: number;
}

export const SUBTASK_INSTRUCTIONS =
  "You are answering one sub-task of a larger question. Reply with a short, self-contained conclusion.";

export const buildSubTaskPrompt = (task: SubTaskPart, dependencies: ReadonlyMap<string, string>): string => {
  const lines = [`Target: ${task.target}`, `Question: ${task.question}`];
  if (task.reason) lines.push(`Why it matters: ${task.reason}`);
  if (dependencies.size) {
    lines.push("", "Conclusions of earlier sub-tasks:");
    for (const [target, conclusion] of dependencies) {
      lines.push(`- ${target}: ${conclusion}`);
    }
  }
  return lines.join("\n");
};

/** Answers a sub-task with a single tool-less provider call. */
export const createProviderSubTaskRunner = (options: ProviderSubTaskRunnerOptions): SubTaskRunner => {
  const system = options.systemPrompt ? `${options.systemPrompt}\n\n${SUBTASK_INSTRUCTIONS}` : SUBTASK_INSTRUCTIONS;
  return async (task, dependencies) => {
    const response = await options.provider.generate({
      messages: [
        { role: "system", content: system },
        { role: "user", content: buildSubTaskPrompt(task, dependencies) },
      ],
      toolChoice: "none",
      maxTokens: options.maxTokens,
    });
    const conclusion = response.message.content.trim();
    if (!conclusion) {
      throw new Error(`No conclusion for sub-task ${task.target}`);
    }
    return conclusion;
  };
};
