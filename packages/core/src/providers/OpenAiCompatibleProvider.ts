import type {
  Provider,
  ProviderConfig,
  ProviderMessage,
  ProviderRequest,
  ProviderResponse,
  ProviderToolCall,
  ProviderUsage,
} from "./ProviderTypes.js";

type JsonRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is JsonRecord =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const parseToolArgs = (raw: string): unknown => {
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
};

const normalizeBaseUrl = (baseUrl?: string): string => {
  const root = baseUrl ?? "https://api.openai.com/v1";
  return root.endsWith("/") ? root : `${root}/`;
};

const toWireMessage = (message: ProviderMessage): JsonRecord => ({
  role: message.role,
  content: message.content,
  name: message.name,
  tool_call_id: message.toolCallId,
  tool_calls: message.toolCalls?.map((call) => ({
    id: call.id,
    type: "function",
    function: {
      name: call.name,
      arguments: typeof call.args === "string" ? call.args : JSON.stringify(call.args ?? {}),
    },
  })),
});

const parseToolCalls = (value: unknown): ProviderToolCall[] | undefined => {
  if (!Array.isArray(value)) return undefined;
  const calls: ProviderToolCall[] = [];
  value.forEach((entry, index) => {
    if (!isRecord(entry) || !isRecord(entry.function)) return;
    const name = entry.function.name;
    if (typeof name !== "string") return;
    const args = entry.function.arguments;
    calls.push({
      id: typeof entry.id === "string" ? entry.id : `call_${index + 1}`,
      name,
      args: typeof args === "string" ? parseToolArgs(args) : args ?? {},
    });
  });
  return calls.length ? calls : undefined;
};

const optionalNumber = (value: unknown): number | undefined =>
  typeof value === "number" ? value : undefined;

const parseUsage = (value: unknown): ProviderUsage | undefined => {
  if (!isRecord(value)) return undefined;
  return {
    inputTokens: optionalNumber(value.prompt_tokens),
    outputTokens: optionalNumber(value.completion_tokens),
    totalTokens: optionalNumber(value.total_tokens),
  };
};

export class OpenAiCompatibleProvider implements Provider {
  name = "openai-compatible";

  constructor(private config: ProviderConfig) {}

  async generate(request: ProviderRequest): Promise<ProviderResponse> {
    const baseUrl = normalizeBaseUrl(this.config.baseUrl);
    const url = new URL("chat/completions", baseUrl).toString();

    const headers: Record<string, string> = {
      "content-type": "application/json",
    };
    if (this.config.apiKey) {
      headers.authorization = `Bearer ${this.config.apiKey}`;
    }

    const body = {
      model: this.config.model,
      messages: request.messages.map(toWireMessage),
      tools: request.tools?.length
        ? request.tools.map((tool) => ({
            type: "function",
            function: {
              name: tool.name,
              description: tool.description,
              parameters: tool.inputSchema ?? { type: "object", properties: {} },
            },
          }))
        : undefined,
      tool_choice: request.tools?.length ? request.toolChoice : undefined,
      max_tokens: request.maxTokens,
      temperature: request.temperature,
    };

    const controller = new AbortController();
    const timeoutMs = this.config.timeoutMs ?? 60_000;
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetch(url, {
        method: "POST",
        headers,
        body: JSON.stringify(body),
        signal: controller.signal,
      });

      if (!response.ok) {
        const errorBody = await response.text();
        throw new Error(`OpenAI-compatible error ${response.status}: ${errorBody}`);
      }

      const raw: unknown = await response.json();
      const choices = isRecord(raw) && Array.isArray(raw.choices) ? raw.choices : [];
      const first: unknown = choices[0];
      const choice = isRecord(first) && isRecord(first.message) ? first.message : undefined;
      if (!choice) {
        throw new Error("OpenAI-compatible response missing choices");
      }

      const toolCalls = parseToolCalls(choice.tool_calls);
      return {
        message: {
          role: "assistant",
          content: typeof choice.content === "string" ? choice.content : "",
          toolCalls,
        },
        toolCalls,
        usage: isRecord(raw) ? parseUsage(raw.usage) : undefined,
        raw,
      };
    } finally {
      clearTimeout(timeout);
    }
  }
}
