import { z } from "zod";
import {
  callAgent,
  isRecord,
  parseAdapterConfig,
  type AdapterConfig,
  type AgentAdapter,
  type AgentMethod,
} from "./base";

export const openAIClientAdapterConfigSchema = z
  .object({
    model: z.string().trim().min(1, "model is required"),
    systemPrompt: z.string().optional(),
    timeout: z.number().int().positive().optional(),
    modelSettings: z.record(z.unknown()).optional(),
  })
  .strict();

export type OpenAIClientAdapterConfig = z.input<
  typeof openAIClientAdapterConfigSchema
>;

export type ChatCompletionMessage = {
  role: "system" | "user";
  content: string;
};

export type ChatCompletionRequest = {
  model: string;
  messages: ChatCompletionMessage[];
} & Record<string, unknown>;

export type ChatCompletionRequestOptions = {
  timeout?: number;
};

export interface OpenAIClientLike {
  chat: {
    completions: {
      create(
        request: ChatCompletionRequest,
        options?: ChatCompletionRequestOptions,
      ): unknown;
    };
  };
}

const FORWARDED_MODEL_SETTINGS = [
  "temperature",
  "top_p",
  "max_tokens",
  "presence_penalty",
  "frequency_penalty",
  "seed",
  "stop",
  "user",
];

function toModelSettings(
  modelSettings?: Record<string, unknown>,
): Record<string, unknown> {
  if (!modelSettings) {
    return {};
  }

  const parsed: Record<string, unknown> = {};
  for (const key of FORWARDED_MODEL_SETTINGS) {
    if (typeof modelSettings[key] !== "undefined") {
      parsed[key] = modelSettings[key];
    }
  }
  return parsed;
}

function readCompletionText(raw: unknown): string | undefined {
  if (!isRecord(raw) || !Array.isArray(raw.choices)) {
    return undefined;
  }
  const choice: unknown = raw.choices[0];
  if (!isRecord(choice) || !isRecord(choice.message)) {
    return undefined;
  }
  const content = choice.message.content;
  return typeof content === "string" ? content : undefined;
}

export class OpenAIClientAdapter implements AgentAdapter {
  readonly type = "openai_client" as const;
  readonly agent: unknown;
  readonly model: string;
  readonly systemPrompt?: string;
  private readonly timeout?: number;
  private readonly modelSettings: Record<string, unknown>;
  private readonly create: AgentMethod;

  constructor(agent: unknown, create: AgentMethod, config?: AdapterConfig) {
    const parsed = parseAdapterConfig(
      this.type,
      openAIClientAdapterConfigSchema,
      config,
    );
    this.agent = agent;
    this.create = create;
    this.model = parsed.model;
    this.systemPrompt = parsed.systemPrompt;
    this.timeout = parsed.timeout;
    this.modelSettings = toModelSettings(parsed.modelSettings);
  }

  toMessages(text: string): ChatCompletionMessage[] {
    const messages: ChatCompletionMessage[] = [];
    if (this.systemPrompt) {
      messages.push({ role: "system", content: this.systemPrompt });
    }
    messages.push({ role: "user", content: text });
    return messages;
  }

  invoke(text: string): Promise<string> {
    const request: ChatCompletionRequest = {
      ...this.modelSettings,
      model: this.model,
      messages: this.toMessages(text),
    };
    const options: ChatCompletionRequestOptions | undefined =
      typeof this.timeout === "number" ? { timeout: this.timeout } : undefined;

    return callAgent(
      this.type,
      () =>
        options ? this.create(request, options) : this.create(request),
      readCompletionText,
    );
  }
}
