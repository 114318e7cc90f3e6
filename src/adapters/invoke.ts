import { z } from "zod";
import {
  callAgent,
  coerceToText,
  isRecord,
  parseAdapterConfig,
  type AdapterConfig,
  type AgentAdapter,
  type AgentMethod,
} from "./base";

export const invokeAdapterConfigSchema = z
  .object({
    inputKey: z.string().min(1).default("input"),
    outputKey: z.string().min(1).default("output"),
  })
  .strict();

export type InvokeAdapterConfig = z.input<typeof invokeAdapterConfigSchema>;

export interface InvokeAgent {
  invoke(input: Record<string, unknown>): unknown;
}

export class InvokeAdapter implements AgentAdapter {
  readonly type = "invoke" as const;
  readonly agent: unknown;
  readonly inputKey: string;
  readonly outputKey: string;
  private readonly invokeAgent: AgentMethod;

  constructor(agent: unknown, invoke: AgentMethod, config?: AdapterConfig) {
    const parsed = parseAdapterConfig(
      this.type,
      invokeAdapterConfigSchema,
      config,
    );
    this.agent = agent;
    this.invokeAgent = invoke;
    this.inputKey = parsed.inputKey;
    this.outputKey = parsed.outputKey;
  }

  invoke(text: string): Promise<string> {
    return callAgent(
      this.type,
      () => this.invokeAgent({ [this.inputKey]: text }),
      (raw) => this.extractOutput(raw),
    );
  }

  private extractOutput(raw: unknown): string | undefined {
    if (typeof raw === "string") {
      return raw;
    }
    if (!isRecord(raw)) {
      return undefined;
    }
    if (!(this.outputKey in raw)) {
      throw new Error(`result has no "${this.outputKey}" key`);
    }
    return coerceToText(raw[this.outputKey]);
  }
}
