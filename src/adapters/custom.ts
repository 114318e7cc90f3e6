import { z } from "zod";
import { InvalidAdapterConfigError } from "../errors";
import {
  callAgent,
  getMethod,
  parseAdapterConfig,
  type AdapterConfig,
  type AgentAdapter,
  type AgentMethod,
} from "./base";

export type CustomInputTransform = (text: string) => readonly unknown[];

export type CustomOutputTransform = (
  raw: unknown,
) => Promise<string> | string;

export const customAdapterConfigSchema = z
  .object({
    methodName: z.string().trim().min(1, "methodName is required"),
    inputTransform: z.custom<CustomInputTransform>(
      (value) => typeof value === "function",
      "inputTransform must be a function",
    ),
    outputTransform: z.custom<CustomOutputTransform>(
      (value) => typeof value === "function",
      "outputTransform must be a function",
    ),
  })
  .strict();

export type CustomAdapterConfig = z.input<typeof customAdapterConfigSchema>;

export class CustomAdapter implements AgentAdapter {
  readonly type = "custom" as const;
  readonly agent: unknown;
  readonly methodName: string;
  private readonly method: AgentMethod;
  private readonly inputTransform: CustomInputTransform;
  private readonly outputTransform: CustomOutputTransform;

  constructor(agent: unknown, config?: AdapterConfig) {
    const parsed = parseAdapterConfig(
      this.type,
      customAdapterConfigSchema,
      config,
    );
    const method = getMethod(agent, parsed.methodName);
    if (!method) {
      throw new InvalidAdapterConfigError(this.type, [
        `methodName: agent has no method "${parsed.methodName}"`,
      ]);
    }

    this.agent = agent;
    this.methodName = parsed.methodName;
    this.method = method;
    this.inputTransform = parsed.inputTransform;
    this.outputTransform = parsed.outputTransform;
  }

  invoke(text: string): Promise<string> {
    return callAgent(
      this.type,
      () => {
        const args: unknown = this.inputTransform(text);
        if (!Array.isArray(args)) {
          throw new Error("inputTransform must return an argument list");
        }
        return this.method(...args);
      },
      (raw) => this.outputTransform(raw),
    );
  }
}
