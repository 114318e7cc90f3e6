import { z } from "zod";
import {
  AdapterInvocationError,
  InvalidAdapterConfigError,
} from "../errors";
import { formatSchemaIssues } from "../guardrails";

export const ADAPTER_TYPES = [
  "chat",
  "invoke",
  "run",
  "callable",
  "function",
  "openai_client",
  "custom",
] as const;

export type AdapterType = (typeof ADAPTER_TYPES)[number];

export type AdapterConfig = Record<string, unknown>;

export interface AgentAdapter {
  readonly type: AdapterType;
  readonly agent: unknown;
  invoke(text: string): Promise<string>;
}

export type AgentMethod = (...args: unknown[]) => unknown;

export function isAdapterType(value: string): value is AdapterType {
  return ADAPTER_TYPES.some((adapterType) => adapterType === value);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export function getMethod(
  target: unknown,
  name: string,
): AgentMethod | undefined {
  if (!isRecord(target) && typeof target !== "function") {
    return undefined;
  }
  const candidate: unknown = Reflect.get(target, name);
  if (typeof candidate !== "function") {
    return undefined;
  }
  return (...args: unknown[]) => Reflect.apply(candidate, target, args);
}

export function describeAgentType(agent: unknown): string {
  if (agent === null) {
    return "null";
  }
  if (typeof agent === "function") {
    return agent.name ? `function ${agent.name}` : "anonymous function";
  }
  if (typeof agent !== "object") {
    return typeof agent;
  }
  const constructorName: unknown = Reflect.get(agent, "constructor")?.name;
  return typeof constructorName === "string" && constructorName
    ? constructorName
    : "Object";
}

export function listCapabilities(agent: unknown): string[] {
  if (!isRecord(agent) && typeof agent !== "function") {
    return [];
  }

  const names = new Set<string>();
  let current: object | null = agent;
  while (
    current &&
    current !== Object.prototype &&
    current !== Function.prototype
  ) {
    for (const name of Object.getOwnPropertyNames(current)) {
      if (name === "constructor" || name.startsWith("_")) {
        continue;
      }
      const descriptor = Object.getOwnPropertyDescriptor(current, name);
      if (descriptor && typeof descriptor.value === "function") {
        names.add(name);
      }
    }
    current = Object.getPrototypeOf(current);
  }

  return [...names].sort();
}

export function coerceToText(value: unknown): string | undefined {
  if (typeof value === "string") {
    return value;
  }
  if (
    typeof value === "number" ||
    typeof value === "boolean" ||
    typeof value === "bigint"
  ) {
    return String(value);
  }
  return undefined;
}

export function parseAdapterConfig<TSchema extends z.ZodTypeAny>(
  adapterType: AdapterType,
  schema: TSchema,
  config: AdapterConfig | undefined,
): z.output<TSchema> {
  const parsed = schema.safeParse(config ?? {});
  if (!parsed.success) {
    throw new InvalidAdapterConfigError(
      adapterType,
      formatSchemaIssues(parsed.error),
    );
  }
  return parsed.data;
}

export const emptyAdapterConfigSchema = z.object({}).strict();

export async function callAgent(
  adapterType: AdapterType,
  call: () => unknown,
  toText: (raw: unknown) => unknown = coerceToText,
): Promise<string> {
  let raw: unknown;
  try {
    raw = await call();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new AdapterInvocationError(adapterType, message, error);
  }

  let text: unknown;
  try {
    text = await toText(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new AdapterInvocationError(adapterType, message, error);
  }

  if (typeof text !== "string") {
    throw new AdapterInvocationError(
      adapterType,
      `agent returned a value that cannot be converted to text (${describeAgentType(raw)})`,
    );
  }
  return text;
}
