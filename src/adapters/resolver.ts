import {
  UnknownAdapterTypeError,
  UnsupportedAgentInterfaceError,
} from "../errors";
import {
  ADAPTER_TYPES,
  describeAgentType,
  emptyAdapterConfigSchema,
  getMethod,
  isAdapterType,
  isRecord,
  listCapabilities,
  parseAdapterConfig,
  type AdapterConfig,
  type AdapterType,
  type AgentAdapter,
  type AgentMethod,
} from "./base";
import { CallableAdapter, FunctionAdapter } from "./callable";
import { ChatAdapter } from "./chat";
import { CustomAdapter } from "./custom";
import { InvokeAdapter } from "./invoke";
import { OpenAIClientAdapter } from "./openai-client";
import { RunAdapter } from "./run";

type DetectableAdapterType = Exclude<AdapterType, "custom">;

function asFunction(agent: unknown): AgentMethod | undefined {
  if (typeof agent !== "function") {
    return undefined;
  }
  return (...args: unknown[]) => Reflect.apply(agent, undefined, args);
}

function getCompletionsCreate(agent: unknown): AgentMethod | undefined {
  const chat = getProperty(agent, "chat");
  const completions = getProperty(chat, "completions");
  return getMethod(completions, "create");
}

function getProperty(target: unknown, name: string): unknown {
  if (!isRecord(target) && typeof target !== "function") {
    return undefined;
  }
  return Reflect.get(target, name);
}

const ENTRY_POINTS: Record<
  DetectableAdapterType,
  (agent: unknown) => AgentMethod | undefined
> = {
  chat: (agent) => getMethod(agent, "chat"),
  invoke: (agent) => getMethod(agent, "invoke"),
  run: (agent) => getMethod(agent, "run"),
  function: asFunction,
  callable: (agent) =>
    typeof agent === "function" ? undefined : getMethod(agent, "call"),
  openai_client: getCompletionsCreate,
};

// Most specific shape first.
export const DETECTION_ORDER: readonly DetectableAdapterType[] = [
  "chat",
  "invoke",
  "run",
  "function",
  "callable",
  "openai_client",
];

export function detectAgentInterface(agent: unknown): DetectableAdapterType {
  for (const adapterType of DETECTION_ORDER) {
    if (ENTRY_POINTS[adapterType](agent)) {
      return adapterType;
    }
  }

  throw new UnsupportedAgentInterfaceError(
    describeAgentType(agent),
    listCapabilities(agent),
  );
}

function requireEntryPoint(
  adapterType: DetectableAdapterType,
  agent: unknown,
): AgentMethod {
  const entryPoint = ENTRY_POINTS[adapterType](agent);
  if (!entryPoint) {
    throw new UnsupportedAgentInterfaceError(
      describeAgentType(agent),
      listCapabilities(agent),
      `Agent does not expose the interface required by the "${adapterType}" adapter.`,
    );
  }
  return entryPoint;
}

function withoutOptions(
  adapterType: AdapterType,
  config: AdapterConfig | undefined,
): void {
  parseAdapterConfig(adapterType, emptyAdapterConfigSchema, config);
}

export function createAdapter(
  agent: unknown,
  adapterType?: AdapterType | (string & {}),
  adapterConfig?: AdapterConfig,
): AgentAdapter {
  const resolvedType: string = adapterType ?? detectAgentInterface(agent);
  if (!isAdapterType(resolvedType)) {
    throw new UnknownAdapterTypeError(resolvedType, ADAPTER_TYPES);
  }

  switch (resolvedType) {
    case "chat":
      withoutOptions(resolvedType, adapterConfig);
      return new ChatAdapter(agent, requireEntryPoint(resolvedType, agent));
    case "invoke":
      return new InvokeAdapter(
        agent,
        requireEntryPoint(resolvedType, agent),
        adapterConfig,
      );
    case "run":
      withoutOptions(resolvedType, adapterConfig);
      return new RunAdapter(agent, requireEntryPoint(resolvedType, agent));
    case "function":
      withoutOptions(resolvedType, adapterConfig);
      return new FunctionAdapter(
        agent,
        requireEntryPoint(resolvedType, agent),
      );
    case "callable":
      withoutOptions(resolvedType, adapterConfig);
      return new CallableAdapter(
        agent,
        requireEntryPoint(resolvedType, agent),
      );
    case "openai_client":
      return new OpenAIClientAdapter(
        agent,
        requireEntryPoint(resolvedType, agent),
        adapterConfig,
      );
    case "custom":
      return new CustomAdapter(agent, adapterConfig);
    default: {
      const unreachable: never = resolvedType;
      throw new UnknownAdapterTypeError(unreachable, ADAPTER_TYPES);
    }
  }
}
