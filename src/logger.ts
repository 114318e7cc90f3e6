import type { AdapterType } from "./adapters/base";
import type { GuardrailDirection, GuardrailStatus } from "./result";

export type GuardrailLogLevel = "debug" | "info" | "warn" | "error";

interface GuardrailLogEventBase {
  timestamp: string;
  level: GuardrailLogLevel;
}

interface AgentLogEventBase extends GuardrailLogEventBase {
  adapter: AdapterType;
}

export type GuardrailLogEvent =
  | (GuardrailLogEventBase & {
      type: "guardrail_registered";
      direction: GuardrailDirection;
      guardrailName: string;
    })
  | (AgentLogEventBase & {
      type: "agent_wrapped";
      agentType: string;
      inputGuardrails: number;
      outputGuardrails: number;
    })
  | (AgentLogEventBase & {
      type: "chat_started";
      inputLength: number;
    })
  | (AgentLogEventBase & {
      type: "guardrail_evaluated";
      direction: GuardrailDirection;
      guardrailName: string;
      status: GuardrailStatus;
      modified: boolean;
      message: string;
    })
  | (AgentLogEventBase & {
      type: "agent_call_started";
      inputLength: number;
    })
  | (AgentLogEventBase & {
      type: "agent_call_completed";
      outputLength: number;
    })
  | (AgentLogEventBase & {
      type: "agent_call_failed";
      errorName: string;
      errorMessage: string;
    })
  | (AgentLogEventBase & {
      type: "chat_blocked";
      direction: GuardrailDirection;
      guardrailName: string;
      reason: string;
    })
  | (AgentLogEventBase & {
      type: "chat_completed";
      outputLength: number;
    });

export interface GuardrailLogger {
  log(event: GuardrailLogEvent): Promise<void> | void;
}

export interface StdoutLoggerOptions {
  minLevel?: GuardrailLogLevel;
  events?: GuardrailLogEvent["type"][];
  pretty?: boolean;
  write?: (message: string) => void;
}

export const LOG_LEVELS: readonly GuardrailLogLevel[] = [
  "debug",
  "info",
  "warn",
  "error",
];

const LOG_LEVEL_RANK: Record<GuardrailLogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function shouldEmitForLevel(
  eventLevel: GuardrailLogLevel,
  minLevel: GuardrailLogLevel,
): boolean {
  return LOG_LEVEL_RANK[eventLevel] >= LOG_LEVEL_RANK[minLevel];
}

function formatPretty(event: GuardrailLogEvent): string {
  if (event.type === "guardrail_registered") {
    return `[${event.level}] ${event.type} ${event.direction}=${event.guardrailName}`;
  }

  const base = `[${event.level}] ${event.type} adapter=${event.adapter}`;

  switch (event.type) {
    case "agent_wrapped":
      return `${base} agent=${event.agentType} input=${event.inputGuardrails} output=${event.outputGuardrails}`;
    case "guardrail_evaluated":
      return `${base} ${event.direction}=${event.guardrailName} status=${event.status} modified=${event.modified}`;
    case "agent_call_failed":
      return `${base} error=${event.errorName}:${event.errorMessage}`;
    case "chat_blocked":
      return `${base} ${event.direction}=${event.guardrailName} reason=${event.reason}`;
    default:
      return base;
  }
}

export function createStdoutLogger(
  options: StdoutLoggerOptions = {},
): GuardrailLogger {
  const minLevel = options.minLevel ?? "info";
  const allowedEvents = options.events ? new Set(options.events) : null;
  const pretty = options.pretty ?? false;
  const write =
    options.write ??
    ((message: string) => {
      process.stdout.write(message);
    });

  return {
    log(event) {
      if (!shouldEmitForLevel(event.level, minLevel)) {
        return;
      }

      if (allowedEvents && !allowedEvents.has(event.type)) {
        return;
      }

      if (pretty) {
        write(`${formatPretty(event)}\n`);
        return;
      }

      write(`${JSON.stringify(event)}\n`);
    },
  };
}
