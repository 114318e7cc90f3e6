import type { AdapterType } from "./adapters/base";
import type { GuardrailLogEvent, GuardrailLogger } from "./logger";
import {
  GuardrailStatus,
  type GuardrailDirection,
  type GuardrailResult,
} from "./result";

function toErrorDetails(error: unknown): {
  errorName: string;
  errorMessage: string;
} {
  if (error instanceof Error) {
    return {
      errorName: error.name,
      errorMessage: error.message,
    };
  }

  return {
    errorName: "Error",
    errorMessage: String(error),
  };
}

const LEVEL_BY_STATUS: Record<GuardrailStatus, GuardrailLogEvent["level"]> = {
  [GuardrailStatus.PASSED]: "info",
  [GuardrailStatus.WARNING]: "warn",
  [GuardrailStatus.FAILED]: "warn",
};

export class GuardrailLogEmitter {
  private logger?: GuardrailLogger;

  constructor(logger?: GuardrailLogger) {
    this.logger = logger;
  }

  private createTimestamp(): string {
    return new Date().toISOString();
  }

  private async emit(event: GuardrailLogEvent): Promise<void> {
    if (!this.logger) {
      return;
    }

    try {
      await this.logger.log(event);
    } catch {
      // Logging must never break a guarded call.
    }
  }

  async guardrailRegistered(
    direction: GuardrailDirection,
    guardrailName: string,
  ): Promise<void> {
    await this.emit({
      timestamp: this.createTimestamp(),
      level: "debug",
      type: "guardrail_registered",
      direction,
      guardrailName,
    });
  }

  async agentWrapped(
    adapter: AdapterType,
    agentType: string,
    inputGuardrails: number,
    outputGuardrails: number,
  ): Promise<void> {
    await this.emit({
      timestamp: this.createTimestamp(),
      level: "info",
      type: "agent_wrapped",
      adapter,
      agentType,
      inputGuardrails,
      outputGuardrails,
    });
  }

  async chatStarted(adapter: AdapterType, inputLength: number): Promise<void> {
    await this.emit({
      timestamp: this.createTimestamp(),
      level: "debug",
      type: "chat_started",
      adapter,
      inputLength,
    });
  }

  async guardrailEvaluated(
    adapter: AdapterType,
    direction: GuardrailDirection,
    guardrailName: string,
    result: GuardrailResult,
  ): Promise<void> {
    await this.emit({
      timestamp: this.createTimestamp(),
      level: LEVEL_BY_STATUS[result.status],
      type: "guardrail_evaluated",
      adapter,
      direction,
      guardrailName,
      status: result.status,
      modified:
        result.status !== GuardrailStatus.FAILED &&
        typeof result.modifiedContent === "string",
      message: result.message,
    });
  }

  async agentCallStarted(
    adapter: AdapterType,
    inputLength: number,
  ): Promise<void> {
    await this.emit({
      timestamp: this.createTimestamp(),
      level: "debug",
      type: "agent_call_started",
      adapter,
      inputLength,
    });
  }

  async agentCallCompleted(
    adapter: AdapterType,
    outputLength: number,
  ): Promise<void> {
    await this.emit({
      timestamp: this.createTimestamp(),
      level: "info",
      type: "agent_call_completed",
      adapter,
      outputLength,
    });
  }

  async agentCallFailed(adapter: AdapterType, error: unknown): Promise<void> {
    const details = toErrorDetails(error);
    await this.emit({
      timestamp: this.createTimestamp(),
      level: "error",
      type: "agent_call_failed",
      adapter,
      errorName: details.errorName,
      errorMessage: details.errorMessage,
    });
  }

  async chatBlocked(
    adapter: AdapterType,
    direction: GuardrailDirection,
    guardrailName: string,
    reason: string,
  ): Promise<void> {
    await this.emit({
      timestamp: this.createTimestamp(),
      level: "warn",
      type: "chat_blocked",
      adapter,
      direction,
      guardrailName,
      reason,
    });
  }

  async chatCompleted(
    adapter: AdapterType,
    outputLength: number,
  ): Promise<void> {
    await this.emit({
      timestamp: this.createTimestamp(),
      level: "info",
      type: "chat_completed",
      adapter,
      outputLength,
    });
  }
}
