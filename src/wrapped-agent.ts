import type { AdapterType, AgentAdapter } from "./adapters/base";
import {
  AdapterInvocationError,
  GuardrailViolation,
  ReservedMetadataKeyError,
} from "./errors";
import type { InputGuardrail, OutputGuardrail } from "./guardrails";
import { GuardrailLogEmitter } from "./log-emitter";
import {
  runGuardrailPipeline,
  type GuardrailCheck,
  type PipelineGuardrails,
  type PipelineOutcome,
} from "./pipeline";
import type { GuardrailDirection, GuardrailMetadata } from "./result";

export interface WrappedAgentOptions {
  adapter: AgentAdapter;
  inputGuardrails: readonly InputGuardrail[];
  outputGuardrails: readonly OutputGuardrail[];
  logEmitter?: GuardrailLogEmitter;
}

export interface WrappedAgentStats {
  adapterType: AdapterType;
  inputGuardrails: string[];
  outputGuardrails: string[];
}

// Set by the wrapper on every call; callers may not pass them.
export const RESERVED_METADATA_KEYS = [
  "adapterType",
  "calledAt",
  "inputText",
] as const;

export class WrappedAgent {
  readonly adapter: AgentAdapter;
  readonly inputGuardrails: readonly InputGuardrail[];
  readonly outputGuardrails: readonly OutputGuardrail[];
  private readonly logEmitter: GuardrailLogEmitter;
  private recentResults: readonly GuardrailCheck[] = [];

  constructor(options: WrappedAgentOptions) {
    this.adapter = options.adapter;
    this.inputGuardrails = Object.freeze([...options.inputGuardrails]);
    this.outputGuardrails = Object.freeze([...options.outputGuardrails]);
    this.logEmitter = options.logEmitter ?? new GuardrailLogEmitter();
  }

  get adapterType(): AdapterType {
    return this.adapter.type;
  }

  get lastResults(): readonly GuardrailCheck[] {
    return this.recentResults;
  }

  stats(): WrappedAgentStats {
    return {
      adapterType: this.adapter.type,
      inputGuardrails: this.inputGuardrails.map((guardrail) => guardrail.name),
      outputGuardrails: this.outputGuardrails.map(
        (guardrail) => guardrail.name,
      ),
    };
  }

  async chat(
    text: string,
    metadata?: Record<string, unknown>,
  ): Promise<string> {
    const adapterType = this.adapter.type;
    const reserved = RESERVED_METADATA_KEYS.filter(
      (key) => typeof metadata !== "undefined" && key in metadata,
    );
    if (reserved.length > 0) {
      throw new ReservedMetadataKeyError(reserved);
    }

    const callMetadata: GuardrailMetadata = Object.freeze({
      ...(metadata ?? {}),
      adapterType,
      calledAt: new Date().toISOString(),
      inputText: text,
    });
    const checks: GuardrailCheck[] = [];

    try {
      return await this.guardedChat(text, callMetadata, checks);
    } finally {
      this.recentResults = Object.freeze(checks);
    }
  }

  private async guardedChat(
    text: string,
    callMetadata: GuardrailMetadata,
    checks: GuardrailCheck[],
  ): Promise<string> {
    const adapterType = this.adapter.type;
    await this.logEmitter.chatStarted(adapterType, text.length);

    const input = await this.runStage(
      { direction: "input", guardrails: this.inputGuardrails },
      text,
      callMetadata,
      checks,
    );
    this.throwIfBlocked("input", input);

    let response: string;
    await this.logEmitter.agentCallStarted(adapterType, input.text.length);
    try {
      response = await this.adapter.invoke(input.text);
    } catch (error) {
      await this.logEmitter.agentCallFailed(adapterType, error);
      if (error instanceof AdapterInvocationError) {
        throw error;
      }
      throw new AdapterInvocationError(
        adapterType,
        error instanceof Error ? error.message : String(error),
        error,
      );
    }
    await this.logEmitter.agentCallCompleted(adapterType, response.length);

    const output = await this.runStage(
      { direction: "output", guardrails: this.outputGuardrails },
      response,
      callMetadata,
      checks,
    );
    this.throwIfBlocked("output", output);

    await this.logEmitter.chatCompleted(adapterType, output.text.length);
    return output.text;
  }

  private async runStage(
    stage: PipelineGuardrails,
    text: string,
    metadata: GuardrailMetadata,
    checks: GuardrailCheck[],
  ): Promise<PipelineOutcome> {
    const outcome = await runGuardrailPipeline(
      stage,
      text,
      metadata,
      async (check) => {
        checks.push(check);
        await this.logEmitter.guardrailEvaluated(
          this.adapter.type,
          check.direction,
          check.guardrail,
          check.result,
        );
      },
    );

    if (outcome.blockedBy) {
      await this.logEmitter.chatBlocked(
        this.adapter.type,
        outcome.blockedBy.direction,
        outcome.blockedBy.guardrail,
        outcome.blockedBy.result.message,
      );
    }
    return outcome;
  }

  private throwIfBlocked(
    direction: GuardrailDirection,
    outcome: PipelineOutcome,
  ): void {
    const blocked = outcome.blockedBy;
    if (!blocked) {
      return;
    }
    throw new GuardrailViolation({
      guardrail: blocked.guardrail,
      direction,
      message: blocked.result.message,
      guardrailResult: blocked.result,
    });
  }
}
