import type { AdapterConfig, AdapterType } from "./adapters/base";
import { describeAgentType } from "./adapters/base";
import { createAdapter } from "./adapters/resolver";
import { getDefaultLogger } from "./config";
import type { InputGuardrail, OutputGuardrail } from "./guardrails";
import { GuardrailLogEmitter } from "./log-emitter";
import type { GuardrailLogger } from "./logger";
import { WrappedAgent } from "./wrapped-agent";

export interface GuardrailsEngineOptions {
  logger?: GuardrailLogger;
}

export interface WrapAgentOptions {
  adapterType?: AdapterType | (string & {});
  adapterConfig?: AdapterConfig;
}

export interface GuardrailsEngineStats {
  inputGuardrails: number;
  outputGuardrails: number;
  totalGuardrails: number;
  inputGuardrailNames: string[];
  outputGuardrailNames: string[];
}

export class GuardrailsEngine {
  private readonly input: InputGuardrail[] = [];
  private readonly output: OutputGuardrail[] = [];
  private readonly logEmitter: GuardrailLogEmitter;

  constructor(options: GuardrailsEngineOptions = {}) {
    this.logEmitter = new GuardrailLogEmitter(
      options.logger ?? getDefaultLogger(),
    );
  }

  get inputGuardrails(): readonly InputGuardrail[] {
    return this.input;
  }

  get outputGuardrails(): readonly OutputGuardrail[] {
    return this.output;
  }

  addInputGuardrail(guardrail: InputGuardrail): this {
    this.input.push(guardrail);
    void this.logEmitter.guardrailRegistered("input", guardrail.name);
    return this;
  }

  addOutputGuardrail(guardrail: OutputGuardrail): this {
    this.output.push(guardrail);
    void this.logEmitter.guardrailRegistered("output", guardrail.name);
    return this;
  }

  wrapAgent(agent: unknown, options: WrapAgentOptions = {}): WrappedAgent {
    const adapter = createAdapter(
      agent,
      options.adapterType,
      options.adapterConfig,
    );
    const wrapped = new WrappedAgent({
      adapter,
      inputGuardrails: this.input,
      outputGuardrails: this.output,
      logEmitter: this.logEmitter,
    });
    void this.logEmitter.agentWrapped(
      adapter.type,
      describeAgentType(agent),
      wrapped.inputGuardrails.length,
      wrapped.outputGuardrails.length,
    );
    return wrapped;
  }

  stats(): GuardrailsEngineStats {
    return {
      inputGuardrails: this.input.length,
      outputGuardrails: this.output.length,
      totalGuardrails: this.input.length + this.output.length,
      inputGuardrailNames: this.input.map((guardrail) => guardrail.name),
      outputGuardrailNames: this.output.map((guardrail) => guardrail.name),
    };
  }
}
