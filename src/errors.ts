import type { AdapterType } from "./adapters/base";
import type { GuardrailDirection, GuardrailResult } from "./result";

export class GuardrailsError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export interface GuardrailViolationResult {
  guardrail: string;
  direction: GuardrailDirection;
  message: string;
  guardrailResult: GuardrailResult;
}

export class GuardrailViolation extends GuardrailsError {
  result: GuardrailViolationResult;

  constructor(result: GuardrailViolationResult, options?: ErrorOptions) {
    super(
      `${result.direction === "input" ? "Input" : "Output"} blocked by guardrail "${result.guardrail}": ${result.message}`,
      options,
    );
    this.result = result;
  }
}

export class AdapterInvocationError extends GuardrailsError {
  adapterType: AdapterType;

  constructor(adapterType: AdapterType, message: string, cause?: unknown) {
    super(
      `Agent call through "${adapterType}" adapter failed: ${message}`,
      typeof cause === "undefined" ? undefined : { cause },
    );
    this.adapterType = adapterType;
  }
}

export class UnsupportedAgentInterfaceError extends GuardrailsError {
  agentType: string;
  capabilities: string[];

  constructor(agentType: string, capabilities: string[], detail?: string) {
    const available =
      capabilities.length > 0 ? capabilities.join(", ") : "none";
    super(
      `${detail ?? "Unable to detect agent interface."} Agent type: ${agentType}. Available methods: ${available}. Pass adapterType: "custom" with a methodName to wrap it explicitly.`,
    );
    this.agentType = agentType;
    this.capabilities = capabilities;
  }
}

export class UnknownAdapterTypeError extends GuardrailsError {
  adapterType: string;
  availableTypes: readonly AdapterType[];

  constructor(adapterType: string, availableTypes: readonly AdapterType[]) {
    super(
      `Unsupported adapter type: "${adapterType}". Available types: ${availableTypes.join(", ")}`,
    );
    this.adapterType = adapterType;
    this.availableTypes = availableTypes;
  }
}

export class InvalidAdapterConfigError extends GuardrailsError {
  adapterType: AdapterType;
  issues: string[];

  constructor(adapterType: AdapterType, issues: string[]) {
    super(
      `Invalid configuration for "${adapterType}" adapter: ${issues.join("; ")}`,
    );
    this.adapterType = adapterType;
    this.issues = issues;
  }
}

export class InvalidGuardrailConfigError extends GuardrailsError {
  guardrail: string;
  issues: string[];

  constructor(guardrail: string, issues: string[]) {
    super(
      `Invalid configuration for guardrail "${guardrail}": ${issues.join("; ")}`,
    );
    this.guardrail = guardrail;
    this.issues = issues;
  }
}

export class ReservedMetadataKeyError extends GuardrailsError {
  keys: string[];

  constructor(keys: string[]) {
    super(
      `Call metadata may not set reserved key(s): ${keys.join(", ")}`,
    );
    this.keys = keys;
  }
}
