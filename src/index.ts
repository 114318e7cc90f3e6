export { GuardrailsEngine } from "./engine";
export type {
  GuardrailsEngineOptions,
  GuardrailsEngineStats,
  WrapAgentOptions,
} from "./engine";
export { RESERVED_METADATA_KEYS, WrappedAgent } from "./wrapped-agent";
export type { WrappedAgentOptions, WrappedAgentStats } from "./wrapped-agent";
export { runGuardrailPipeline } from "./pipeline";
export type {
  GuardrailCheck,
  GuardrailCheckListener,
  PipelineGuardrails,
  PipelineOutcome,
} from "./pipeline";
export {
  GuardrailStatus,
  createGuardrailResult,
  failed,
  isFailure,
  isGuardrailResult,
  passed,
  warning,
} from "./result";
export type {
  GuardrailDirection,
  GuardrailMetadata,
  GuardrailResult,
  GuardrailResultOptions,
} from "./result";
export {
  ConfiguredGuardrail,
  defineInputGuardrail,
  defineOutputGuardrail,
} from "./guardrails";
export type {
  GuardrailConfig,
  InputGuardrail,
  OutputGuardrail,
} from "./guardrails";
export { LengthValidatorGuardrail } from "./guardrails/length-validator";
export type { LengthValidatorConfig } from "./guardrails/length-validator";
export { PIIFilterGuardrail } from "./guardrails/pii-filter";
export type {
  PIIDetection,
  PIIFilterConfig,
  PIIType,
} from "./guardrails/pii-filter";
export { ADAPTER_TYPES, isAdapterType } from "./adapters/base";
export type { AdapterConfig, AdapterType, AgentAdapter } from "./adapters/base";
export { ChatAdapter } from "./adapters/chat";
export type { ChatAgent } from "./adapters/chat";
export { InvokeAdapter } from "./adapters/invoke";
export type { InvokeAdapterConfig, InvokeAgent } from "./adapters/invoke";
export { RunAdapter } from "./adapters/run";
export type { RunAgent } from "./adapters/run";
export { CallableAdapter, FunctionAdapter } from "./adapters/callable";
export type { AgentFunction, CallableAgent } from "./adapters/callable";
export { OpenAIClientAdapter } from "./adapters/openai-client";
export type {
  ChatCompletionMessage,
  ChatCompletionRequest,
  ChatCompletionRequestOptions,
  OpenAIClientAdapterConfig,
  OpenAIClientLike,
} from "./adapters/openai-client";
export { CustomAdapter } from "./adapters/custom";
export type {
  CustomAdapterConfig,
  CustomInputTransform,
  CustomOutputTransform,
} from "./adapters/custom";
export {
  DETECTION_ORDER,
  createAdapter,
  detectAgentInterface,
} from "./adapters/resolver";
export {
  AdapterInvocationError,
  GuardrailViolation,
  GuardrailsError,
  InvalidAdapterConfigError,
  InvalidGuardrailConfigError,
  ReservedMetadataKeyError,
  UnknownAdapterTypeError,
  UnsupportedAgentInterfaceError,
} from "./errors";
export type { GuardrailViolationResult } from "./errors";
export { createStdoutLogger } from "./logger";
export type {
  GuardrailLogEvent,
  GuardrailLogLevel,
  GuardrailLogger,
  StdoutLoggerOptions,
} from "./logger";
export { GuardrailLogEmitter } from "./log-emitter";
export {
  clearDefaultLogger,
  getDefaultLogger,
  setDefaultLogger,
} from "./config";
export { setupLogging } from "./logging-setup";
export type { SetupLoggingOptions } from "./logging-setup";
