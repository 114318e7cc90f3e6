import {
  isGuardrailEnabled,
  type InputGuardrail,
  type OutputGuardrail,
} from "./guardrails";
import {
  failed,
  isFailure,
  isGuardrailResult,
  type GuardrailDirection,
  type GuardrailMetadata,
  type GuardrailResult,
} from "./result";

export interface GuardrailCheck {
  direction: GuardrailDirection;
  guardrail: string;
  result: GuardrailResult;
}

export interface PipelineOutcome {
  text: string;
  checks: GuardrailCheck[];
  blockedBy?: GuardrailCheck;
}

export type PipelineGuardrails =
  | { direction: "input"; guardrails: readonly InputGuardrail[] }
  | { direction: "output"; guardrails: readonly OutputGuardrail[] };

export type GuardrailCheckListener = (
  check: GuardrailCheck,
) => Promise<void> | void;

interface PipelineStep {
  name: string;
  enabled: boolean;
  run: (text: string, metadata: GuardrailMetadata) => unknown;
}

function toSteps(stage: PipelineGuardrails): PipelineStep[] {
  if (stage.direction === "input") {
    return stage.guardrails.map((guardrail): PipelineStep => ({
      name: guardrail.name,
      enabled: isGuardrailEnabled(guardrail),
      run: (text, metadata) => guardrail.validate(text, metadata),
    }));
  }

  return stage.guardrails.map((guardrail): PipelineStep => ({
    name: guardrail.name,
    enabled: isGuardrailEnabled(guardrail),
    run: (text, metadata) => guardrail.filter(text, metadata),
  }));
}

function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function evaluateStep(
  direction: GuardrailDirection,
  step: PipelineStep,
  text: string,
  metadata: GuardrailMetadata,
): Promise<GuardrailResult> {
  let rawResult: unknown;
  try {
    rawResult = await step.run(text, metadata);
  } catch (error) {
    return failed(
      `Error in ${direction} guardrail ${step.name}: ${toErrorMessage(error)}`,
    );
  }

  if (!isGuardrailResult(rawResult)) {
    return failed(`Guardrail ${step.name} returned an invalid result`);
  }
  return rawResult;
}

export async function runGuardrailPipeline(
  stage: PipelineGuardrails,
  text: string,
  metadata: GuardrailMetadata,
  onCheck?: GuardrailCheckListener,
): Promise<PipelineOutcome> {
  const checks: GuardrailCheck[] = [];
  let current = text;

  for (const step of toSteps(stage)) {
    if (!step.enabled) {
      continue;
    }

    const result = await evaluateStep(stage.direction, step, current, metadata);
    const check: GuardrailCheck = {
      direction: stage.direction,
      guardrail: step.name,
      result,
    };
    checks.push(check);
    await onCheck?.(check);

    // The first failure stops the stage; its modifiedContent is dropped.
    if (isFailure(result)) {
      return { text: current, checks, blockedBy: check };
    }

    if (typeof result.modifiedContent === "string") {
      current = result.modifiedContent;
    }
  }

  return { text: current, checks };
}
