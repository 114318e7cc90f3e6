import type { z } from "zod";
import { InvalidGuardrailConfigError } from "./errors";
import type { GuardrailMetadata, GuardrailResult } from "./result";

export type GuardrailConfig = Record<string, unknown>;

interface GuardrailBase {
  name: string;
  enabled?: boolean;
}

export interface InputGuardrail extends GuardrailBase {
  validate: (
    inputText: string,
    metadata: GuardrailMetadata,
  ) => Promise<GuardrailResult> | GuardrailResult;
}

export interface OutputGuardrail extends GuardrailBase {
  filter: (
    outputText: string,
    metadata: GuardrailMetadata,
  ) => Promise<GuardrailResult> | GuardrailResult;
}

export function defineInputGuardrail(
  guardrail: InputGuardrail,
): InputGuardrail {
  return guardrail;
}

export function defineOutputGuardrail(
  guardrail: OutputGuardrail,
): OutputGuardrail {
  return guardrail;
}

export function isGuardrailEnabled(guardrail: GuardrailBase): boolean {
  return guardrail.enabled !== false;
}

export function formatSchemaIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

export abstract class ConfiguredGuardrail<TSchema extends z.ZodTypeAny>
  implements GuardrailBase
{
  readonly name: string;
  readonly config: Readonly<z.output<TSchema>>;
  enabled: boolean;

  protected constructor(name: string, schema: TSchema, config: unknown) {
    this.name = name;
    const parsed = schema.safeParse(config ?? {});
    if (!parsed.success) {
      throw new InvalidGuardrailConfigError(
        name,
        formatSchemaIssues(parsed.error),
      );
    }
    this.config = Object.freeze(parsed.data);
    this.enabled = readEnabled(parsed.data);
  }

  toString(): string {
    return `${this.constructor.name}(name='${this.name}', enabled=${this.enabled})`;
  }
}

function readEnabled(config: unknown): boolean {
  if (typeof config !== "object" || config === null) {
    return true;
  }
  return !("enabled" in config) || config.enabled !== false;
}
