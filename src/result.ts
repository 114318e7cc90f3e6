export const GuardrailStatus = {
  PASSED: "passed",
  FAILED: "failed",
  WARNING: "warning",
} as const;

export type GuardrailStatus =
  (typeof GuardrailStatus)[keyof typeof GuardrailStatus];

export type GuardrailDirection = "input" | "output";

export type GuardrailMetadata = Readonly<Record<string, unknown>>;

export interface GuardrailResult {
  readonly status: GuardrailStatus;
  readonly message: string;
  readonly modifiedContent?: string;
  readonly metadata?: Readonly<Record<string, unknown>>;
}

export interface GuardrailResultOptions {
  modifiedContent?: string;
  metadata?: Record<string, unknown>;
}

export function createGuardrailResult(
  status: GuardrailStatus,
  message: string,
  options?: GuardrailResultOptions,
): GuardrailResult {
  const result: GuardrailResult = {
    status,
    message,
    ...(typeof options?.modifiedContent === "string"
      ? { modifiedContent: options.modifiedContent }
      : {}),
    ...(options?.metadata
      ? { metadata: Object.freeze({ ...options.metadata }) }
      : {}),
  };
  return Object.freeze(result);
}

export function passed(
  message: string,
  options?: GuardrailResultOptions,
): GuardrailResult {
  return createGuardrailResult(GuardrailStatus.PASSED, message, options);
}

export function warning(
  message: string,
  options?: GuardrailResultOptions,
): GuardrailResult {
  return createGuardrailResult(GuardrailStatus.WARNING, message, options);
}

export function failed(
  message: string,
  options?: Omit<GuardrailResultOptions, "modifiedContent">,
): GuardrailResult {
  return createGuardrailResult(GuardrailStatus.FAILED, message, options);
}

export function isFailure(result: GuardrailResult): boolean {
  return result.status === GuardrailStatus.FAILED;
}

const STATUSES: readonly string[] = Object.values(GuardrailStatus);

export function isGuardrailResult(value: unknown): value is GuardrailResult {
  if (typeof value !== "object" || value === null) {
    return false;
  }

  const status: unknown = Reflect.get(value, "status");
  const message: unknown = Reflect.get(value, "message");
  const modifiedContent: unknown = Reflect.get(value, "modifiedContent");
  return (
    typeof status === "string" &&
    STATUSES.includes(status) &&
    typeof message === "string" &&
    (typeof modifiedContent === "undefined" ||
      typeof modifiedContent === "string")
  );
}
