import type { GuardrailLogger } from "./logger";

let defaultLogger: GuardrailLogger | null = null;

export function setDefaultLogger(logger: GuardrailLogger): void {
  defaultLogger = logger;
}

export function clearDefaultLogger(): void {
  defaultLogger = null;
}

export function getDefaultLogger(): GuardrailLogger | undefined {
  return defaultLogger ?? undefined;
}
