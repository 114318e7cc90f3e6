import { setDefaultLogger } from "./config";
import {
  LOG_LEVELS,
  createStdoutLogger,
  type GuardrailLogLevel,
  type GuardrailLogger,
  type StdoutLoggerOptions,
} from "./logger";

export type SetupLoggingOptions = StdoutLoggerOptions;

function isLogLevel(value: string): value is GuardrailLogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function resolveMinLevel(
  explicitLevel: GuardrailLogLevel | undefined,
): GuardrailLogLevel | undefined {
  if (explicitLevel) {
    return explicitLevel;
  }

  const byEnv = process.env.GUARDRAILS_LOG_LEVEL?.trim().toLowerCase();
  if (!byEnv) {
    return undefined;
  }
  if (!isLogLevel(byEnv)) {
    throw new Error(
      `Invalid GUARDRAILS_LOG_LEVEL "${byEnv}". Expected one of: ${LOG_LEVELS.join(", ")}.`,
    );
  }
  return byEnv;
}

function resolvePretty(explicitPretty: boolean | undefined): boolean {
  if (typeof explicitPretty === "boolean") {
    return explicitPretty;
  }

  const byEnv = process.env.GUARDRAILS_LOG_PRETTY?.trim().toLowerCase();
  return byEnv === "true" || byEnv === "1";
}

export function setupLogging(
  options: SetupLoggingOptions = {},
): GuardrailLogger {
  const logger = createStdoutLogger({
    ...options,
    minLevel: resolveMinLevel(options.minLevel),
    pretty: resolvePretty(options.pretty),
  });
  setDefaultLogger(logger);
  return logger;
}
