import assert from "node:assert/strict";
import {
  GuardrailsEngine,
  clearDefaultLogger,
  getDefaultLogger,
  setDefaultLogger,
  setupLogging,
} from "../../index";
import { EchoChatAgent } from "../support/agents";
import { RecordingLogger } from "../support/recording-logger";

const ENV_KEYS = ["GUARDRAILS_LOG_LEVEL", "GUARDRAILS_LOG_PRETTY"] as const;
type LoggingEnvKey = (typeof ENV_KEYS)[number];

async function withEnv(
  values: Partial<Record<LoggingEnvKey, string>>,
  run: () => Promise<void> | void,
): Promise<void> {
  const previous = new Map<LoggingEnvKey, string | undefined>();
  for (const key of ENV_KEYS) {
    previous.set(key, process.env[key]);
    const next = values[key];
    if (typeof next === "string") {
      process.env[key] = next;
    } else {
      delete process.env[key];
    }
  }

  try {
    await run();
  } finally {
    for (const [key, value] of previous) {
      if (typeof value === "string") {
        process.env[key] = value;
      } else {
        delete process.env[key];
      }
    }
    clearDefaultLogger();
  }
}

export async function runLoggingSetupUnitTests(): Promise<void> {
  await withEnv({}, () => {
    assert.equal(getDefaultLogger(), undefined);
    const recording = new RecordingLogger();
    setDefaultLogger(recording);
    assert.equal(getDefaultLogger(), recording);
    clearDefaultLogger();
    assert.equal(getDefaultLogger(), undefined);
  });

  await withEnv({}, async () => {
    const recording = new RecordingLogger();
    setDefaultLogger(recording);
    const engine = new GuardrailsEngine();
    await engine.wrapAgent(new EchoChatAgent()).chat("hi");
    assert.equal(recording.types().includes("chat_completed"), true);
  });

  await withEnv(
    { GUARDRAILS_LOG_LEVEL: " WARN ", GUARDRAILS_LOG_PRETTY: "1" },
    () => {
      const writes: string[] = [];
      const logger = setupLogging({
        write: (message) => {
          writes.push(message);
        },
      });
      assert.equal(getDefaultLogger(), logger);

      logger.log({
        timestamp: "2026-01-01T00:00:00.000Z",
        level: "info",
        type: "chat_completed",
        adapter: "chat",
        outputLength: 2,
      });
      logger.log({
        timestamp: "2026-01-01T00:00:00.000Z",
        level: "warn",
        type: "chat_blocked",
        adapter: "chat",
        direction: "input",
        guardrailName: "length",
        reason: "too short",
      });
      assert.deepEqual(writes, [
        "[warn] chat_blocked adapter=chat input=length reason=too short\n",
      ]);
    },
  );

  await withEnv({ GUARDRAILS_LOG_LEVEL: "debug" }, () => {
    const writes: string[] = [];
    const logger = setupLogging({
      minLevel: "error",
      pretty: false,
      write: (message) => {
        writes.push(message);
      },
    });
    logger.log({
      timestamp: "2026-01-01T00:00:00.000Z",
      level: "warn",
      type: "chat_started",
      adapter: "run",
      inputLength: 1,
    });
    assert.deepEqual(writes, []);
  });

  await withEnv({ GUARDRAILS_LOG_LEVEL: "verbose" }, () => {
    assert.throws(
      () => setupLogging(),
      (error: unknown) => {
        assert.ok(error instanceof Error);
        assert.equal(
          error.message,
          'Invalid GUARDRAILS_LOG_LEVEL "verbose". Expected one of: debug, info, warn, error.',
        );
        return true;
      },
    );
    assert.equal(getDefaultLogger(), undefined);
  });
}
