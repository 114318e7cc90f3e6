import "dotenv/config";
import {
  GuardrailViolation,
  GuardrailsEngine,
  LengthValidatorGuardrail,
  PIIFilterGuardrail,
  setupLogging,
} from "../index";

class SupportAgent {
  chat(text: string): string {
    return `Thanks for writing. We will reply to ${text} shortly.`;
  }
}

class WorkflowAgent {
  invoke(input: { input: string }): { output: string } {
    return { output: `Workflow handled: ${input.input}` };
  }
}

class TicketFormatter {
  format(text: string, options: { priority: string }): string {
    return `[${options.priority}] ${text}`;
  }
}

async function main(): Promise<void> {
  // GUARDRAILS_LOG_LEVEL and GUARDRAILS_LOG_PRETTY tune the output.
  setupLogging();

  const engine = new GuardrailsEngine()
    .addInputGuardrail(
      new LengthValidatorGuardrail("length", {
        maxLength: 60,
        truncate: true,
      }),
    )
    .addOutputGuardrail(new PIIFilterGuardrail("pii"));

  const agents = [
    engine.wrapAgent(new SupportAgent()),
    engine.wrapAgent(new WorkflowAgent()),
    engine.wrapAgent((text: string) => `Echo: ${text} (call 555-123-4567)`),
    engine.wrapAgent(new TicketFormatter(), {
      adapterType: "custom",
      adapterConfig: {
        methodName: "format",
        inputTransform: (text: string) => [text, { priority: "high" }],
        outputTransform: (raw: unknown) => String(raw),
      },
    }),
  ];

  for (const agent of agents) {
    const reply = await agent.chat("jane@example.com");
    process.stdout.write(`${agent.adapterType}: ${reply}\n`);
  }

  const strict = new GuardrailsEngine()
    .addOutputGuardrail(new PIIFilterGuardrail("pii", { strictMode: true }))
    .wrapAgent(new SupportAgent());
  try {
    await strict.chat("jane@example.com");
  } catch (error) {
    if (!(error instanceof GuardrailViolation)) {
      throw error;
    }
    process.stdout.write(`Blocked: ${error.message}\n`);
  }

  process.stdout.write(`\nEngine: ${JSON.stringify(engine.stats())}\n`);
}

main().catch((error) => {
  const message =
    error instanceof Error ? `${error.name}: ${error.message}` : String(error);
  process.stderr.write(`${message}\n`);
  process.exit(1);
});
