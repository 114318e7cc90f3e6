import { runAdapterUnitTests } from "./adapters.unit";
import { runEngineUnitTests } from "./engine.unit";
import { runLengthValidatorUnitTests } from "./length-validator.unit";
import { runLoggerUnitTests } from "./logger.unit";
import { runLoggingSetupUnitTests } from "./logging-setup.unit";
import { runPIIFilterUnitTests } from "./pii-filter.unit";
import { runPipelineUnitTests } from "./pipeline.unit";
import { runResolverUnitTests } from "./resolver.unit";
import { runResultUnitTests } from "./result.unit";

async function main(): Promise<void> {
  await runResultUnitTests();
  await runLengthValidatorUnitTests();
  await runPIIFilterUnitTests();
  await runAdapterUnitTests();
  await runResolverUnitTests();
  await runPipelineUnitTests();
  await runEngineUnitTests();
  await runLoggerUnitTests();
  await runLoggingSetupUnitTests();
  process.stdout.write("Unit tests passed.\n");
}

main().catch((error) => {
  const message =
    error instanceof Error ? `${error.name}: ${error.message}` : String(error);
  process.stderr.write(`${message}\n`);
  process.exit(1);
});
