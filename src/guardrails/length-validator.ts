import { z } from "zod";
import { ConfiguredGuardrail, type InputGuardrail } from "../guardrails";
import { failed, passed, warning, type GuardrailResult } from "../result";

const lengthValidatorConfigSchema = z
  .object({
    minLength: z.number().int().min(0, "minLength must be >= 0").default(1),
    maxLength: z
      .number()
      .int()
      .positive("maxLength must be > 0")
      .default(10_000),
    truncate: z.boolean().default(false),
    truncateSuffix: z.string().default("..."),
    enabled: z.boolean().default(true),
  })
  .strict()
  .refine((config) => config.minLength <= config.maxLength, {
    message: "minLength must be <= maxLength",
    path: ["minLength"],
  });

export type LengthValidatorConfig = z.input<typeof lengthValidatorConfigSchema>;

function codePoints(text: string): string[] {
  return Array.from(text);
}

export class LengthValidatorGuardrail
  extends ConfiguredGuardrail<typeof lengthValidatorConfigSchema>
  implements InputGuardrail
{
  constructor(
    name: string = "length_validator",
    config: LengthValidatorConfig = {},
  ) {
    super(name, lengthValidatorConfigSchema, config);
  }

  validate(inputText: string): GuardrailResult {
    const { minLength, maxLength, truncate, truncateSuffix } = this.config;
    const textLength = codePoints(inputText.trim()).length;

    if (textLength < minLength) {
      return failed(
        `Input too short: ${textLength} chars (minimum: ${minLength})`,
        { metadata: { originalLength: textLength, minLength } },
      );
    }

    if (textLength <= maxLength) {
      return passed(`Length validation passed: ${textLength} chars`, {
        metadata: { length: textLength },
      });
    }

    if (!truncate) {
      return failed(
        `Input too long: ${textLength} chars (maximum: ${maxLength})`,
        { metadata: { originalLength: textLength, maxLength } },
      );
    }

    const contentBudget = maxLength - codePoints(truncateSuffix).length;
    if (contentBudget <= 0) {
      return failed(
        `Input too long and cannot be truncated safely: ${textLength} chars`,
        { metadata: { originalLength: textLength, maxLength } },
      );
    }

    const truncated =
      codePoints(inputText).slice(0, contentBudget).join("") + truncateSuffix;
    const truncatedLength = codePoints(truncated).length;
    return warning(
      `Input truncated: ${textLength} -> ${truncatedLength} chars`,
      {
        modifiedContent: truncated,
        metadata: {
          originalLength: textLength,
          truncatedLength,
          maxLength,
          truncated: true,
        },
      },
    );
  }
}
