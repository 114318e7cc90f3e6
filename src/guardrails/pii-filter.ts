import { z } from "zod";
import { ConfiguredGuardrail, type OutputGuardrail } from "../guardrails";
import { failed, passed, warning, type GuardrailResult } from "../result";

const piiFilterConfigSchema = z
  .object({
    maskEmails: z.boolean().default(true),
    maskPhones: z.boolean().default(true),
    maskCreditCards: z.boolean().default(true),
    maskSsn: z.boolean().default(true),
    replacement: z.string().default("[REDACTED]"),
    strictMode: z.boolean().default(false),
    enabled: z.boolean().default(true),
  })
  .strict();

export type PIIFilterConfig = z.input<typeof piiFilterConfigSchema>;

export type PIIType = "email" | "phone" | "credit_card" | "ssn";

interface PIIPattern {
  type: PIIType;
  description: string;
  pattern: RegExp;
}

export interface PIIDetection {
  type: PIIType;
  description: string;
  start: number;
  end: number;
}

const EMAIL_PATTERNS: PIIPattern[] = [
  {
    type: "email",
    description: "Email address",
    pattern: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g,
  },
];

const PHONE_PATTERNS: PIIPattern[] = [
  /\b\d{3}-\d{3}-\d{4}\b/g,
  /\(\d{3}\)\s*\d{3}-\d{4}\b/g,
  /\b\d{3}\.\d{3}\.\d{4}\b/g,
  /\b\d{10}\b/g,
].map((pattern, index): PIIPattern => ({
  type: "phone",
  description: `Phone number (format ${index + 1})`,
  pattern,
}));

const CREDIT_CARD_PATTERNS: PIIPattern[] = [
  {
    type: "credit_card",
    description: "Credit card number",
    pattern: /\b\d{4}[-\s]?\d{4}[-\s]?\d{4}[-\s]?\d{4}\b/g,
  },
];

const SSN_PATTERNS: PIIPattern[] = [
  /\b\d{3}-\d{2}-\d{4}\b/g,
  /\b\d{9}\b/g,
].map((pattern, index): PIIPattern => ({
  type: "ssn",
  description: `Social Security Number (format ${index + 1})`,
  pattern,
}));

export class PIIFilterGuardrail
  extends ConfiguredGuardrail<typeof piiFilterConfigSchema>
  implements OutputGuardrail
{
  private readonly patterns: readonly PIIPattern[];

  constructor(name: string = "pii_filter", config: PIIFilterConfig = {}) {
    super(name, piiFilterConfigSchema, config);
    this.patterns = [
      ...(this.config.maskEmails ? EMAIL_PATTERNS : []),
      ...(this.config.maskPhones ? PHONE_PATTERNS : []),
      ...(this.config.maskCreditCards ? CREDIT_CARD_PATTERNS : []),
      ...(this.config.maskSsn ? SSN_PATTERNS : []),
    ];
  }

  detect(text: string): PIIDetection[] {
    const detections: PIIDetection[] = [];

    for (const { type, description, pattern } of this.patterns) {
      for (const match of text.matchAll(pattern)) {
        const start = match.index ?? 0;
        detections.push({
          type,
          description,
          start,
          end: start + match[0].length,
        });
      }
    }

    return detections;
  }

  mask(text: string, detections: readonly PIIDetection[]): string {
    const spans = mergeSpans(detections);
    let masked = "";
    let cursor = 0;

    for (const span of spans) {
      masked += text.slice(cursor, span.start) + this.config.replacement;
      cursor = span.end;
    }

    return masked + text.slice(cursor);
  }

  filter(outputText: string): GuardrailResult {
    const detections = this.detect(outputText);

    if (detections.length === 0) {
      return passed("No PII detected in output", {
        metadata: { piiDetected: false, piiCount: 0 },
      });
    }

    const piiTypes = [...new Set(detections.map((detection) => detection.type))];
    const piiSummary: Partial<Record<PIIType, number>> = {};
    for (const detection of detections) {
      piiSummary[detection.type] = (piiSummary[detection.type] ?? 0) + 1;
    }
    const metadata = {
      piiDetected: true,
      piiCount: detections.length,
      piiTypes,
      piiSummary,
    };

    if (this.config.strictMode) {
      return failed(
        `Response blocked due to PII detection: ${piiTypes.join(", ")}`,
        { metadata },
      );
    }

    return warning(
      `PII masked in output: ${detections.length} instances of ${piiTypes.join(", ")}`,
      {
        modifiedContent: this.mask(outputText, detections),
        metadata: { ...metadata, masked: true },
      },
    );
  }
}

function mergeSpans(
  detections: readonly PIIDetection[],
): Array<{ start: number; end: number }> {
  const sorted = [...detections].sort(
    (left, right) => left.start - right.start || right.end - left.end,
  );
  const merged: Array<{ start: number; end: number }> = [];

  for (const { start, end } of sorted) {
    const last = merged[merged.length - 1];
    if (last && start < last.end) {
      last.end = Math.max(last.end, end);
      continue;
    }
    merged.push({ start, end });
  }

  return merged;
}
