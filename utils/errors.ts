// utils/errors.ts
import type { DocumentFormat } from "@/types";

export type ErrorKind =
  | "validation"
  | "unsupported-format"
  | "extraction"
  | "insufficient-content"
  | "configuration"
  | "ai-invocation"
  | "response-parse"
  | "response-schema";

/**
 * Base class for every failure the analyzer knows how to report.
 * `status` is the HTTP status the route handlers answer with; `message`
 * becomes the `detail` of the error body.
 */
export abstract class AnalyzerError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly status: 400 | 500;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Caller input is missing or malformed. */
export class ValidationError extends AnalyzerError {
  readonly kind = "validation";
  readonly status = 400;
}

export class UnsupportedFormatError extends AnalyzerError {
  readonly kind = "unsupported-format";
  readonly status = 400;

  constructor(
    readonly extension: string,
    readonly supported: readonly DocumentFormat[]
  ) {
    super(
      `Unsupported file format: ${extension}. Only ${supported
        .map((s) => s.toUpperCase())
        .join(" and ")} are supported.`
    );
  }
}

/** The reader library could not make sense of the uploaded bytes. */
export class ExtractionError extends AnalyzerError {
  readonly kind = "extraction";
  readonly status = 400;

  constructor(readonly format: DocumentFormat, cause: unknown) {
    super(`Error extracting ${format.toUpperCase()}: ${causeMessage(cause)}`, { cause });
  }
}

export class InsufficientContentError extends AnalyzerError {
  readonly kind = "insufficient-content";
  readonly status = 400;

  constructor(readonly length: number) {
    super(
      "Could not extract enough text from resume. Please ensure the file is not corrupted or password-protected."
    );
  }
}

export class ConfigurationError extends AnalyzerError {
  readonly kind = "configuration";
  readonly status = 500;

  constructor() {
    super("Gemini API key not configured. Please add GEMINI_API_KEY to .env file");
  }
}

export class AIInvocationError extends AnalyzerError {
  readonly kind = "ai-invocation";
  readonly status = 500;

  constructor(cause: unknown) {
    super(`Error calling Gemini AI: ${causeMessage(cause)}`, { cause });
  }
}

export class ResponseParseError extends AnalyzerError {
  readonly kind = "response-parse";
  readonly status = 500;

  /** Model output as received; logged, never sent to the client. */
  readonly rawResponse: string;

  constructor(cause: unknown, rawResponse: string) {
    super(`Failed to parse AI response as JSON: ${causeMessage(cause)}`, { cause });
    this.rawResponse = rawResponse;
  }
}

export class ResponseSchemaError extends AnalyzerError {
  readonly kind = "response-schema";
  readonly status = 500;

  readonly rawResponse: string;

  constructor(readonly field: string, rawResponse: string) {
    super(`AI response is missing or has an invalid field: ${field}`);
    this.rawResponse = rawResponse;
  }
}

/** Message of an unknown thrown value. */
export function causeMessage(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}
