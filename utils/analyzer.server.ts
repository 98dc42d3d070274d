// utils/analyzer.server.ts
import type { AnalysisResult } from "@/types";
import { isGeminiConfigured, type AppConfig } from "@/utils/config";
import {
  AnalyzerError,
  ConfigurationError,
  InsufficientContentError,
  ValidationError,
} from "@/utils/errors";
import { extensionOf, isSupportedFormat, SUPPORTED_FORMATS } from "@/utils/documentFormat";
import { documentTextExtractor, type TextExtractor } from "@/utils/extractText.server";
import type { AnalysisModel } from "@/utils/geminiClient.server";
import { silentLogger, type Logger } from "@/utils/logger";
import { invokeModel, parseAnalysisResponse } from "@/utils/parseAnalysis";
import { buildPrompt } from "@/utils/prompt";

/** Anything shorter is treated as a scanned, empty or broken document. */
export const MIN_TEXT_LENGTH = 50;

export type AnalysisStage =
  | "received"
  | "validated"
  | "text-extracted"
  | "prompted"
  | "ai-invoked"
  | "parsed"
  | "returned"
  | "failed";

/** The part of a File the analyzer touches. */
export interface ResumeUpload {
  name: string;
  arrayBuffer(): Promise<ArrayBuffer>;
}

export interface AnalyzeInput {
  file: ResumeUpload | null;
  jobDescription: string | null;
}

export interface AnalyzerDeps {
  config: AppConfig;
  /** null when no API key was configured at startup */
  model: AnalysisModel | null;
  extractor?: TextExtractor;
  logger?: Logger;
  onStage?: (stage: AnalysisStage) => void;
}

export interface ResumeAnalyzer {
  /** Throws ConfigurationError when analyses cannot run at all. */
  assertReady(): void;
  analyze(input: AnalyzeInput): Promise<AnalysisResult>;
}

/**
 * Runs one request through
 * received → validated → text-extracted → prompted → ai-invoked → parsed → returned,
 * stopping at the first failure. Nothing is read from the upload until the
 * configuration and the form fields have been checked.
 */
export function createResumeAnalyzer({
  config,
  model,
  extractor = documentTextExtractor,
  logger = silentLogger,
  onStage,
}: AnalyzerDeps): ResumeAnalyzer {
  function assertReady() {
    if (!isGeminiConfigured(config) || !model) throw new ConfigurationError();
  }

  async function analyze(input: AnalyzeInput): Promise<AnalysisResult> {
    const advance = (stage: AnalysisStage) => {
      logger.debug(`stage → ${stage}`);
      onStage?.(stage);
    };

    advance("received");
    try {
      if (!isGeminiConfigured(config) || !model) throw new ConfigurationError();

      const { file, jobDescription } = input;
      if (!file) throw new ValidationError("Resume file is required");
      if (!jobDescription || !jobDescription.trim()) {
        throw new ValidationError("Job description is required");
      }
      if (!isSupportedFormat(extensionOf(file.name))) {
        throw new ValidationError(`Invalid file type. Allowed: ${SUPPORTED_FORMATS.join(", ")}`);
      }
      advance("validated");

      logger.info(`Reading file: ${file.name}`);
      const bytes = new Uint8Array(await file.arrayBuffer());
      const text = await extractor.extract(file.name, bytes);
      const length = text.trim().length;
      if (length < MIN_TEXT_LENGTH) throw new InsufficientContentError(length);
      logger.info(`Extracted ${text.length} characters`);
      advance("text-extracted");

      const prompt = buildPrompt(text, jobDescription);
      advance("prompted");

      logger.info("Analyzing with Gemini AI...");
      const raw = await invokeModel(model, prompt);
      advance("ai-invoked");
      const result = parseAnalysisResponse(raw, logger);
      advance("parsed");

      logger.info("Returning analysis results");
      advance("returned");
      return result;
    } catch (e) {
      advance("failed");
      if (e instanceof AnalyzerError) {
        const line = `[${e.kind}] ${e.message}`;
        if (e.status >= 500) logger.error(line);
        else logger.warn(line);
      } else {
        logger.error("Unexpected error:", e);
      }
      throw e;
    }
  }

  return { assertReady, analyze };
}
