// utils/parseAnalysis.ts
import type { AnalysisResult } from "@/types";
import { AnalysisSchema } from "@/utils/analysisSchema";
import type { AnalysisModel } from "@/utils/geminiClient.server";
import {
  AIInvocationError,
  causeMessage,
  ResponseParseError,
  ResponseSchemaError,
} from "@/utils/errors";
import { silentLogger, type Logger } from "@/utils/logger";

const FENCE = "```";

/**
 * Models sometimes wrap the JSON in a ```json block despite being told not
 * to. Returns what sits between the opening fence line and the last closing
 * fence (or the end of the text if it is never closed); unfenced text comes
 * back trimmed and otherwise untouched.
 */
export function stripCodeFence(raw: string): string {
  const text = raw.trim();
  if (!text.startsWith(FENCE)) return text;

  const lineEnd = text.indexOf("\n");
  if (lineEnd === -1) {
    // ```{...}``` on one line
    const inner = text.slice(FENCE.length);
    return (inner.endsWith(FENCE) ? inner.slice(0, -FENCE.length) : inner).trim();
  }

  const close = text.lastIndexOf(FENCE);
  const end = close > lineEnd ? close : text.length;
  return text.slice(lineEnd + 1, end).trim();
}

/** Cleans, parses and validates one raw model reply. */
export function parseAnalysisResponse(raw: string, logger: Logger = silentLogger): AnalysisResult {
  const cleaned = stripCodeFence(raw);

  let json: unknown;
  try {
    json = JSON.parse(cleaned);
  } catch (e) {
    logger.error("JSON parsing error:", causeMessage(e));
    logger.error("Response text:", raw);
    throw new ResponseParseError(e, raw);
  }

  const parsed = AnalysisSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path.length ? issue.path.join(".") : "response";
    logger.error(`Schema violation at ${field}: ${issue.message}`);
    logger.error("Response text:", raw);
    throw new ResponseSchemaError(field, raw);
  }
  return parsed.data;
}

/** One call to the model, no retry. Provider failures become AIInvocationError. */
export async function invokeModel(model: AnalysisModel, prompt: string): Promise<string> {
  try {
    return await model.generate(prompt);
  } catch (e) {
    throw new AIInvocationError(e);
  }
}

/**
 * invokeModel followed by parseAnalysisResponse: either a validated result
 * or AIInvocationError / ResponseParseError / ResponseSchemaError.
 */
export async function invokeAndParse(
  model: AnalysisModel,
  prompt: string,
  logger: Logger = silentLogger
): Promise<AnalysisResult> {
  const raw = await invokeModel(model, prompt);
  return parseAnalysisResponse(raw, logger);
}
