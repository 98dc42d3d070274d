// utils/services.server.ts
// Process-wide wiring: configuration is read once, here, and handed to
// everything else.
import { createResumeAnalyzer } from "@/utils/analyzer.server";
import { loadConfig } from "@/utils/config";
import { createGeminiModel } from "@/utils/geminiClient.server";
import { createLogger } from "@/utils/logger";

export const config = loadConfig();
export const logger = createLogger("resume-analyzer", config.logLevel);

const model = createGeminiModel(config);
if (!model) {
  logger.warn("WARNING: GEMINI_API_KEY not found; every analysis will fail until it is set.");
} else {
  logger.info(`Gemini AI configured (${config.geminiModel})`);
}

export const analyzer = createResumeAnalyzer({
  config,
  model,
  logger: logger.child("analyze"),
});
