// utils/geminiClient.server.ts
import {
  GoogleGenerativeAI,
  HarmBlockThreshold,
  HarmCategory,
} from "@google/generative-ai";
import type { AppConfig } from "@/utils/config";

/** "Given a prompt, return a completion" - all the analyzer needs from an LLM. */
export interface AnalysisModel {
  generate(prompt: string): Promise<string>;
}

/** ─────────────────────── Safety / JSON ─────────────────── */
// Résumés routinely mention weapons training, medical work, etc.
const safetySettings = [
  { category: HarmCategory.HARM_CATEGORY_HATE_SPEECH, threshold: HarmBlockThreshold.BLOCK_NONE },
  { category: HarmCategory.HARM_CATEGORY_DANGEROUS_CONTENT, threshold: HarmBlockThreshold.BLOCK_NONE },
  { category: HarmCategory.HARM_CATEGORY_SEXUALLY_EXPLICIT, threshold: HarmBlockThreshold.BLOCK_NONE },
  { category: HarmCategory.HARM_CATEGORY_HARASSMENT, threshold: HarmBlockThreshold.BLOCK_NONE },
];
const SYS = `You MUST return only valid JSON. No markdown.`;

/**
 * Gemini-backed model, or null when no API key was configured. A single
 * generateContent call per prompt; errors propagate as thrown by the SDK.
 */
export function createGeminiModel(config: AppConfig): AnalysisModel | null {
  if (!config.geminiApiKey) return null;

  const genAI = new GoogleGenerativeAI(config.geminiApiKey);
  const model = genAI.getGenerativeModel({
    model: config.geminiModel,
    systemInstruction: SYS,
    generationConfig: {
      temperature: 0,
      responseMimeType: "application/json",
    },
    safetySettings,
  });

  return {
    async generate(prompt) {
      const res = await model.generateContent(prompt);
      return res.response.text();
    },
  };
}
