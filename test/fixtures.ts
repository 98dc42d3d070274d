// test/fixtures.ts - shared test data
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import type { AnalysisResult } from "@/types";
import type { AppConfig } from "@/utils/config";
import type { AnalysisModel } from "@/utils/geminiClient.server";

export function fixtureBytes(name: string): Uint8Array {
  return new Uint8Array(readFileSync(fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url))));
}

export function fixtureFile(name: string, type: string): File {
  return new File([new Uint8Array(fixtureBytes(name))], name, { type });
}

export const PDF_TYPE = "application/pdf";
export const DOCX_TYPE =
  "application/vnd.openxmlformats-officedocument.wordprocessingml.document";

export const sampleResult: AnalysisResult = {
  atsScore: 82,
  summary: "Solid backend profile with the Python and SQL depth the role asks for.",
  categoryScores: { hardSkills: 4, softSkills: 3, experience: 4, qualifications: 3.5 },
  strengths: ["Python", "SQL", "Five years of backend work"],
  weaknesses: ["No cloud certifications", "Little mention of testing", "Short summary section"],
  recommendations: ["Quantify impact", "List frameworks used", "Add a projects section"],
};

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    geminiApiKey: "test-secret",
    geminiModel: "gemini-2.5-flash",
    allowedOrigins: ["http://localhost:8501"],
    logLevel: "silent",
    ...overrides,
  };
}

/** Model stand-in that records prompts and answers with a fixed reply. */
export function fakeModel(reply: string | (() => Promise<string>)) {
  const prompts: string[] = [];
  const model: AnalysisModel = {
    async generate(prompt) {
      prompts.push(prompt);
      return typeof reply === "string" ? reply : reply();
    },
  };
  return { model, prompts };
}
