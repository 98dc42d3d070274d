// utils/http.server.ts
import { NextResponse } from "next/server";
import type { AnalysisResult, ErrorBody, HealthStatus, ServiceInfo } from "@/types";
import type { ResumeAnalyzer } from "@/utils/analyzer.server";
import { isGeminiConfigured, type AppConfig } from "@/utils/config";
import { AnalyzerError } from "@/utils/errors";
import { silentLogger, type Logger } from "@/utils/logger";

export const API_VERSION = "1.0.0";

export function serviceInfo(): ServiceInfo {
  return {
    message: "AI Resume Analyzer API",
    status: "running",
    version: API_VERSION,
    endpoints: {
      health: "/api/resume/health",
      analyze: "/api/resume/analyze (POST)",
      app: "/job-description",
    },
  };
}

export function healthStatus(config: AppConfig): HealthStatus {
  return {
    status: "healthy",
    message: "Resume Analyzer API is running!",
    gemini_configured: isGeminiConfigured(config),
  };
}

/** `{ detail }` with the error's own status; anything unknown is a bare 500. */
export function toErrorResponse(e: unknown): NextResponse<ErrorBody> {
  if (e instanceof AnalyzerError) {
    return NextResponse.json({ detail: e.message }, { status: e.status });
  }
  return NextResponse.json({ detail: "Internal server error" }, { status: 500 });
}

export function createInfoHandler() {
  return function GET() {
    return NextResponse.json(serviceInfo());
  };
}

export function createHealthHandler(config: AppConfig) {
  return function GET() {
    return NextResponse.json(healthStatus(config));
  };
}

/**
 * POST multipart handler: `resumeFile` (File) + `jobDescription` (text).
 * The configuration is checked before the body is read.
 */
export function createAnalyzeHandler(analyzer: ResumeAnalyzer, logger: Logger = silentLogger) {
  return async function POST(req: Request): Promise<NextResponse<AnalysisResult | ErrorBody>> {
    try {
      analyzer.assertReady();
    } catch (e) {
      logger.error(e instanceof Error ? e.message : e);
      return toErrorResponse(e);
    }

    let form: FormData;
    try {
      form = await req.formData();
    } catch (e) {
      logger.warn("Unreadable request body:", e instanceof Error ? e.message : e);
      return NextResponse.json(
        { detail: "Request body must be multipart/form-data" },
        { status: 400 }
      );
    }

    const rawFile = form.get("resumeFile");
    const rawJD = form.get("jobDescription");

    try {
      const result = await analyzer.analyze({
        file: rawFile === null || typeof rawFile === "string" ? null : rawFile,
        jobDescription: typeof rawJD === "string" ? rawJD : null,
      });
      return NextResponse.json(result, { status: 200 });
    } catch (e) {
      return toErrorResponse(e);
    }
  };
}
