// utils/api.ts - browser-side client for the analysis API
import type { AnalysisResult } from "@/types";
import { AnalysisSchema, ErrorBodySchema } from "@/utils/analysisSchema";

/** The only timeout in the system: how long the UI waits for one analysis. */
export const ANALYZE_TIMEOUT_MS = 60_000;

export const TIMEOUT_MESSAGE = "Request timeout. The analysis is taking too long.";
export const CONNECTION_MESSAGE = "Cannot connect to the analysis service.";

export class ApiError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = "ApiError";
  }
}

type Options = {
  baseUrl?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
};

/** `detail` of an error body, if the body is one. */
function readDetail(raw: string): string | null {
  try {
    const parsed = ErrorBodySchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data.detail : null;
  } catch {
    return null;
  }
}

export async function analyzeResume(
  file: File,
  jobDescription: string,
  { baseUrl = "", timeoutMs = ANALYZE_TIMEOUT_MS, fetchImpl = fetch }: Options = {}
): Promise<AnalysisResult> {
  const form = new FormData();
  form.append("resumeFile", file, file.name);
  form.append("jobDescription", jobDescription);

  // the timeout also covers reading the body
  let res: Response;
  let raw: string;
  try {
    res = await fetchImpl(`${baseUrl}/api/resume/analyze`, {
      method: "POST",
      body: form,
      signal: AbortSignal.timeout(timeoutMs),
    });
    raw = await res.text();
  } catch (e) {
    if (e instanceof Error && (e.name === "TimeoutError" || e.name === "AbortError")) {
      throw new ApiError(TIMEOUT_MESSAGE);
    }
    throw new ApiError(CONNECTION_MESSAGE);
  }

  if (!res.ok) {
    throw new ApiError(readDetail(raw) ?? `Analyze failed (${res.status})`, res.status);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new ApiError(`Expected JSON but got: ${raw.slice(0, 200)}`, res.status);
  }
  const parsed = AnalysisSchema.safeParse(json);
  if (!parsed.success) {
    throw new ApiError("The analysis service returned an incomplete result.", res.status);
  }
  return parsed.data;
}
