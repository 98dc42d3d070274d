// types/index.ts

export type DocumentFormat = "pdf" | "docx";

export interface CategoryScores {
  hardSkills: number;      // 0–5
  softSkills: number;      // 0–5
  experience: number;      // 0–5
  qualifications: number;  // 0–5
}

export type CategoryKey = keyof CategoryScores;

export interface AnalysisResult {
  atsScore: number;        // 0–100, integer
  summary: string;
  categoryScores: CategoryScores;
  strengths: string[];
  weaknesses: string[];
  recommendations: string[];
}

/** Body of every non-2xx response from the analysis API. */
export interface ErrorBody {
  detail: string;
}

export interface ServiceInfo {
  message: string;
  status: "running";
  version: string;
  endpoints: Record<string, string>;
}

export interface HealthStatus {
  status: "healthy";
  message: string;
  gemini_configured: boolean;
}

/**
 * The résumé picked in the upload step. The native File stays in memory;
 * only its metadata is shown in the UI.
 */
export interface UploadedFile {
  id: string;
  name: string;
  type: string;
  size: number;
  file: File;
}
