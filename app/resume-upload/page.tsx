// app/resume-upload/page.tsx
"use client";

import { useState } from "react";
import { useRouter } from "next/navigation";
import UploadBox from "@/components/UploadBox";
import ProgressBar from "@/components/ProgressBar";
import { useApp } from "@/contexts/AppContext";
import type { UploadedFile } from "@/types";
import { analyzeResume } from "@/utils/api";

export default function ResumeUploadPage() {
  const router = useRouter();
  const { state, dispatch } = useApp();
  const { jobDescription, uploadedFile, loading } = state;

  const [error, setError] = useState<string | null>(null);

  const setFile = (file: UploadedFile | null) => {
    dispatch({ type: "SET_UPLOADED_FILE", payload: file });
  };

  async function handleAnalyze() {
    setError(null);

    if (!jobDescription.trim()) {
      setError("Please provide a job description first.");
      return;
    }
    if (!uploadedFile) {
      setError("Please upload a resume file");
      return;
    }

    try {
      dispatch({ type: "SET_LOADING", payload: true });
      const result = await analyzeResume(uploadedFile.file, jobDescription);
      dispatch({ type: "SET_ANALYSIS_RESULT", payload: result });
      router.push("/results");
    } catch (e) {
      setError(e instanceof Error ? e.message : "Failed to analyze resume.");
    } finally {
      dispatch({ type: "SET_LOADING", payload: false });
    }
  }

  return (
    <main className="max-w-4xl mx-auto px-4 py-8">
      <ProgressBar currentStep={2} />

      <h1 className="text-3xl font-extrabold mb-2 bg-gradient-to-r from-violet-500 via-purple-500 to-fuchsia-600 bg-clip-text text-transparent">
        Upload Resume
      </h1>
      <p className="text-gray-600 mb-6">
        Upload one PDF or DOCX. It will be analyzed against your job description.
      </p>

      <UploadBox uploadedFile={uploadedFile} onFileChange={setFile} />

      <div className="mt-6 flex items-center gap-3">
        <button
          onClick={handleAnalyze}
          disabled={loading || !uploadedFile}
          className="px-5 py-2.5 rounded-xl bg-gradient-to-r from-violet-600 to-fuchsia-600 text-white disabled:opacity-50 shadow hover:opacity-95"
        >
          {loading ? "Analyzing resume with AI…" : "Analyze Resume"}
        </button>

        <button
          onClick={() => router.push("/job-description")}
          disabled={loading}
          className="px-5 py-2.5 rounded-xl border border-gray-300 text-gray-700 hover:bg-gray-50"
        >
          Back
        </button>
      </div>

      {error && <div className="mt-4 text-red-600">{error}</div>}
    </main>
  );
}
