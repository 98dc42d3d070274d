"use client";

import { useState } from "react";
import { useRouter } from "next/navigation";
import { AlertTriangle, CheckCircle2, Lightbulb } from "lucide-react";
import CategoryChart from "@/components/CategoryChart";
import FeedbackList from "@/components/FeedbackList";
import ProgressBar from "@/components/ProgressBar";
import ScoreDonut from "@/components/ScoreDonut";
import { useApp } from "@/contexts/AppContext";
import { categoryRows, formatAnalysisMarkdown } from "@/utils/formatAnalysis";
import { BAND_STYLES, scoreBand } from "@/utils/scoreBand";

export default function ResultsPage() {
  const router = useRouter();
  const { state, dispatch } = useApp();
  const result = state.analysisResult;
  const [copied, setCopied] = useState(false);

  async function handleCopy() {
    if (!result) return;
    try {
      await navigator.clipboard.writeText(formatAnalysisMarkdown(result));
      setCopied(true);
      setTimeout(() => setCopied(false), 1400);
    } catch (e) {
      console.warn("Clipboard write failed:", e);
    }
  }

  function handleStartOver() {
    dispatch({ type: "RESET" });
    router.push("/job-description");
  }

  if (!result) {
    return (
      <div className="max-w-6xl mx-auto px-4 py-10">
        <ProgressBar currentStep={3} />
        <h1 className="text-2xl font-bold">Detailed Analysis</h1>
        <p className="mt-4 text-gray-600">
          Upload a resume and provide a job description to see the detailed analysis here.
        </p>
        <button
          onClick={() => router.push("/job-description")}
          className="mt-6 px-5 py-2.5 rounded-lg bg-violet-600 text-white hover:bg-violet-700"
        >
          Get Started
        </button>
      </div>
    );
  }

  const band = scoreBand(result.atsScore);

  return (
    <div className="max-w-6xl mx-auto px-4 py-10">
      <ProgressBar currentStep={3} />

      <div className="flex items-center justify-between">
        <h1 className="text-2xl font-bold">Analysis Results</h1>
        <div className="flex items-center gap-2">
          <button
            onClick={handleCopy}
            className="px-3 py-1.5 rounded-md bg-slate-100 hover:bg-slate-200 text-sm"
          >
            {copied ? "Copied!" : "Copy as Text"}
          </button>
          <button
            onClick={handleStartOver}
            className="px-3 py-1.5 rounded-md bg-slate-100 hover:bg-slate-200 text-sm"
          >
            Start Over
          </button>
        </div>
      </div>

      {/* Score + summary */}
      <div className="mt-6 rounded-xl border border-gray-200 bg-white p-4">
        <div className="text-xs text-gray-500">ATS Score</div>
        <div className="text-3xl font-semibold">{result.atsScore}/100</div>
        <div className="mt-2 h-2 bg-gray-200 rounded-full overflow-hidden">
          <div className="h-full bg-violet-600" style={{ width: `${result.atsScore}%` }} />
        </div>
        <p className={`mt-4 rounded-lg border p-3 text-sm whitespace-pre-wrap ${BAND_STYLES[band]}`}>
          {result.summary}
        </p>
      </div>

      {/* Charts */}
      <div className="mt-6 grid grid-cols-1 gap-4 md:grid-cols-2">
        <ScoreDonut score={result.atsScore} />
        <CategoryChart rows={categoryRows(result)} />
      </div>

      {/* Feedback */}
      <div className="mt-6 grid grid-cols-1 gap-4 md:grid-cols-3">
        <FeedbackList title="Strengths" items={result.strengths} icon={CheckCircle2} color="text-emerald-600" />
        <FeedbackList
          title="Areas for Improvement"
          items={result.weaknesses}
          icon={AlertTriangle}
          color="text-amber-700"
        />
        <FeedbackList
          title="Recommendations"
          items={result.recommendations}
          icon={Lightbulb}
          color="text-violet-700"
        />
      </div>
    </div>
  );
}
