// utils/formatAnalysis.ts
import type { AnalysisResult, CategoryKey } from "@/types";

export const CATEGORY_LABELS: Record<CategoryKey, string> = {
  hardSkills: "Hard Skills",
  softSkills: "Soft Skills",
  experience: "Experience",
  qualifications: "Qualifications",
};

const CATEGORY_ORDER: CategoryKey[] = ["hardSkills", "softSkills", "experience", "qualifications"];

export type CategoryRow = { key: CategoryKey; label: string; score: number };

/** Category scores in display order, for the chart and the report. */
export function categoryRows(result: AnalysisResult): CategoryRow[] {
  return CATEGORY_ORDER.map((key) => ({
    key,
    label: CATEGORY_LABELS[key],
    score: result.categoryScores[key],
  }));
}

function numbered(items: string[]): string {
  return items.length ? items.map((s, i) => `${i + 1}. ${s}`).join("\n") : "—";
}

export function formatAnalysisMarkdown(r: AnalysisResult): string {
  const categories = categoryRows(r)
    .map((c) => `* **${c.label}:** ${c.score.toFixed(1)} / 5`)
    .join("\n");

  return `## Resume Analysis — **ATS Score ${r.atsScore}/100**

**Summary**
${r.summary || "—"}

**Category Scores**

${categories}

**Strengths**
${numbered(r.strengths)}

**Areas for Improvement**
${numbered(r.weaknesses)}

**Recommendations**
${numbered(r.recommendations)}
`;
}
