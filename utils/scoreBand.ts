// utils/scoreBand.ts
export type ScoreBand = "good" | "fair" | "poor";

export function scoreBand(atsScore: number): ScoreBand {
  if (atsScore >= 80) return "good";
  if (atsScore >= 60) return "fair";
  return "poor";
}

export const BAND_STYLES: Record<ScoreBand, string> = {
  good: "bg-emerald-50 border-emerald-200 text-emerald-800",
  fair: "bg-amber-50 border-amber-200 text-amber-800",
  poor: "bg-rose-50 border-rose-200 text-rose-800",
};
