"use client";

export const STEPS = ["Job Description", "Upload Resume", "Results"] as const;

type Props = {
  /** 1-based index into STEPS */
  currentStep: number;
};

export default function ProgressBar({ currentStep }: Props) {
  const pct = Math.max(0, Math.min(100, Math.round((currentStep / STEPS.length) * 100)));
  return (
    <div className="mb-6">
      <div className="h-2 bg-violet-100 rounded-full overflow-hidden">
        <div className="h-full bg-violet-600 transition-all" style={{ width: `${pct}%` }} />
      </div>
      <ol className="mt-2 flex justify-between text-xs text-gray-500">
        {STEPS.map((label, i) => (
          <li key={label} className={i + 1 <= currentStep ? "text-violet-700 font-medium" : ""}>
            {i + 1}. {label}
          </li>
        ))}
      </ol>
    </div>
  );
}
