"use client";

import { Cell, Pie, PieChart, ResponsiveContainer } from "recharts";

type Props = {
  score: number; // 0–100
};

const FILLED = "#7B6CF6";
const TRACK = "#3A2D66";

export default function ScoreDonut({ score }: Props) {
  const clamped = Math.max(0, Math.min(100, score));
  const data = [
    { name: "score", value: clamped },
    { name: "rest", value: 100 - clamped },
  ];

  return (
    <div className="relative h-56 rounded-xl bg-[#12061F] p-2">
      <ResponsiveContainer width="100%" height="100%">
        <PieChart>
          <Pie
            data={data}
            dataKey="value"
            startAngle={90}
            endAngle={-270}
            innerRadius="62%"
            outerRadius="80%"
            stroke="#12061F"
            isAnimationActive={false}
          >
            <Cell fill={FILLED} />
            <Cell fill={TRACK} />
          </Pie>
        </PieChart>
      </ResponsiveContainer>
      <div className="pointer-events-none absolute inset-0 flex flex-col items-center justify-center">
        <span className="text-3xl font-bold text-white">{clamped}%</span>
        <span className="text-xs text-[#B6AEDC]">ATS Score</span>
      </div>
    </div>
  );
}
