"use client";

import {
  CartesianGrid,
  LabelList,
  Line,
  LineChart,
  ResponsiveContainer,
  Tooltip,
  XAxis,
  YAxis,
} from "recharts";
import type { CategoryRow } from "@/utils/formatAnalysis";

type Props = {
  rows: CategoryRow[];
};

const oneDecimal = (v: unknown) => (typeof v === "number" ? v.toFixed(1) : String(v));

export default function CategoryChart({ rows }: Props) {
  return (
    <div className="h-56 rounded-xl bg-[#12061F] p-3">
      <ResponsiveContainer width="100%" height="100%">
        <LineChart data={rows} margin={{ top: 20, right: 16, bottom: 4, left: -16 }}>
          <CartesianGrid stroke="#2a1d48" vertical={false} />
          <XAxis dataKey="label" tick={{ fill: "#ffffff", fontSize: 11 }} tickLine={false} axisLine={false} />
          <YAxis
            domain={[0, 5]}
            ticks={[0, 1, 2, 3, 4, 5]}
            tick={{ fill: "#B6AEDC", fontSize: 11 }}
            tickLine={false}
            axisLine={false}
          />
          <Tooltip formatter={oneDecimal} />
          <Line
            type="monotone"
            dataKey="score"
            stroke="#9A8CFF"
            strokeWidth={2.5}
            dot={{ r: 5, fill: "#7B6CF6", stroke: "#ffffff", strokeWidth: 1.5 }}
            isAnimationActive={false}
          >
            <LabelList
              dataKey="score"
              position="top"
              fill="#ffffff"
              fontSize={11}
              formatter={oneDecimal}
            />
          </Line>
        </LineChart>
      </ResponsiveContainer>
    </div>
  );
}
