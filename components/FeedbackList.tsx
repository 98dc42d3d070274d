// components/FeedbackList.tsx
import type { LucideIcon } from "lucide-react";

type Props = {
  title: string;
  items: string[];
  icon: LucideIcon;
  color?: string;
};

/** Numbered feedback block: strengths, weaknesses or recommendations. */
export default function FeedbackList({ title, items, icon: Icon, color }: Props) {
  return (
    <section className="rounded-xl border border-gray-200 bg-white p-4">
      <h3 className={`flex items-center gap-2 text-sm font-semibold mb-3 ${color || ""}`}>
        <Icon className="h-4 w-4" />
        {title}
      </h3>
      {items.length ? (
        <ol className="space-y-2 text-sm">
          {items.map((s, i) => (
            <li key={`${i}-${s}`} className="flex gap-2">
              <span className="font-semibold">{i + 1}.</span>
              <span>{s}</span>
            </li>
          ))}
        </ol>
      ) : (
        <div className="text-sm text-gray-400">—</div>
      )}
    </section>
  );
}
