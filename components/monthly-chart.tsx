import { formatMonth } from '../lib/format';
import type { MonthlyCount } from '../types/item';

export function MonthlyChart({ counts }: { counts: MonthlyCount[] }) {
  const max = Math.max(1, ...counts.map((entry) => entry.count));
  const total = counts.reduce((sum, entry) => sum + entry.count, 0);

  if (total === 0) {
    return <p className="text-sm text-slate-600">No data for chart.</p>;
  }

  return (
    <figure className="space-y-2">
      <div className="flex h-48 items-end gap-2" role="img" aria-label={`${total} items reported over the last ${counts.length} months`}>
        {counts.map((entry) => (
          <div key={entry.month} className="flex flex-1 flex-col items-center justify-end gap-1">
            <span className="text-xs text-slate-600">{entry.count}</span>
            <div
              className="w-full rounded-t bg-brand-accent"
              style={{ height: `${(entry.count / max) * 100}%`, minHeight: entry.count ? '4px' : 0 }}
            />
          </div>
        ))}
      </div>
      <figcaption className="flex gap-2 text-[10px] uppercase tracking-wide text-slate-500">
        {counts.map((entry) => (
          <span key={entry.month} className="flex-1 text-center">
            {formatMonth(entry.month)}
          </span>
        ))}
      </figcaption>
    </figure>
  );
}
