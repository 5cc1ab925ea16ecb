'use client';

import { usePathname, useRouter, useSearchParams } from 'next/navigation';

const VIEWS = [
  { value: 'lost', label: 'All current lost items' },
  { value: 'collected', label: 'History (collected)' },
  { value: 'archived', label: 'Archived' }
] as const;

export default function BrowseFilters() {
  const router = useRouter();
  const params = useSearchParams();
  const pathname = usePathname();

  const setParams = (updates: Record<string, string>) => {
    const next = new URLSearchParams(params.toString());
    for (const [key, value] of Object.entries(updates)) {
      if (value) {
        next.set(key, value);
      } else {
        next.delete(key);
      }
    }
    router.replace(`${pathname}?${next.toString()}`);
  };

  const dateFilter = Boolean(params.get('from') || params.get('to'));

  return (
    <form className="grid gap-4 border border-slate-200 p-4 md:grid-cols-3" aria-label="Filter items">
      <label className="flex flex-col gap-2 text-sm">
        <span>Show</span>
        <select
          value={params.get('view') ?? 'lost'}
          onChange={(event) => setParams({ view: event.target.value })}
          className="rounded border border-slate-300 px-2 py-1"
        >
          {VIEWS.map((view) => (
            <option key={view.value} value={view.value}>
              {view.label}
            </option>
          ))}
        </select>
      </label>
      <label className="flex items-center gap-2 text-sm">
        <input
          type="checkbox"
          checked={dateFilter}
          onChange={(event) => {
            if (event.target.checked) {
              const today = new Date();
              const start = new Date(today.getTime() - 90 * 24 * 60 * 60 * 1000);
              setParams({ from: start.toISOString().slice(0, 10), to: today.toISOString().slice(0, 10) });
            } else {
              setParams({ from: '', to: '' });
            }
          }}
        />
        Filter by upload date
      </label>
      {dateFilter ? (
        <div className="flex gap-2 text-sm">
          <label className="flex flex-col gap-1">
            <span>From</span>
            <input
              type="date"
              value={params.get('from') ?? ''}
              onChange={(event) => setParams({ from: event.target.value })}
              className="rounded border border-slate-300 px-2 py-1"
            />
          </label>
          <label className="flex flex-col gap-1">
            <span>To</span>
            <input
              type="date"
              value={params.get('to') ?? ''}
              onChange={(event) => setParams({ to: event.target.value })}
              className="rounded border border-slate-300 px-2 py-1"
            />
          </label>
        </div>
      ) : null}
    </form>
  );
}
