import { STATUS_LABELS } from '../lib/format';
import type { ItemStatus } from '../types/item';

const COLORS: Record<ItemStatus, string> = {
  lost: 'bg-sky-100 text-sky-800',
  collected: 'bg-emerald-100 text-emerald-800',
  archived: 'bg-amber-100 text-amber-800'
};

const ICONS: Record<ItemStatus, string> = {
  lost: '🔴',
  collected: '✅',
  archived: '📦'
};

export function StatusBadge({ status }: { status: ItemStatus }) {
  return (
    <span
      className={`inline-flex items-center gap-2 rounded-full px-2 py-1 text-xs font-semibold uppercase tracking-wide ${COLORS[status]}`}
      aria-label={`Status: ${STATUS_LABELS[status]}`}
    >
      <span aria-hidden>{ICONS[status]}</span>
      {STATUS_LABELS[status]}
    </span>
  );
}
