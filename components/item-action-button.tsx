import type { ItemIntent } from '../lib/validation';

const STYLES: Record<ItemIntent, string> = {
  collect: 'bg-emerald-600 text-white',
  archive: 'border border-slate-300 text-slate-800',
  restore: 'bg-brand-accent text-white',
  delete: 'bg-rose-600 text-white'
};

interface ItemActionButtonProps {
  itemId: number;
  intent: ItemIntent;
  label: string;
}

export function ItemActionButton({ itemId, intent, label }: ItemActionButtonProps) {
  return (
    <form method="post" action={`/api/staff/items/${itemId}`}>
      <input type="hidden" name="id" value={itemId} />
      <input type="hidden" name="intent" value={intent} />
      <button type="submit" className={`rounded px-3 py-1 text-sm font-semibold ${STYLES[intent]}`}>
        {label}
      </button>
    </form>
  );
}
