import Link from 'next/link';
import { ReactNode } from 'react';
import { formatItemDate, imageUrl, truncate } from '../lib/format';
import type { ItemRecord } from '../types/item';
import { StatusBadge } from './status-badge';

interface ItemCardProps {
  item: ItemRecord;
  actions?: ReactNode;
}

export function ItemCard({ item, actions }: ItemCardProps) {
  const headingId = `item-${item.id}`;
  const photo = imageUrl(item.imagePath);

  return (
    <article aria-labelledby={headingId} className="flex gap-4 rounded-lg border border-slate-200 p-4 shadow-sm">
      <div className="h-28 w-28 shrink-0 overflow-hidden rounded border border-slate-200 bg-slate-50">
        {photo ? (
          <img src={photo} alt={`Photo of ${item.description}`} className="h-full w-full object-cover" />
        ) : (
          <p className="flex h-full items-center justify-center text-xs text-slate-500">No image</p>
        )}
      </div>
      <div className="flex flex-1 flex-col gap-2">
        <div className="flex items-center justify-between gap-2">
          <StatusBadge status={item.status} />
          <span className="text-xs uppercase tracking-wide text-slate-500">ID {item.id}</span>
        </div>
        <h2 id={headingId} className="text-lg font-semibold text-brand">
          <Link href={`/items/${item.id}`}>{truncate(item.description, 80)}</Link>
        </h2>
        <dl className="grid gap-1 text-sm text-slate-600 sm:grid-cols-2">
          <div>
            <dt className="inline font-medium text-slate-900">Found at: </dt>
            <dd className="inline">{item.foundLocation}</dd>
          </div>
          <div>
            <dt className="inline font-medium text-slate-900">Collect at: </dt>
            <dd className="inline">{item.collectLocation}</dd>
          </div>
          <div>
            <dt className="inline font-medium text-slate-900">Uploaded: </dt>
            <dd className="inline">{formatItemDate(item.uploadedAt)}</dd>
          </div>
          {item.collectedAt ? (
            <div>
              <dt className="inline font-medium text-slate-900">Collected: </dt>
              <dd className="inline">{formatItemDate(item.collectedAt)}</dd>
            </div>
          ) : null}
        </dl>
        {actions ? <div className="flex flex-wrap gap-2 pt-1">{actions}</div> : null}
      </div>
    </article>
  );
}
