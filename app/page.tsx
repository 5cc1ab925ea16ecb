import { Suspense } from 'react';
import BrowseFilters from '../components/browse-filters';
import DatabaseErrorNotice from '../components/database-error-notice';
import { ItemCard } from '../components/item-card';
import { MonthlyChart } from '../components/monthly-chart';
import { loadPageData } from '../lib/cycle';
import { getMonthlyItemCounts, listItems } from '../lib/items';
import { BrowseFilterSchema, browseDateRange, singleParams } from '../lib/validation';

export const dynamic = 'force-dynamic';

interface HomePageProps {
  searchParams: Record<string, string | string[] | undefined>;
}

export default function HomePage({ searchParams }: HomePageProps) {
  const filter = BrowseFilterSchema.parse(singleParams(searchParams));
  const page = loadPageData((db) => ({
    items: listItems(db, { status: filter.view, dateRange: browseDateRange(filter) }),
    monthly: getMonthlyItemCounts(db)
  }));

  return (
    <div className="space-y-10">
      <section className="space-y-4">
        <h1 className="text-3xl font-bold text-brand">Browse lost items</h1>
        <p className="max-w-3xl text-lg text-slate-600">
          Everything handed in around campus is listed here with where it was found and where to collect it. No
          sign-in needed.
        </p>
        <Suspense fallback={<p>Loading filters…</p>}>
          <BrowseFilters />
        </Suspense>
      </section>
      {!page.ok ? (
        <DatabaseErrorNotice error={page.dbError} audience="public" retryHref="/" />
      ) : (
        <>
          <section className="space-y-4" aria-live="polite">
            {page.data.items.length === 0 ? (
              <p className="rounded border border-slate-300 bg-slate-50 p-4 text-sm text-slate-700" role="status">
                No items found.
              </p>
            ) : (
              <ol className="space-y-4">
                {page.data.items.map((item) => (
                  <li key={item.id}>
                    <ItemCard item={item} />
                  </li>
                ))}
              </ol>
            )}
          </section>
          <section className="space-y-4 rounded-lg border border-slate-200 bg-slate-50 p-6">
            <h2 className="text-xl font-semibold text-brand">Monthly lost items (last 12 months)</h2>
            <MonthlyChart counts={page.data.monthly} />
          </section>
        </>
      )}
    </div>
  );
}
