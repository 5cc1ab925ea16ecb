import Link from 'next/link';
import DatabaseErrorNotice from '../../../components/database-error-notice';
import { FlashMessages } from '../../../components/flash-messages';
import { ItemActionButton } from '../../../components/item-action-button';
import { ItemCard } from '../../../components/item-card';
import { StaffNav } from '../../../components/staff-nav';
import { requireStaff } from '../../../lib/auth';
import { loadPageData } from '../../../lib/cycle';
import { listItems } from '../../../lib/items';
import { singleParams } from '../../../lib/validation';

export const dynamic = 'force-dynamic';

export const metadata = {
  title: 'History & archive | Campus Lost & Found'
};

interface HistoryPageProps {
  searchParams: Record<string, string | string[] | undefined>;
}

export default function HistoryPage({ searchParams }: HistoryPageProps) {
  const session = requireStaff();
  const { notice, error, view: requestedView } = singleParams(searchParams);
  const view = requestedView === 'archived' ? 'archived' : 'collected';
  const page = loadPageData((db) => listItems(db, { status: view }));

  return (
    <div className="space-y-8">
      <StaffNav username={session.username} current="/staff/history" />
      <FlashMessages notice={notice} error={error} />
      <h1 className="text-2xl font-bold text-brand">History and archived items</h1>
      <div className="flex gap-2 text-sm font-medium">
        <Link href="/staff/history?view=collected" aria-current={view === 'collected' ? 'page' : undefined}>
          Collected history
        </Link>
        <Link href="/staff/history?view=archived" aria-current={view === 'archived' ? 'page' : undefined}>
          Archived
        </Link>
      </div>
      {!page.ok ? (
        <DatabaseErrorNotice error={page.dbError} audience="staff" retryHref={`/staff/history?view=${view}`} />
      ) : page.data.length === 0 ? (
        <p className="text-sm text-slate-600">No items.</p>
      ) : (
        <ol className="space-y-4">
          {page.data.map((item) => (
            <li key={item.id}>
              <ItemCard
                item={item}
                actions={
                  <>
                    {view === 'archived' ? (
                      <ItemActionButton itemId={item.id} intent="restore" label="Restore to lost" />
                    ) : null}
                    <ItemActionButton itemId={item.id} intent="delete" label="Delete permanently" />
                  </>
                }
              />
            </li>
          ))}
        </ol>
      )}
    </div>
  );
}
