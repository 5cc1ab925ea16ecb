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
  title: 'Manage items | Campus Lost & Found'
};

interface ManageItemsPageProps {
  searchParams: Record<string, string | string[] | undefined>;
}

const inputClass = 'rounded border border-slate-300 px-3 py-2';

export default function ManageItemsPage({ searchParams }: ManageItemsPageProps) {
  const session = requireStaff();
  const { notice, error } = singleParams(searchParams);
  const page = loadPageData((db) => listItems(db, { status: 'lost' }));

  return (
    <div className="space-y-8">
      <StaffNav username={session.username} current="/staff/items" />
      <FlashMessages notice={notice} error={error} />

      <section className="max-w-2xl space-y-4">
        <h1 className="text-2xl font-bold text-brand">Add lost item</h1>
        <form method="post" action="/api/staff/items" encType="multipart/form-data" className="space-y-3">
          <label className="flex flex-col gap-2 text-sm font-medium text-brand">
            <span>Item description</span>
            <input name="description" placeholder="e.g., Black wallet with student ID" className={inputClass} required />
          </label>
          <label className="flex flex-col gap-2 text-sm font-medium text-brand">
            <span>Where it was found</span>
            <input name="foundLocation" placeholder="e.g., Library, ground floor" className={inputClass} required />
          </label>
          <label className="flex flex-col gap-2 text-sm font-medium text-brand">
            <span>Where to collect</span>
            <input name="collectLocation" placeholder="e.g., Admin office" className={inputClass} required />
          </label>
          <label className="flex flex-col gap-2 text-sm font-medium text-brand">
            <span>Photo of item (optional)</span>
            <input name="image" type="file" accept="image/png,image/jpeg" />
          </label>
          <button type="submit" className="rounded bg-brand-accent px-4 py-2 text-sm font-semibold text-white">
            Add item
          </button>
        </form>
      </section>

      <section className="space-y-4">
        <h2 className="text-2xl font-semibold text-brand">Current lost items</h2>
        {!page.ok ? (
          <DatabaseErrorNotice error={page.dbError} audience="staff" retryHref="/staff/items" />
        ) : page.data.length === 0 ? (
          <p className="text-sm text-slate-600">No current lost items.</p>
        ) : (
          <ol className="space-y-4">
            {page.data.map((item) => (
              <li key={item.id}>
                <ItemCard
                  item={item}
                  actions={
                    <>
                      <ItemActionButton itemId={item.id} intent="collect" label="Mark collected" />
                      <ItemActionButton itemId={item.id} intent="archive" label="Archive" />
                    </>
                  }
                />
              </li>
            ))}
          </ol>
        )}
      </section>
    </div>
  );
}
