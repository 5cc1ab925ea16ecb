import { redirect } from 'next/navigation';
import DatabaseErrorNotice from '../../components/database-error-notice';
import { FlashMessages } from '../../components/flash-messages';
import { getSession } from '../../lib/auth';
import { accountExists } from '../../lib/credentials';
import { loadPageData } from '../../lib/cycle';
import { singleParams } from '../../lib/validation';

export const dynamic = 'force-dynamic';

export const metadata = {
  title: 'Staff portal | Campus Lost & Found'
};

interface StaffPageProps {
  searchParams: Record<string, string | string[] | undefined>;
}

const inputClass = 'rounded border border-slate-300 px-3 py-2';

export default function StaffPage({ searchParams }: StaffPageProps) {
  if (getSession().loggedIn) {
    redirect('/staff/items');
  }
  const { notice, error } = singleParams(searchParams);

  const page = loadPageData(accountExists);

  return (
    <div className="max-w-xl space-y-6">
      <h1 className="text-3xl font-bold text-brand">Staff portal</h1>
      <FlashMessages notice={notice} error={error} />
      {!page.ok ? (
        <DatabaseErrorNotice error={page.dbError} audience="staff" retryHref="/staff" />
      ) : (
        <>
          {!page.data ? (
            <section className="space-y-4 rounded border border-amber-300 bg-amber-50 p-4">
              <p className="text-sm text-amber-900">No teacher account found. Create the first teacher account.</p>
              <form method="post" action="/api/staff/accounts" className="space-y-3">
                <label className="flex flex-col gap-2 text-sm font-medium text-brand">
                  <span>Username</span>
                  <input name="username" className={inputClass} required autoComplete="username" />
                </label>
                <label className="flex flex-col gap-2 text-sm font-medium text-brand">
                  <span>Password</span>
                  <input name="password" type="password" className={inputClass} required autoComplete="new-password" />
                </label>
                <label className="flex flex-col gap-2 text-sm font-medium text-brand">
                  <span>Confirm password</span>
                  <input name="confirmPassword" type="password" className={inputClass} required autoComplete="new-password" />
                </label>
                <button type="submit" className="rounded bg-brand-accent px-4 py-2 text-sm font-semibold text-white">
                  Create admin
                </button>
              </form>
            </section>
          ) : null}
          <section className="space-y-4 rounded border border-slate-200 p-4">
            <h2 className="text-lg font-semibold text-brand">Teacher login</h2>
            <form method="post" action="/api/staff/login" className="space-y-3">
              <label className="flex flex-col gap-2 text-sm font-medium text-brand">
                <span>Username</span>
                <input name="username" className={inputClass} required autoComplete="username" />
              </label>
              <label className="flex flex-col gap-2 text-sm font-medium text-brand">
                <span>Password</span>
                <input name="password" type="password" className={inputClass} required autoComplete="current-password" />
              </label>
              <button type="submit" className="rounded bg-brand-accent px-4 py-2 text-sm font-semibold text-white">
                Login
              </button>
            </form>
          </section>
        </>
      )}
    </div>
  );
}
