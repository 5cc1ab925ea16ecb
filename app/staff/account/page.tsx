import DatabaseErrorNotice from '../../../components/database-error-notice';
import { FlashMessages } from '../../../components/flash-messages';
import { StaffNav } from '../../../components/staff-nav';
import { requireStaff } from '../../../lib/auth';
import { loadPageData } from '../../../lib/cycle';
import { singleParams } from '../../../lib/validation';

export const dynamic = 'force-dynamic';

export const metadata = {
  title: 'Account | Campus Lost & Found'
};

interface AccountPageProps {
  searchParams: Record<string, string | string[] | undefined>;
}

const inputClass = 'rounded border border-slate-300 px-3 py-2';

export default function AccountPage({ searchParams }: AccountPageProps) {
  const session = requireStaff();
  const page = loadPageData(() => null);
  const { notice, error } = singleParams(searchParams);

  return (
    <div className="space-y-8">
      <StaffNav username={session.username} current="/staff/account" />
      <FlashMessages notice={notice} error={error} />
      {!page.ok ? <DatabaseErrorNotice error={page.dbError} audience="staff" retryHref="/staff/account" /> : null}
      <section className="space-y-3">
        <h1 className="text-2xl font-bold text-brand">Account</h1>
        <p className="text-sm text-slate-700">
          Logged in as <strong>{session.username}</strong>
        </p>
        <form method="post" action="/api/staff/logout">
          <button type="submit" className="rounded border border-slate-300 px-4 py-2 text-sm font-semibold">
            Logout
          </button>
        </form>
      </section>
      <section className="max-w-xl space-y-3 rounded border border-slate-200 p-4">
        <h2 className="text-lg font-semibold text-brand">Create additional teacher account</h2>
        <form method="post" action="/api/staff/accounts" className="space-y-3">
          <label className="flex flex-col gap-2 text-sm font-medium text-brand">
            <span>New username</span>
            <input name="username" className={inputClass} required autoComplete="off" />
          </label>
          <label className="flex flex-col gap-2 text-sm font-medium text-brand">
            <span>Password</span>
            <input name="password" type="password" className={inputClass} required autoComplete="new-password" />
          </label>
          <button type="submit" className="rounded bg-brand-accent px-4 py-2 text-sm font-semibold text-white">
            Create teacher
          </button>
        </form>
      </section>
    </div>
  );
}
