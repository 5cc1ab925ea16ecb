import Link from 'next/link';

const TABS = [
  { href: '/staff/items', label: 'Add & manage items' },
  { href: '/staff/history', label: 'History / archive' },
  { href: '/staff/account', label: 'Account' }
] as const;

export function StaffNav({ username, current }: { username: string | null; current: (typeof TABS)[number]['href'] }) {
  return (
    <div className="space-y-3">
      <p className="text-sm text-slate-600">Welcome, {username}!</p>
      <nav aria-label="Staff sections" className="flex flex-wrap gap-2 border-b border-slate-200 pb-2 text-sm font-medium">
        {TABS.map((tab) => (
          <Link
            key={tab.href}
            href={tab.href}
            aria-current={tab.href === current ? 'page' : undefined}
            className={`rounded px-3 py-1 ${tab.href === current ? 'bg-brand-accent text-white' : 'border border-slate-300'}`}
          >
            {tab.label}
          </Link>
        ))}
      </nav>
    </div>
  );
}
