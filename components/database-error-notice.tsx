import Link from 'next/link';
import type { DatabaseUnavailableError } from '../lib/db';

interface DatabaseErrorNoticeProps {
  error: DatabaseUnavailableError;
  /** Staff see the storage details and repair steps; visitors get a plain apology. */
  audience: 'public' | 'staff';
  retryHref: string;
}

export default function DatabaseErrorNotice({ error, audience, retryHref }: DatabaseErrorNoticeProps) {
  return (
    <section role="alert" className="space-y-2 rounded border border-rose-300 bg-rose-50 p-4 text-sm text-rose-900">
      <h2 className="font-semibold">The lost &amp; found list is offline</h2>
      {audience === 'staff' ? (
        <>
          <p>{error.message}</p>
          {error.dbPath ? <p className="font-mono text-xs">{error.dbPath}</p> : null}
          {error.troubleshooting.length > 0 ? (
            <ul className="list-disc space-y-1 pl-5">
              {error.troubleshooting.map((step) => (
                <li key={step}>{step}</li>
              ))}
            </ul>
          ) : null}
        </>
      ) : (
        <p>Found items cannot be shown right now. Please check back shortly or ask at the front office.</p>
      )}
      <Link href={retryHref} className="inline-flex font-semibold underline">
        Try again
      </Link>
    </section>
  );
}
