interface FlashMessagesProps {
  notice?: string;
  error?: string;
}

export function FlashMessages({ notice, error }: FlashMessagesProps) {
  if (!notice && !error) return null;
  return (
    <div className="space-y-2">
      {notice ? (
        <p role="status" className="rounded border border-emerald-300 bg-emerald-50 p-3 text-sm text-emerald-900">
          {notice}
        </p>
      ) : null}
      {error ? (
        <p role="alert" className="rounded border border-rose-300 bg-rose-50 p-3 text-sm text-rose-900">
          {error}
        </p>
      ) : null}
    </div>
  );
}
