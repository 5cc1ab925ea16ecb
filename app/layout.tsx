import './globals.css';
import type { Metadata } from 'next';
import Link from 'next/link';
import { ReactNode } from 'react';

export const metadata: Metadata = {
  title: 'Campus Lost & Found',
  description: 'Browse items handed in around campus and find out where to collect them.'
};

export default function RootLayout({ children }: { children: ReactNode }) {
  return (
    <html lang="en">
      <body className="min-h-screen">
        <a className="skip-link" href="#main-content">
          Skip to content
        </a>
        <header className="border-b border-slate-200 bg-white">
          <div className="mx-auto flex max-w-6xl items-center justify-between px-6 py-4">
            <div>
              <Link href="/" className="text-xl font-semibold text-brand">
                Campus Lost & Found
              </Link>
              <p className="text-sm text-slate-600">Items handed in at the front desk, library and halls</p>
            </div>
            <nav className="flex gap-4 text-sm font-medium">
              <Link href="/">Browse items</Link>
              <Link href="/staff">Staff portal</Link>
            </nav>
          </div>
        </header>
        <main id="main-content" className="mx-auto min-h-[70vh] max-w-6xl px-6 py-10">
          {children}
        </main>
        <footer className="border-t border-slate-200 bg-slate-50">
          <div className="mx-auto max-w-6xl px-6 py-6 text-sm text-slate-600">
            <p>Unclaimed items are archived automatically after a month. Ask at the collection point if yours is archived.</p>
          </div>
        </footer>
      </body>
    </html>
  );
}
