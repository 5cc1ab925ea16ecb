export async function register() {
  if (process.env.NEXT_RUNTIME !== 'nodejs') return;

  const { config } = await import('./lib/config');
  if (!config.sweepIntervalMs) return;

  const [{ createSweepScheduler }, { getDb }, { runAutoArchiveSweep }] = await Promise.all([
    import('./lib/sweep-scheduler'),
    import('./lib/db'),
    import('./lib/lifecycle')
  ]);

  createSweepScheduler({
    intervalMs: config.sweepIntervalMs,
    run: () => runAutoArchiveSweep(getDb())
  }).start();
  console.log(`Background auto-archive sweep every ${config.sweepIntervalMs / 60_000} minutes.`);
}
