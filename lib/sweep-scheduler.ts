export interface SweepSchedulerOptions {
  intervalMs: number;
  run: () => unknown;
  onError?: (error: unknown) => void;
}

export interface SweepScheduler {
  start(): void;
  stop(): void;
  /** Runs a sweep now, or joins the one already in flight. */
  trigger(): Promise<void>;
  readonly running: boolean;
}

export function createSweepScheduler({ intervalMs, run, onError }: SweepSchedulerOptions): SweepScheduler {
  let timer: NodeJS.Timeout | null = null;
  let inFlight: Promise<void> | null = null;

  const trigger = () => {
    if (inFlight) return inFlight;
    inFlight = Promise.resolve()
      .then(run)
      .then(
        () => undefined,
        (error: unknown) => {
          if (onError) {
            onError(error);
          } else {
            console.error('Background auto-archive sweep failed', error);
          }
        }
      )
      .finally(() => {
        inFlight = null;
      });
    return inFlight;
  };

  return {
    start() {
      if (timer) return;
      timer = setInterval(() => {
        void trigger();
      }, intervalMs);
      timer.unref();
    },
    stop() {
      if (timer) {
        clearInterval(timer);
        timer = null;
      }
    },
    trigger,
    get running() {
      return inFlight !== null;
    }
  };
}
