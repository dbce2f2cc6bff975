import { Future } from '@core/async/Future';
import type { HostRuntime } from '@core/types/host';
import { runOnWorker } from '@interpreter/loops/bridge';

export type Runner = (fn: () => void) => Future<void>;

/**
 * Runs fn on the calling stack; the future is settled on return.
 */
export const inlineRunner: Runner = fn => Future.attempt(fn);

/**
 * Runs fn through the active loop's toThread().
 */
export function workerRunner(host: HostRuntime): Runner {
  return fn => runOnWorker(fn, host, 'Script.run');
}

/**
 * Changes the working directory while fn runs. The directory is process-wide:
 * unsafe when several scripts run at once.
 */
export function chdirRunner(directory: string, parent: Runner): Runner {
  return fn =>
    parent(() => {
      const current = process.cwd();
      process.chdir(directory);
      try {
        fn();
      } finally {
        process.chdir(current);
      }
    });
}
