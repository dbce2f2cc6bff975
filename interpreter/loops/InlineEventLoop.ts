import { DONE, Future } from '@core/async/Future';
import type { EventLoop } from './EventLoop';

/**
 * Runs everything immediately on the calling stack. For applications without
 * an event loop of their own.
 */
export class InlineEventLoop implements EventLoop {
  readonly kind = 'inline';

  fromThread<R>(fn: () => R): Future<R> {
    return Future.attempt(fn);
  }

  nextCycle(): Future<void> {
    return DONE;
  }
}
