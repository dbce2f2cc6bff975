import { Future } from '@core/async/Future';
import { Cancelled } from '@core/errors/Cancelled';
import { loopLogger } from '@core/utils/logger';
import { AbortError, type EventLoop } from './EventLoop';

interface QueuedCall {
  run(): void;
  cancel(): void;
}

/**
 * Delivers fromThread() calls on the Node.js event loop, one per setImmediate
 * turn, in the order they were queued.
 *
 * Detaching the loop aborts its signal and cancels every call that has not
 * started yet.
 */
export class NodeEventLoop implements EventLoop {
  readonly kind = 'node';
  private queue: QueuedCall[] = [];
  private draining = false;
  private controller = new AbortController();

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  attach(): void {
    if (this.controller.signal.aborted) {
      this.controller = new AbortController();
    }
  }

  detach(): void {
    const pending = this.queue;
    this.queue = [];
    for (const call of pending) {
      call.cancel();
    }
    this.controller.abort(new Cancelled('The event loop has been detached'));
    loopLogger.debug('Node event loop detached', { cancelled: pending.length });
  }

  fromThread<R>(fn: () => R): Future<R> {
    if (this.controller.signal.aborted) {
      return Future.reject<R>(new Cancelled('The event loop has been detached'));
    }

    const future = new Future<R>();
    this.queue.push({
      run: () => {
        if (!future.setRunningOrNotifyCancel()) {
          return;
        }
        try {
          future.setResult(fn());
        } catch (error) {
          future.setException(error);
        }
      },
      cancel: () => future.cancel()
    });
    this.scheduleDrain();
    return future;
  }

  awaitFuture<T>(future: Future<T>): Promise<T> {
    return future.toPromise();
  }

  wrapCancelled(cancelled: Cancelled): AbortError {
    return new AbortError(cancelled.message, { cause: cancelled });
  }

  private scheduleDrain(): void {
    if (this.draining) {
      return;
    }
    this.draining = true;
    setImmediate(() => this.drainOne());
  }

  private drainOne(): void {
    this.queue.shift()?.run();

    if (this.queue.length > 0) {
      setImmediate(() => this.drainOne());
    } else {
      this.draining = false;
    }
  }
}
