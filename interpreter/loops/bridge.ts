/**
 * Bridges the host runtime with the application's event loop.
 *
 *     setLoop(new NodeEventLoop());
 *     const value = await fromThread(() => computeOnTheLoop());
 *
 * fromThread() and toThread() keep the environment that was current when they
 * were called; keepEnvironment() does the same for any callback.
 */
import { Future } from '@core/async/Future';
import { Cancelled } from '@core/errors/Cancelled';
import { NoLoopError } from '@core/errors/NoLoopError';
import type { HostRuntime } from '@core/types/host';
import { loopLogger } from '@core/utils/logger';
import { getHostRuntime } from '@interpreter/host';
import { AbortError, type EventLoop } from './EventLoop';

let currentLoop: EventLoop | undefined;

/**
 * The active loop. Throws NoLoopError if none has been set.
 */
export function getLoop(operation?: string): EventLoop {
  if (currentLoop === undefined) {
    throw new NoLoopError(operation);
  }
  return currentLoop;
}

export function hasLoop(): boolean {
  return currentLoop !== undefined;
}

/**
 * Makes loop the active loop. The previous loop is detached first; if the new
 * loop fails to attach, no loop is active afterwards.
 */
export function setLoop(loop: EventLoop): void {
  currentLoop?.detach?.();
  try {
    currentLoop = loop;
    loop.attach?.();
  } catch (error) {
    currentLoop = undefined;
    throw error;
  }
  loopLogger.debug('Event loop attached', { kind: loop.kind });
}

/**
 * Detaches the active loop, if any, and leaves the slot empty.
 */
export function clearLoop(): void {
  const loop = currentLoop;
  currentLoop = undefined;
  loop?.detach?.();
}

/**
 * Returns a function that runs fn with the environment that was current when
 * keepEnvironment() was called, then restores whatever was current before.
 * Without a current environment fn is returned unchanged.
 */
export function keepEnvironment<A extends unknown[], R>(
  fn: (...args: A) => R,
  host: HostRuntime = getHostRuntime()
): (...args: A) => R {
  const environment = host.currentEnvironment();
  if (environment === undefined) {
    return fn;
  }
  return (...args: A) => host.withEnvironment(environment, () => fn(...args));
}

/**
 * Runs fn inside the active loop, preserving the current environment.
 * Depending on the loop, fn may run inline.
 */
export function fromThread<A extends unknown[], R>(fn: (...args: A) => R, ...args: A): Future<R> {
  const loop = getLoop('fromThread');
  return loop.fromThread(keepEnvironment(() => fn(...args)));
}

/**
 * Runs fn on a worker of the active loop, preserving the current environment.
 */
export function toThread<A extends unknown[], R>(fn: (...args: A) => R, ...args: A): Future<R> {
  return runOnWorker(() => fn(...args));
}

/**
 * toThread() for callers that know which host runtime their environment
 * lives on.
 */
export function runOnWorker<R>(
  fn: () => R,
  host: HostRuntime = getHostRuntime(),
  operation = 'toThread'
): Future<R> {
  const loop = getLoop(operation);
  const wrapped = keepEnvironment(fn, host);
  return loop.toThread ? loop.toThread(wrapped) : defaultToThread(wrapped);
}

/**
 * Passes control back to the active loop.
 */
export function nextCycle(): Future<void> {
  const loop = getLoop('nextCycle');
  return loop.nextCycle ? loop.nextCycle() : defaultNextCycle(loop);
}

/**
 * Makes a future awaitable the way the active loop expects. Futures are
 * thenables already, so without a loop the future itself is returned.
 */
export function makeAwaitable<T>(future: Future<T>): PromiseLike<T> {
  const loop = currentLoop;
  return loop?.awaitFuture ? loop.awaitFuture(future) : future;
}

/**
 * Runs fn and rethrows Cancelled as the active loop's cancellation error.
 */
export async function wrapCancelled<T>(fn: () => T | PromiseLike<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof Cancelled) {
      throw translateCancelled(error);
    }
    throw error;
  }
}

export function translateCancelled(cancelled: Cancelled): unknown {
  const loop = currentLoop;
  return loop?.wrapCancelled
    ? loop.wrapCancelled(cancelled)
    : new AbortError(cancelled.message, { cause: cancelled });
}

/**
 * Runs fn on a later macrotask. Node.js runs JavaScript on one thread, so a
 * "worker" here is a detached turn of the event loop; cancelling the future
 * before that turn keeps fn from running at all.
 */
export function defaultToThread<R>(fn: () => R): Future<R> {
  const future = new Future<R>();
  setImmediate(() => {
    if (!future.setRunningOrNotifyCancel()) {
      return;
    }
    try {
      future.setResult(fn());
    } catch (error) {
      future.setException(error);
    }
  });
  return future;
}

export function defaultNextCycle(loop: EventLoop): Future<void> {
  const future = new Future<void>();
  const scheduled = loop.fromThread(() => {
    if (!future.done) {
      future.setResult(undefined);
    }
  });
  scheduled.addDoneCallback(done => {
    const error = done.exception();
    if (error !== undefined && !future.done) {
      future.setException(error);
    }
  });
  return future;
}
