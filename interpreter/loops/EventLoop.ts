import type { Future } from '@core/async/Future';
import type { Cancelled } from '@core/errors/Cancelled';

/**
 * What scriptenv needs from the event loop of your choice.
 *
 * Only fromThread() is required. Every other capability has a default in
 * `./bridge`, used when the adapter leaves it out.
 */
export interface EventLoop {
  /** Tags the adapter, e.g. 'inline' or 'node' */
  readonly kind: string;

  /**
   * Runs fn on the loop's home scheduler. Called from host callbacks and
   * worker tasks to move results back to the application.
   */
  fromThread<R>(fn: () => R): Future<R>;

  /** Runs fn off the loop, on a worker */
  toThread?<R>(fn: () => R): Future<R>;

  /**
   * Passes control back to the loop and resumes on a later cycle.
   * Rejects with Cancelled if cancelled by then.
   */
  nextCycle?(): Future<void>;

  /** Called when this loop becomes the active loop */
  attach?(): void;

  /** Called when another loop takes over, e.g. when the application restarts */
  detach?(): void;

  /** Adapts a future into whatever the loop awaits natively */
  awaitFuture?<T>(future: Future<T>): PromiseLike<T>;

  /** Translates the core's cancellation into the loop's own cancellation error */
  wrapCancelled?(cancelled: Cancelled): unknown;
}

/**
 * Cancellation error in the shape Node.js APIs use for aborted operations.
 */
export class AbortError extends Error {
  readonly code = 'ABORT_ERR';

  constructor(message = 'The operation was aborted', options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AbortError';
  }
}
