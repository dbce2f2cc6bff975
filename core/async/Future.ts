import { Cancelled } from '@core/errors/Cancelled';
import { InvalidStateError } from '@core/errors/InvalidStateError';
import { logger } from '@core/utils/logger';

export type FutureState = 'pending' | 'running' | 'resolved' | 'rejected' | 'cancelled';

type Outcome<T> = { ok: true; value: T } | { ok: false; error: unknown };

export type DoneCallback<T> = (future: Future<T>) => void;

/**
 * A result handle that can be settled from anywhere and cancelled while it is
 * still pending.
 *
 * Unlike a Promise, a settled Future can be inspected synchronously, and a
 * rejection nobody listens to is not reported as unhandled.
 */
export class Future<T> implements PromiseLike<T> {
  private _state: FutureState = 'pending';
  private outcome?: Outcome<T>;
  private callbacks: DoneCallback<T>[] = [];

  static resolve<T>(value: T): Future<T> {
    const future = new Future<T>();
    future.setResult(value);
    return future;
  }

  static reject<T = never>(error: unknown): Future<T> {
    const future = new Future<T>();
    future.setException(error);
    return future;
  }

  /**
   * Settles a future with the outcome of calling fn.
   */
  static attempt<T>(fn: () => T): Future<T> {
    const future = new Future<T>();
    try {
      future.setResult(fn());
    } catch (error) {
      future.setException(error);
    }
    return future;
  }

  static fromPromise<T>(promise: PromiseLike<T>): Future<T> {
    const future = new Future<T>();
    void promise.then(
      value => future.setResult(value),
      error => future.setException(error)
    );
    return future;
  }

  get state(): FutureState {
    return this._state;
  }

  get done(): boolean {
    return this.outcome !== undefined;
  }

  get cancelled(): boolean {
    return this._state === 'cancelled';
  }

  get running(): boolean {
    return this._state === 'running';
  }

  /**
   * Marks the future as running. Returns false if it was cancelled before,
   * in which case the work must not start.
   */
  setRunningOrNotifyCancel(): boolean {
    if (this._state === 'cancelled') {
      return false;
    }
    if (this._state !== 'pending') {
      throw new InvalidStateError(`Future cannot start running in state ${this._state}`);
    }
    this._state = 'running';
    return true;
  }

  setResult(value: T): void {
    this.settle('resolved', { ok: true, value });
  }

  setException(error: unknown): void {
    this.settle('rejected', { ok: false, error });
  }

  /**
   * Cancels the future if it has not started running yet.
   * Work that is already running is not interrupted.
   */
  cancel(): boolean {
    if (this._state === 'cancelled') {
      return true;
    }
    if (this._state !== 'pending') {
      return false;
    }
    this.settle('cancelled', { ok: false, error: new Cancelled() });
    return true;
  }

  /**
   * The value of a settled future; rethrows its failure.
   */
  result(): T {
    const outcome = this.requireOutcome();
    if (outcome.ok) {
      return outcome.value;
    }
    throw outcome.error;
  }

  exception(): unknown {
    const outcome = this.requireOutcome();
    return outcome.ok ? undefined : outcome.error;
  }

  addDoneCallback(callback: DoneCallback<T>): void {
    if (this.done) {
      this.invoke(callback);
      return;
    }
    this.callbacks.push(callback);
  }

  map<R>(fn: (value: T) => R): Future<R> {
    const mapped = new Future<R>();
    this.addDoneCallback(source => {
      const outcome = source.requireOutcome();
      if (!outcome.ok) {
        mapped.setException(outcome.error);
        return;
      }
      try {
        mapped.setResult(fn(outcome.value));
      } catch (error) {
        mapped.setException(error);
      }
    });
    return mapped;
  }

  toPromise(): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.addDoneCallback(future => {
        const outcome = future.requireOutcome();
        if (outcome.ok) {
          resolve(outcome.value);
        } else {
          reject(outcome.error);
        }
      });
    });
  }

  then<TResult1 = T, TResult2 = never>(
    onfulfilled?: ((value: T) => TResult1 | PromiseLike<TResult1>) | null,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null
  ): Promise<TResult1 | TResult2> {
    return this.toPromise().then(onfulfilled, onrejected);
  }

  private settle(state: FutureState, outcome: Outcome<T>): void {
    if (this.outcome !== undefined) {
      throw new InvalidStateError(`Future is already ${this._state}`);
    }
    this._state = state;
    this.outcome = outcome;

    const callbacks = this.callbacks;
    this.callbacks = [];
    for (const callback of callbacks) {
      this.invoke(callback);
    }
  }

  private invoke(callback: DoneCallback<T>): void {
    try {
      callback(this);
    } catch (error) {
      logger.error('Future done-callback raised', {
        error: error instanceof Error ? error.message : String(error)
      });
    }
  }

  private requireOutcome(): Outcome<T> {
    if (this.outcome === undefined) {
      throw new InvalidStateError(`Future is still ${this._state}`);
    }
    return this.outcome;
  }
}

/** An already settled future, for loops that have nothing to wait for */
export const DONE: Future<void> = Future.resolve<void>(undefined);
