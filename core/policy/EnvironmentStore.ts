import { AsyncLocalStorage } from 'async_hooks';
import { threadId } from 'worker_threads';
import type { EnvironmentHandle } from '@core/types/host';
import type { EnvironmentStoreKind } from '@core/config/types';

/**
 * Stores hold weak references so that remembering an environment as current
 * never keeps it alive.
 */
export type EnvironmentRef = WeakRef<EnvironmentHandle>;

/**
 * Environment stores manage which environment is currently active for some
 * scope (the process, a thread, a logical task).
 *
 * A store never undoes a switch by itself; callers restore prior values.
 */
export interface EnvironmentStore {
  readonly kind: EnvironmentStoreKind;
  get(): EnvironmentRef | undefined;
  set(environment: EnvironmentRef | undefined): void;
  clear(): void;
  /**
   * Runs fn as its own scope, starting from the current value. Stores that
   * follow async tasks implement it so that switches made inside fn stay
   * there.
   */
  fork?<T>(fn: () => T): T;
}

/**
 * The simplest store: one slot for the whole process.
 *
 * Useful when only one environment is in use at a time. Concurrent callers
 * switching environments must synchronise among themselves.
 */
export class GlobalStore implements EnvironmentStore {
  readonly kind = 'global';
  private current?: EnvironmentRef;

  get(): EnvironmentRef | undefined {
    return this.current;
  }

  set(environment: EnvironmentRef | undefined): void {
    this.current = environment;
  }

  clear(): void {
    this.current = undefined;
  }
}

export type ThreadKey = string | number;

export interface ThreadLocalStoreOptions {
  /** Identifies the calling thread; defaults to the worker_threads thread id */
  identify?: () => ThreadKey;
}

/**
 * One slot per thread. A value set on one thread is invisible on every other
 * thread, even when both work on the same logical task.
 */
export class ThreadLocalStore implements EnvironmentStore {
  readonly kind = 'thread';
  private readonly slots = new Map<ThreadKey, EnvironmentRef>();
  private readonly identify: () => ThreadKey;

  constructor(options: ThreadLocalStoreOptions = {}) {
    this.identify = options.identify ?? (() => threadId);
  }

  get(): EnvironmentRef | undefined {
    return this.slots.get(this.identify());
  }

  set(environment: EnvironmentRef | undefined): void {
    if (environment === undefined) {
      this.slots.delete(this.identify());
      return;
    }
    this.slots.set(this.identify(), environment);
  }

  clear(): void {
    this.slots.delete(this.identify());
  }
}

/** The slot a logical task shares with everything it awaits */
interface TaskSlot {
  current?: EnvironmentRef;
}

/**
 * Task-propagating store backed by AsyncLocalStorage.
 *
 * Each logical task owns a mutable slot. A value set in a task is seen by
 * everything that task awaits or schedules afterwards, wherever it resumes.
 * Start concurrent tasks through fork(): every fork gets a slot of its own,
 * so neither its siblings nor the task that forked it see its switches.
 *
 * Reuse one store across successive policies; every store owns its own
 * AsyncLocalStorage.
 */
export class AsyncContextStore implements EnvironmentStore {
  readonly kind = 'task';
  private readonly storage = new AsyncLocalStorage<TaskSlot>();

  get(): EnvironmentRef | undefined {
    return this.storage.getStore()?.current;
  }

  set(environment: EnvironmentRef | undefined): void {
    const slot = this.storage.getStore();
    if (slot) {
      slot.current = environment;
      return;
    }
    // Outside any fork the caller's own context gets its first slot
    this.storage.enterWith({ current: environment });
  }

  clear(): void {
    this.set(undefined);
  }

  /**
   * Runs fn as a new logical task whose slot starts with the current value.
   */
  fork<T>(fn: () => T): T {
    return this.storage.run({ current: this.get() }, fn);
  }
}

export function createEnvironmentStore(kind: EnvironmentStoreKind): EnvironmentStore {
  switch (kind) {
    case 'global':
      return new GlobalStore();
    case 'thread':
      return new ThreadLocalStore();
    case 'task':
      return new AsyncContextStore();
  }
}
