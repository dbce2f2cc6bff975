import type { EnvironmentCore, EnvironmentHandle, HostRuntime, OutputRecord } from '@core/types/host';
import type { Policy } from '@core/policy/Policy';
import { DisposedError } from '@core/errors/DisposedError';
import { environmentLogger } from '@core/utils/logger';
import { leakTracker } from './LeakTracker';

/**
 * An environment created by a Policy.
 *
 * Call dispose() when done with it. A wrapper that is garbage collected
 * without being disposed is reported as a ResourceWarning.
 */
export class ManagedEnvironment {
  private _handle?: EnvironmentHandle;

  constructor(handle: EnvironmentHandle, private readonly policy: Policy) {
    this._handle = handle;
    leakTracker.track(this, { host: policy.host, handle });
  }

  get handle(): EnvironmentHandle {
    return this.requireHandle('handle');
  }

  get host(): HostRuntime {
    return this.policy.host;
  }

  get disposed(): boolean {
    return this._handle === undefined;
  }

  /**
   * The core of this environment.
   */
  get core(): EnvironmentCore {
    const handle = this.requireHandle('core');
    return this.inlineSection(() => this.policy.host.getCore(handle));
  }

  /**
   * Snapshot of the outputs set by code that ran inside this environment.
   */
  get outputs(): ReadonlyMap<number, OutputRecord> {
    const handle = this.requireHandle('outputs');
    return this.inlineSection(() => this.policy.host.getOutputs(handle));
  }

  /**
   * Switches to this environment without remembering the previous one.
   * Nothing will restore it.
   */
  switch(): void {
    const handle = this.requireHandle('switch');
    this.policy.managed.setEnvironment(handle);
  }

  /**
   * Runs fn with this environment current and restores the previous
   * environment afterwards, however fn exits.
   */
  use<T>(fn: () => T): T {
    const handle = this.requireHandle('use');
    const previous = this.policy.managed.setEnvironment(handle);
    try {
      return fn();
    } finally {
      this.policy.managed.setEnvironment(previous);
    }
  }

  /**
   * Like use(), but keeps the environment current until the returned promise
   * settles. Stores that follow async tasks run fn in a fork, so the caller
   * does not see the switch; with a GlobalStore it is visible to concurrent
   * tasks in the meantime.
   */
  async useAsync<T>(fn: () => Promise<T>): Promise<T> {
    const handle = this.requireHandle('useAsync');
    const managed = this.policy.managed;
    const body = async () => {
      const previous = managed.setEnvironment(handle);
      try {
        return await fn();
      } finally {
        managed.setEnvironment(previous);
      }
    };
    const store = managed.store;
    return store.fork ? store.fork(body) : body();
  }

  /**
   * Makes this environment current for a synchronous block without notifying
   * the store. Do not await inside fn. Used by library code that needs the
   * environment without making the switch observable.
   */
  inlineSection<T>(fn: () => T): T {
    const handle = this.requireHandle('inlineSection');
    return this.policy.managed.inlineSection(handle, fn);
  }

  dispose(): void {
    const handle = this._handle;
    if (handle === undefined) {
      return;
    }

    environmentLogger.debug('Disposing environment', { id: handle.id });
    leakTracker.untrack(this);
    this._handle = undefined;
    if (this.policy.host.isAlive(handle)) {
      this.policy.host.disposeEnvironment(handle);
    }
  }

  private requireHandle(operation: string): EnvironmentHandle {
    if (this._handle === undefined) {
      throw new DisposedError('ManagedEnvironment', { operation });
    }
    return this._handle;
  }
}
