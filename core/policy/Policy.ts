/**
 * A Policy owns the single registration of an environment dispatcher with the
 * host runtime and creates managed environments.
 *
 *     const policy = new Policy(new AsyncContextStore());
 *     policy.scoped(() => {
 *       const env = policy.newEnvironment();
 *       env.use(() => policy.host.execute('setOutput("hello")', module));
 *       console.log(env.outputs); // Map(1) { 0 => 'hello' }
 *       env.dispose();
 *     });
 *
 * Pick the store by concurrency model:
 * - GlobalStore when only one environment is in use at a time,
 * - ThreadLocalStore for code spread over worker threads,
 * - AsyncContextStore for async code; reuse it across successive policies.
 *
 * Environments returned by newEnvironment() must be disposed by the caller.
 */
import type { EnvironmentPolicyApi, HostRuntime } from '@core/types/host';
import { AlreadyRegisteredError, NotRegisteredError } from '@core/errors/PolicyRegistrationError';
import { policyLogger } from '@core/utils/logger';
import { getHostRuntime } from '@interpreter/host';
import { ManagedEnvironment } from '@interpreter/env/ManagedEnvironment';
import type { EnvironmentStore } from './EnvironmentStore';
import { ManagedPolicy } from './ManagedPolicy';

export interface PolicyOptions {
  /** Host runtime to register with; defaults to the process-wide host */
  host?: HostRuntime;
}

export class Policy {
  readonly host: HostRuntime;
  private readonly _managed: ManagedPolicy;

  constructor(store: EnvironmentStore, options: PolicyOptions = {}) {
    this.host = options.host ?? getHostRuntime();
    this._managed = new ManagedPolicy(store, this.host);
  }

  /**
   * Registers the policy with the host runtime.
   */
  register(): void {
    if (this._managed.registered) {
      throw new AlreadyRegisteredError();
    }
    this.host.registerPolicy(this._managed);
  }

  /**
   * Unregisters the policy from the host runtime.
   */
  unregister(): void {
    if (!this._managed.registered) {
      throw new NotRegisteredError();
    }
    this._managed.api.unregisterPolicy();
  }

  /**
   * Registers the policy for the duration of fn.
   */
  scoped<T>(fn: (policy: this) => T): T {
    this.register();
    try {
      return fn(this);
    } finally {
      this.unregister();
    }
  }

  async scopedAsync<T>(fn: (policy: this) => Promise<T>): Promise<T> {
    this.register();
    try {
      return await fn(this);
    } finally {
      this.unregister();
    }
  }

  /**
   * Creates a new environment. It is not switched to; the caller owns it and
   * has to dispose() it.
   */
  newEnvironment(): ManagedEnvironment {
    const handle = this.api.createEnvironment();
    policyLogger.debug('Created new environment', { id: handle.id });
    return new ManagedEnvironment(handle, this);
  }

  get registered(): boolean {
    return this._managed.registered;
  }

  get store(): EnvironmentStore {
    return this._managed.store;
  }

  /**
   * The host API granted at registration. You will rarely need it directly.
   */
  get api(): EnvironmentPolicyApi {
    return this._managed.api;
  }

  /**
   * The dispatcher installed on the host runtime.
   */
  get managed(): ManagedPolicy {
    return this._managed;
  }
}
