import type {
  EnvironmentDispatcher,
  EnvironmentHandle,
  EnvironmentPolicyApi,
  HostRuntime
} from '@core/types/host';
import { HostRuntimeError } from '@core/errors/HostRuntimeError';
import { policyLogger } from '@core/utils/logger';
import type { EnvironmentStore } from './EnvironmentStore';

/**
 * The dispatcher a Policy installs on the host runtime. It answers "which
 * environment is current" from its store.
 */
export class ManagedPolicy implements EnvironmentDispatcher {
  private _api?: EnvironmentPolicyApi;
  private inlineEnvironment?: EnvironmentHandle;

  constructor(
    readonly store: EnvironmentStore,
    private readonly host: HostRuntime
  ) {}

  get api(): EnvironmentPolicyApi {
    if (this._api) {
      return this._api;
    }
    throw new HostRuntimeError('Invalid state: No access to the current API');
  }

  get registered(): boolean {
    return this._api !== undefined;
  }

  onPolicyRegistered(api: EnvironmentPolicyApi): void {
    this._api = api;
    policyLogger.debug('Successfully registered policy with the host runtime', {
      store: this.store.kind
    });
  }

  onPolicyCleared(): void {
    this._api = undefined;
    this.inlineEnvironment = undefined;
    policyLogger.debug('Policy cleared');
  }

  /**
   * Makes environment current for a synchronous block without telling the
   * store. Nothing inside fn may await.
   */
  inlineSection<T>(environment: EnvironmentHandle, fn: () => T): T {
    const previous = this.inlineEnvironment;
    this.inlineEnvironment = environment;
    try {
      return fn();
    } finally {
      this.inlineEnvironment = previous;
    }
  }

  isAlive(environment: EnvironmentHandle): boolean {
    return this.host.isAlive(environment);
  }

  getCurrentEnvironment(): EnvironmentHandle | undefined {
    if (this.inlineEnvironment !== undefined && this.isAlive(this.inlineEnvironment)) {
      return this.inlineEnvironment;
    }

    const current = this.store.get();
    if (current === undefined) {
      return undefined;
    }

    const environment = current.deref();
    if (environment === undefined || !this.isAlive(environment)) {
      policyLogger.warn('Got dead environment', { id: environment?.id });
      this.store.set(undefined);
      return undefined;
    }

    return environment;
  }

  setEnvironment(environment: EnvironmentHandle | undefined): EnvironmentHandle | undefined {
    const previous = this.store.get()?.deref();

    if (environment !== undefined && !this.isAlive(environment)) {
      policyLogger.warn('Got dead environment', { id: environment.id });
      this.store.set(undefined);
    } else {
      policyLogger.debug('Setting environment', { id: environment?.id });
      this.store.set(environment === undefined ? undefined : new WeakRef(environment));
    }

    return previous;
  }
}
