import { Future } from '@core/async/Future';
import { DisposedError } from '@core/errors/DisposedError';
import { ExecutionError } from '@core/errors/ExecutionError';
import { VariableNotFoundError } from '@core/errors/VariableNotFoundError';
import type { EnvironmentHandle, HostRuntime, ScriptModule } from '@core/types/host';
import { scriptLogger } from '@core/utils/logger';
import { ManagedEnvironment } from '@interpreter/env/ManagedEnvironment';
import { makeAwaitable } from '@interpreter/loops/bridge';
import type { Runner } from './runners';

export type ScriptTarget = ManagedEnvironment | EnvironmentHandle;

export type ScriptExecutor = (module: ScriptModule, host: HostRuntime) => void;

export type ScriptState = 'created' | 'running' | 'completed' | 'failed' | 'disposed';

export interface ScriptInit {
  executor: ScriptExecutor;
  module: ScriptModule;
  environment: ScriptTarget;
  runner: Runner;
  host: HostRuntime;
  /** The script created its environment and disposes it with itself */
  ownsEnvironment: boolean;
}

/**
 * Code loaded into an environment.
 *
 * Nothing runs until run() is called or the script is awaited. Whatever the
 * code throws reaches callers as an ExecutionError.
 */
export class Script implements PromiseLike<void> {
  readonly module: ScriptModule;
  readonly environment: ScriptTarget;
  readonly host: HostRuntime;
  readonly ownsEnvironment: boolean;

  private readonly executor: ScriptExecutor;
  private readonly runner: Runner;
  private future?: Future<void>;
  private _state: ScriptState = 'created';

  constructor(init: ScriptInit) {
    this.executor = init.executor;
    this.module = init.module;
    this.environment = init.environment;
    this.runner = init.runner;
    this.host = init.host;
    this.ownsEnvironment = init.ownsEnvironment;
  }

  get state(): ScriptState {
    return this._state;
  }

  get disposed(): boolean {
    return this._state === 'disposed';
  }

  /**
   * Starts the script once. Later calls return the same future, which
   * rejects with ExecutionError when the code fails.
   */
  run(): Future<void> {
    if (this.future) {
      return this.future;
    }
    if (this.disposed) {
      throw new DisposedError('Script', { module: this.module.name });
    }

    this._state = 'running';
    scriptLogger.debug('Running script', { module: this.module.name });

    const future = this.runner(() => this.runInline());
    this.future = future;
    future.addDoneCallback(done => {
      if (this._state !== 'running') {
        return;
      }
      const error = done.exception();
      this._state = error === undefined ? 'completed' : 'failed';
      if (error === undefined) {
        scriptLogger.debug('Script completed', { module: this.module.name });
      } else {
        scriptLogger.debug('Script failed', {
          module: this.module.name,
          error: error instanceof Error ? error.message : String(error)
        });
      }
    });
    return future;
  }

  /**
   * Runs the script and waits until it has finished.
   */
  async result(): Promise<void> {
    await this.run();
  }

  then<TResult1 = void, TResult2 = never>(
    onfulfilled?: ((value: void) => TResult1 | PromiseLike<TResult1>) | null,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null
  ): PromiseLike<TResult1 | TResult2> {
    return makeAwaitable(this.run()).then(onfulfilled, onrejected);
  }

  /**
   * Looks a binding up in the script's module once execution has settled.
   */
  getVariable(name: string): Future<unknown>;
  getVariable<T>(name: string, defaultValue: T): Future<unknown>;
  getVariable(name: string, ...fallback: unknown[]): Future<unknown> {
    if (this.disposed) {
      return Future.reject(new DisposedError('Script', { module: this.module.name }));
    }

    const lookup = () => {
      const bindings = this.module.bindings;
      if (Object.prototype.hasOwnProperty.call(bindings, name)) {
        return bindings[name];
      }
      if (fallback.length > 0) {
        return fallback[0];
      }
      throw new VariableNotFoundError(name, this.module.name);
    };

    const running = this.future;
    if (running === undefined || running.done) {
      return Future.attempt(lookup);
    }

    const variable = new Future<unknown>();
    running.addDoneCallback(() => {
      if (this.disposed) {
        variable.setException(new DisposedError('Script', { module: this.module.name }));
        return;
      }
      try {
        variable.setResult(lookup());
      } catch (error) {
        variable.setException(error);
      }
    });
    return variable;
  }

  /**
   * Releases the module bindings and, if the script created its environment,
   * disposes that environment. Work already running is not interrupted.
   */
  dispose(): void {
    if (this.disposed) {
      return;
    }
    this._state = 'disposed';
    try {
      this.future?.cancel();
      clearModule(this.module);
    } finally {
      if (this.ownsEnvironment && this.environment instanceof ManagedEnvironment) {
        this.environment.dispose();
      }
    }
    scriptLogger.debug('Script disposed', { module: this.module.name });
  }

  private runInline(): void {
    this.enter(() => {
      try {
        this.executor(this.module, this.host);
      } catch (error) {
        throw new ExecutionError(error, { module: this.module.name });
      }
    });
  }

  private enter<T>(fn: () => T): T {
    const environment = this.environment;
    if (environment instanceof ManagedEnvironment) {
      return environment.use(fn);
    }
    return this.host.withEnvironment(environment, fn);
  }
}

/**
 * Drops every binding of a module. Bindings the vm refuses to delete
 * (declared with var) are overwritten with undefined; accessors and
 * read-only bindings are left alone.
 */
export function clearModule(module: ScriptModule): void {
  const bindings = module.bindings;
  for (const key of Object.keys(bindings)) {
    if (Reflect.deleteProperty(bindings, key)) {
      continue;
    }
    const descriptor = Object.getOwnPropertyDescriptor(bindings, key);
    if (descriptor?.writable) {
      bindings[key] = undefined;
    }
  }
}
