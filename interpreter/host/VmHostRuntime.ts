import * as vm from 'vm';
import type {
  EnvironmentCore,
  EnvironmentDispatcher,
  EnvironmentHandle,
  EnvironmentPolicyApi,
  HostRuntime,
  OutputRecord,
  ScriptCode,
  ScriptModule
} from '@core/types/host';
import { HostRuntimeError } from '@core/errors/HostRuntimeError';
import { NoEnvironmentError } from '@core/errors/NoEnvironmentError';
import { PolicyConflictError } from '@core/errors/PolicyRegistrationError';
import { hostLogger } from '@core/utils/logger';

class VmEnvironment implements EnvironmentHandle {
  readonly outputs = new Map<number, OutputRecord>();
  readonly core: EnvironmentCore;

  constructor(readonly id: number, isAlive: () => boolean) {
    const outputs = this.outputs;
    const requireAlive = (operation: string) => {
      if (!isAlive()) {
        throw new HostRuntimeError(`${operation}: environment ${id} has been destroyed`, { id });
      }
    };

    this.core = {
      id,
      get outputs(): ReadonlyMap<number, OutputRecord> {
        return new Map(outputs);
      },
      setOutput(value: OutputRecord, index = 0): void {
        requireAlive('setOutput');
        outputs.set(index, value);
      },
      clearOutput(index: number): void {
        requireAlive('clearOutput');
        outputs.delete(index);
      }
    };
  }
}

export interface VmHostRuntimeOptions {
  /** Extra globals every script module receives */
  globals?: Record<string, unknown>;
}

/**
 * A host runtime whose environments are output tables and whose scripts run
 * in node:vm contexts.
 *
 * Scripts reach their environment through the `core` global, which is looked
 * up through the installed dispatcher on every access, so the same module can
 * act on different environments depending on which one is current.
 */
export class VmHostRuntime implements HostRuntime {
  private readonly environments = new Map<number, VmEnvironment>();
  private dispatcher?: EnvironmentDispatcher;
  private nextId = 1;

  constructor(private readonly options: VmHostRuntimeOptions = {}) {}

  registerPolicy(dispatcher: EnvironmentDispatcher): void {
    if (this.dispatcher !== undefined) {
      throw new PolicyConflictError();
    }

    this.dispatcher = dispatcher;
    const api: EnvironmentPolicyApi = {
      createEnvironment: () => this.createEnvironment(),
      destroyEnvironment: environment => this.disposeEnvironment(environment),
      unregisterPolicy: () => {
        if (this.dispatcher !== dispatcher) {
          throw new HostRuntimeError('This policy is no longer registered');
        }
        this.unregisterPolicy();
      }
    };

    try {
      dispatcher.onPolicyRegistered(api);
    } catch (error) {
      this.dispatcher = undefined;
      throw error;
    }
    hostLogger.debug('Policy installed');
  }

  unregisterPolicy(): void {
    const dispatcher = this.dispatcher;
    if (dispatcher === undefined) {
      return;
    }
    this.dispatcher = undefined;
    dispatcher.onPolicyCleared();
    hostLogger.debug('Policy removed');
  }

  get hasPolicy(): boolean {
    return this.dispatcher !== undefined;
  }

  createEnvironment(): EnvironmentHandle {
    const id = this.nextId++;
    const environment: VmEnvironment = new VmEnvironment(id, () => this.environments.get(id) === environment);
    this.environments.set(id, environment);
    hostLogger.debug('Environment created', { id });
    return environment;
  }

  disposeEnvironment(environment: EnvironmentHandle): void {
    const resolved = this.resolve(environment);
    resolved.outputs.clear();
    this.environments.delete(resolved.id);
    hostLogger.debug('Environment destroyed', { id: resolved.id });
  }

  isAlive(environment: EnvironmentHandle): boolean {
    return this.environments.get(environment.id) === environment;
  }

  currentEnvironment(): EnvironmentHandle | undefined {
    return this.dispatcher?.getCurrentEnvironment();
  }

  withEnvironment<T>(environment: EnvironmentHandle, fn: () => T): T {
    const dispatcher = this.requireDispatcher('withEnvironment');
    const previous = dispatcher.setEnvironment(environment);
    try {
      return fn();
    } finally {
      dispatcher.setEnvironment(previous);
    }
  }

  createModule(name: string): ScriptModule {
    const sandbox: Record<string, unknown> = {
      ...this.options.globals,
      console,
      __name__: name,
      setOutput: (value: OutputRecord, index?: number) =>
        this.requireCurrent('setOutput').core.setOutput(value, index),
      getOutputs: () => this.requireCurrent('getOutputs').core.outputs
    };
    Object.defineProperty(sandbox, 'core', {
      configurable: true,
      enumerable: true,
      get: () => this.requireCurrent('core').core
    });

    return { name, bindings: vm.createContext(sandbox) };
  }

  execute(code: ScriptCode, module: ScriptModule, filename = `<${module.name}>`): void {
    if (!vm.isContext(module.bindings)) {
      throw new HostRuntimeError(`Module ${module.name} was not created by this host runtime`);
    }
    const script = typeof code === 'string' ? new vm.Script(code, { filename }) : code;
    script.runInContext(module.bindings);
  }

  runInEnvironment(
    environment: EnvironmentHandle,
    code: ScriptCode,
    module: ScriptModule = this.createModule('__main__')
  ): ReadonlyMap<number, OutputRecord> {
    this.withEnvironment(environment, () => this.execute(code, module));
    return this.getOutputs(environment);
  }

  getOutputs(environment: EnvironmentHandle): ReadonlyMap<number, OutputRecord> {
    return new Map(this.resolve(environment).outputs);
  }

  getCore(environment: EnvironmentHandle): EnvironmentCore {
    return this.resolve(environment).core;
  }

  private resolve(environment: EnvironmentHandle): VmEnvironment {
    const resolved = this.environments.get(environment.id);
    if (resolved === undefined || resolved !== environment) {
      throw new HostRuntimeError(`Unknown or destroyed environment ${environment.id}`, {
        id: environment.id
      });
    }
    return resolved;
  }

  private requireDispatcher(operation: string): EnvironmentDispatcher {
    if (this.dispatcher === undefined) {
      throw new HostRuntimeError(`${operation}: no policy is registered with the host runtime`);
    }
    return this.dispatcher;
  }

  private requireCurrent(operation: string): VmEnvironment {
    const current = this.currentEnvironment();
    if (current === undefined) {
      throw new NoEnvironmentError(operation);
    }
    return this.resolve(current);
  }
}
