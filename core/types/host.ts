import type { Script as VmScript } from 'vm';

/**
 * Opaque identity of one environment. The host runtime owns it; everything
 * else only references it.
 */
export interface EnvironmentHandle {
  readonly id: number;
}

export type OutputRecord = unknown;

/**
 * What code running inside an environment sees as `core`.
 */
export interface EnvironmentCore {
  readonly id: number;
  readonly outputs: ReadonlyMap<number, OutputRecord>;
  setOutput(value: OutputRecord, index?: number): void;
  clearOutput(index: number): void;
}

/** Source text or a precompiled vm script */
export type ScriptCode = string | VmScript;

/**
 * A script module: a name plus the binding table code executes against.
 */
export interface ScriptModule {
  readonly name: string;
  readonly bindings: Record<string, unknown>;
}

/**
 * Handed to a dispatcher once it has been installed.
 */
export interface EnvironmentPolicyApi {
  createEnvironment(): EnvironmentHandle;
  destroyEnvironment(environment: EnvironmentHandle): void;
  unregisterPolicy(): void;
}

/**
 * Decides which environment is current for a caller.
 * At most one dispatcher is installed on a host runtime at a time.
 */
export interface EnvironmentDispatcher {
  onPolicyRegistered(api: EnvironmentPolicyApi): void;
  onPolicyCleared(): void;
  getCurrentEnvironment(): EnvironmentHandle | undefined;
  /** Returns the environment that was current before */
  setEnvironment(environment: EnvironmentHandle | undefined): EnvironmentHandle | undefined;
  isAlive(environment: EnvironmentHandle): boolean;
}

export interface HostRuntime {
  registerPolicy(dispatcher: EnvironmentDispatcher): void;
  unregisterPolicy(): void;
  readonly hasPolicy: boolean;

  createEnvironment(): EnvironmentHandle;
  disposeEnvironment(environment: EnvironmentHandle): void;
  isAlive(environment: EnvironmentHandle): boolean;

  /** The caller's current environment, as reported by the installed dispatcher */
  currentEnvironment(): EnvironmentHandle | undefined;
  withEnvironment<T>(environment: EnvironmentHandle, fn: () => T): T;

  createModule(name: string): ScriptModule;
  /** Runs code against the caller's current environment */
  execute(code: ScriptCode, module: ScriptModule, filename?: string): void;
  runInEnvironment(
    environment: EnvironmentHandle,
    code: ScriptCode,
    module?: ScriptModule
  ): ReadonlyMap<number, OutputRecord>;

  getOutputs(environment: EnvironmentHandle): ReadonlyMap<number, OutputRecord>;
  getCore(environment: EnvironmentHandle): EnvironmentCore;
}
