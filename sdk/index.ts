/**
 * scriptenv API entry point
 *
 * Runs scripts inside isolated environments, tracks which environment is
 * current per process, thread or async task, and bridges to the
 * application's event loop.
 */
import type { EnvironmentStoreKind, ScriptEnvConfig } from '@core/config/types';
import { loadConfig } from '@core/config/loader';
import { createEnvironmentStore, type EnvironmentStore } from '@core/policy/EnvironmentStore';
import { Policy } from '@core/policy/Policy';
import type { HostRuntime } from '@core/types/host';
import { configureLogging } from '@core/utils/logger';

// Errors
export * from '@core/errors/index';

// Configuration
export { ConfigLoader, loadConfig } from '@core/config/loader';
export type {
  EnvironmentStoreKind,
  ScriptEnvConfig,
  PolicyConfig,
  ScriptConfig,
  LoggingConfig
} from '@core/config/types';
export { configureLogging, createServiceLogger } from '@core/utils/logger';

// Futures
export { Future, DONE } from '@core/async/Future';
export type { FutureState, DoneCallback } from '@core/async/Future';

// Host runtime
export type {
  EnvironmentCore,
  EnvironmentDispatcher,
  EnvironmentHandle,
  EnvironmentPolicyApi,
  HostRuntime,
  OutputRecord,
  ScriptCode,
  ScriptModule
} from '@core/types/host';
export { VmHostRuntime, getHostRuntime, setHostRuntime } from '@interpreter/host/index';
export type { VmHostRuntimeOptions } from '@interpreter/host/index';

// Policies and stores
export { Policy } from '@core/policy/Policy';
export type { PolicyOptions } from '@core/policy/Policy';
export { ManagedPolicy } from '@core/policy/ManagedPolicy';
export {
  GlobalStore,
  ThreadLocalStore,
  AsyncContextStore,
  createEnvironmentStore
} from '@core/policy/EnvironmentStore';
export type {
  EnvironmentStore,
  EnvironmentRef,
  ThreadKey,
  ThreadLocalStoreOptions
} from '@core/policy/EnvironmentStore';

// Environments
export * from '@interpreter/env/index';

// Scripts
export * from '@interpreter/script/index';

// Event loops
export * from '@interpreter/loops/index';

export interface CreatePolicyOptions {
  /** Store kind or instance; defaults to the configured policy.store, then 'task' */
  store?: EnvironmentStoreKind | EnvironmentStore;
  host?: HostRuntime;
}

/**
 * Creates an unregistered policy backed by the configured store.
 */
export function createPolicy(options: CreatePolicyOptions = {}): Policy {
  const store =
    typeof options.store === 'object'
      ? options.store
      : createEnvironmentStore(options.store ?? loadConfig().policy?.store ?? 'task');
  return new Policy(store, { host: options.host });
}

/**
 * Applies a configuration (the loaded one by default) to the library's
 * loggers.
 */
export function configure(config: ScriptEnvConfig = loadConfig()): ScriptEnvConfig {
  configureLogging(config.logging);
  return config;
}
