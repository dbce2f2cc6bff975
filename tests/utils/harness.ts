import { VmHostRuntime, type VmHostRuntimeOptions } from '@interpreter/host/VmHostRuntime';
import { Policy } from '@core/policy/Policy';
import { AsyncContextStore, type EnvironmentStore } from '@core/policy/EnvironmentStore';
import type { ManagedEnvironment } from '@interpreter/env/ManagedEnvironment';

export interface Harness {
  host: VmHostRuntime;
  policy: Policy;
  /** Creates an environment that teardown() disposes */
  environment(): ManagedEnvironment;
  teardown(): void;
}

/**
 * A private host runtime with a registered policy, so tests never share
 * environments through the process-wide host.
 */
export function createHarness(
  store: EnvironmentStore = new AsyncContextStore(),
  options: VmHostRuntimeOptions = {}
): Harness {
  const host = new VmHostRuntime(options);
  const policy = new Policy(store, { host });
  const created: ManagedEnvironment[] = [];
  policy.register();

  return {
    host,
    policy,
    environment() {
      const environment = policy.newEnvironment();
      created.push(environment);
      return environment;
    },
    teardown() {
      for (const environment of created) {
        environment.dispose();
      }
      if (policy.registered) {
        policy.unregister();
      }
    }
  };
}

/** Resolves after every pending setImmediate callback queued so far has run */
export function flushImmediates(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}
