import type { EnvironmentHandle, HostRuntime } from '@core/types/host';
import { environmentLogger } from '@core/utils/logger';

export interface TrackedEnvironment {
  host: HostRuntime;
  handle: EnvironmentHandle;
}

export const LEAK_WARNING_CODE = 'SCRIPTENV_ENVIRONMENT_LEAK';

/**
 * Reports environment wrappers that were garbage collected without being
 * disposed, and destroys what they left behind on the host.
 */
export class EnvironmentLeakTracker {
  private readonly registry = new FinalizationRegistry<TrackedEnvironment>(tracked =>
    this.reportLeak(tracked)
  );

  track(owner: object, tracked: TrackedEnvironment): void {
    this.registry.register(owner, tracked, owner);
  }

  untrack(owner: object): void {
    this.registry.unregister(owner);
  }

  reportLeak({ host, handle }: TrackedEnvironment): void {
    const message = `Environment ${handle.id} was garbage collected without dispose(). This might cause leaks.`;
    environmentLogger.warn(message, { id: handle.id });
    process.emitWarning(message, { type: 'ResourceWarning', code: LEAK_WARNING_CODE });

    if (host.isAlive(handle)) {
      host.disposeEnvironment(handle);
    }
  }
}

export const leakTracker = new EnvironmentLeakTracker();
