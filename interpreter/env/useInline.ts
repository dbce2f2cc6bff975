import type { EnvironmentHandle, HostRuntime } from '@core/types/host';
import { NoEnvironmentError } from '@core/errors/NoEnvironmentError';
import { getHostRuntime } from '@interpreter/host';
import { ManagedEnvironment } from './ManagedEnvironment';

export type EnvironmentTarget = ManagedEnvironment | EnvironmentHandle;

/**
 * Runs a synchronous block of library code inside the given environment.
 *
 * - a ManagedEnvironment is entered through an inline section,
 * - a raw handle is switched to and back,
 * - without a target the caller must already be inside an environment.
 */
export function useInline<T>(
  operation: string,
  target: EnvironmentTarget | undefined,
  fn: () => T,
  host: HostRuntime = getHostRuntime()
): T {
  if (target === undefined) {
    if (host.currentEnvironment() === undefined) {
      throw new NoEnvironmentError(operation);
    }
    return fn();
  }

  if (target instanceof ManagedEnvironment) {
    return target.inlineSection(fn);
  }

  return host.withEnvironment(target, fn);
}
