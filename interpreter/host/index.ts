import type { HostRuntime } from '@core/types/host';
import { VmHostRuntime } from './VmHostRuntime';

export { VmHostRuntime } from './VmHostRuntime';
export type { VmHostRuntimeOptions } from './VmHostRuntime';

let defaultHost: HostRuntime | undefined;

/**
 * The process-wide host runtime, created on first use.
 */
export function getHostRuntime(): HostRuntime {
  defaultHost ??= new VmHostRuntime();
  return defaultHost;
}

/**
 * Replaces the process-wide host runtime. Policies and scripts created
 * afterwards use the new one unless given a host explicitly.
 */
export function setHostRuntime(host: HostRuntime): void {
  defaultHost = host;
}
