export { ManagedEnvironment } from './ManagedEnvironment';
export { useInline } from './useInline';
export type { EnvironmentTarget } from './useInline';
export { EnvironmentLeakTracker, leakTracker, LEAK_WARNING_CODE } from './LeakTracker';
