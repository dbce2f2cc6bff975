/**
 * Central export point for scriptenv error types.
 */
export { ScriptEnvError, ErrorSeverity } from './ScriptEnvError';
export type { BaseErrorDetails, ScriptEnvErrorOptions } from './ScriptEnvError';
export { DisposedError } from './DisposedError';
export {
  PolicyRegistrationError,
  AlreadyRegisteredError,
  NotRegisteredError,
  PolicyConflictError
} from './PolicyRegistrationError';
export { ExecutionError } from './ExecutionError';
export { VariableNotFoundError } from './VariableNotFoundError';
export { NoLoopError } from './NoLoopError';
export { NoEnvironmentError } from './NoEnvironmentError';
export { Cancelled } from './Cancelled';
export { HostRuntimeError } from './HostRuntimeError';
export { InvalidStateError } from './InvalidStateError';
