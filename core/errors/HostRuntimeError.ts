import { ScriptEnvError, ErrorSeverity } from './ScriptEnvError';

export class HostRuntimeError extends ScriptEnvError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, {
      code: 'HOST_RUNTIME',
      severity: ErrorSeverity.Fatal,
      details
    });
  }
}
