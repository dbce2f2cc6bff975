import { ScriptEnvError, ErrorSeverity } from './ScriptEnvError';

/**
 * Raised when an environment or a script is used after dispose().
 */
export class DisposedError extends ScriptEnvError {
  constructor(resource: string, details?: Record<string, unknown>) {
    super(`${resource} has already been disposed`, {
      code: 'DISPOSED',
      severity: ErrorSeverity.Fatal,
      details: { resource, ...details }
    });
  }
}
