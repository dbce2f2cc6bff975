import { ScriptEnvError, ErrorSeverity } from './ScriptEnvError';

export class NoEnvironmentError extends ScriptEnvError {
  constructor(operation: string) {
    super(`${operation}: no environment is current here`, {
      code: 'NO_ENVIRONMENT',
      severity: ErrorSeverity.Fatal,
      details: { operation }
    });
  }
}
