import { ScriptEnvError, ErrorSeverity } from './ScriptEnvError';

export class InvalidStateError extends ScriptEnvError {
  constructor(message: string) {
    super(message, {
      code: 'INVALID_STATE',
      severity: ErrorSeverity.Fatal
    });
  }
}
