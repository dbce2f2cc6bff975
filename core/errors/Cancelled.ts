import { ScriptEnvError, ErrorSeverity } from './ScriptEnvError';

/**
 * Uniform cancellation signal. Event loops translate it into their own
 * cancellation primitive through wrapCancelled().
 */
export class Cancelled extends ScriptEnvError {
  constructor(message = 'The operation has been cancelled') {
    super(message, {
      code: 'CANCELLED',
      severity: ErrorSeverity.Recoverable
    });
  }
}
