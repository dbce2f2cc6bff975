import { inspect, types } from 'util';
import { ScriptEnvError, ErrorSeverity } from './ScriptEnvError';

/**
 * Raised to every awaiter of a script whose code failed.
 *
 * Whatever the script throws, callers only ever see this type; the original
 * failure stays reachable through `parentError`.
 */
export class ExecutionError extends ScriptEnvError {
  public readonly parentError: unknown;

  constructor(parentError: unknown, details?: Record<string, unknown>) {
    const trace = ExecutionError.extractTraceback(parentError)
      .split('\n')
      .map(line => `| ${line}`)
      .join('\n');

    super(`An exception was raised while running the script.\n${trace}`, {
      code: 'EXECUTION_FAILED',
      severity: ErrorSeverity.Recoverable,
      cause: parentError,
      details
    });
    this.parentError = parentError;
  }

  static extractTraceback(error: unknown): string {
    // Errors thrown inside a vm context come from another realm
    if (types.isNativeError(error)) {
      const stack = error.stack ?? '';
      return stack.includes(error.message) ? stack : `${error.name}: ${error.message}\n${stack}`;
    }
    return `Uncaught ${describe(error)}`;
  }
}

// Thrown values may have no usable toString (e.g. null-prototype objects)
function describe(value: unknown): string {
  try {
    return String(value);
  } catch {
    return inspect(value);
  }
}
