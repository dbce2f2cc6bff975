import { ScriptEnvError, ErrorSeverity } from './ScriptEnvError';

export class NoLoopError extends ScriptEnvError {
  constructor(operation?: string) {
    super(
      `No event loop has been set${operation ? ` (required by ${operation})` : ''}. Call setLoop() first.`,
      {
        code: 'NO_LOOP',
        severity: ErrorSeverity.Fatal,
        details: operation ? { operation } : undefined
      }
    );
  }
}
