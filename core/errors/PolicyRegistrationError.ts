import { ScriptEnvError, ErrorSeverity, type ScriptEnvErrorOptions } from './ScriptEnvError';

export class PolicyRegistrationError extends ScriptEnvError {
  constructor(message: string, options: Partial<ScriptEnvErrorOptions> & { code: string }) {
    super(message, {
      severity: ErrorSeverity.Fatal,
      ...options
    });
  }
}

export class AlreadyRegisteredError extends PolicyRegistrationError {
  constructor() {
    super('This policy is already registered', { code: 'POLICY_ALREADY_REGISTERED' });
  }
}

export class NotRegisteredError extends PolicyRegistrationError {
  constructor() {
    super('This policy is not registered', { code: 'POLICY_NOT_REGISTERED' });
  }
}

/**
 * Only one policy may be installed on a host runtime at a time.
 */
export class PolicyConflictError extends PolicyRegistrationError {
  constructor() {
    super('Another policy is already registered with the host runtime', {
      code: 'POLICY_CONFLICT'
    });
  }
}
