import { ScriptEnvError, ErrorSeverity } from './ScriptEnvError';

export class VariableNotFoundError extends ScriptEnvError {
  public readonly variableName: string;

  constructor(variableName: string, moduleName: string) {
    super(`name '${variableName}' is not defined in module '${moduleName}'`, {
      code: 'VARIABLE_NOT_FOUND',
      severity: ErrorSeverity.Recoverable,
      details: { variableName, moduleName }
    });
    this.variableName = variableName;
  }
}
