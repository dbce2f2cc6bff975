import * as fs from 'fs';
import * as path from 'path';
import { loadConfig } from '@core/config/loader';
import { resolveScriptDefaults } from '@core/config/utils';
import { NoEnvironmentError } from '@core/errors/NoEnvironmentError';
import { Policy } from '@core/policy/Policy';
import type { EnvironmentHandle, HostRuntime, ScriptCode, ScriptModule } from '@core/types/host';
import { scriptLogger } from '@core/utils/logger';
import { ManagedEnvironment } from '@interpreter/env/ManagedEnvironment';
import { getHostRuntime } from '@interpreter/host';
import { chdirRunner, inlineRunner, workerRunner, type Runner } from './runners';
import { Script, type ScriptExecutor, type ScriptTarget } from './Script';

/**
 * Where loaded code runs:
 * - a ManagedEnvironment or raw handle is used as is,
 * - a Policy creates a fresh environment that the script owns,
 * - a Script lends its environment and module,
 * - nothing means the environment current for the caller.
 */
export type LoadTarget = ManagedEnvironment | EnvironmentHandle | Policy | Script;

export interface LoadOptions {
  /** Module name, or an existing module to run in */
  module?: string | ScriptModule;
  /** Run on the calling stack instead of the active loop's worker */
  inline?: boolean;
  /** Working directory while the code runs */
  chdir?: string;
  /** Filename reported in traces */
  filename?: string;
  host?: HostRuntime;
}

export function loadCode(code: ScriptCode, target?: LoadTarget, options: LoadOptions = {}): Script {
  const defaults = resolveScriptDefaults(loadConfig());
  const filename = options.filename ?? defaults.filename;
  return createScript(
    (module, host) => host.execute(code, module, filename),
    target,
    options,
    'loadCode'
  );
}

/**
 * Loads a script file. The path is resolved now; the file is read when the
 * script runs.
 */
export function loadScript(file: string, target?: LoadTarget, options: LoadOptions = {}): Script {
  const absolute = path.resolve(file);
  return createScript(
    (module, host) => host.execute(fs.readFileSync(absolute, 'utf8'), module, options.filename ?? absolute),
    target,
    options,
    'loadScript'
  );
}

function createScript(
  executor: ScriptExecutor,
  target: LoadTarget | undefined,
  options: LoadOptions,
  operation: string
): Script {
  const defaults = resolveScriptDefaults(loadConfig());
  const host = options.host ?? hostOf(target);

  let environment: ScriptTarget;
  let ownsEnvironment = false;
  let inherited: ScriptModule | undefined;

  if (target instanceof Script) {
    environment = target.environment;
    inherited = target.module;
  } else if (target instanceof Policy) {
    environment = target.newEnvironment();
    ownsEnvironment = true;
  } else if (target === undefined) {
    const current = host.currentEnvironment();
    if (current === undefined) {
      throw new NoEnvironmentError(operation);
    }
    environment = current;
  } else {
    environment = target;
  }

  const module =
    typeof options.module === 'object'
      ? options.module
      : inherited ?? host.createModule(options.module ?? defaults.module);

  const inline = options.inline ?? defaults.inline;
  let runner: Runner = inline ? inlineRunner : workerRunner(host);
  if (options.chdir !== undefined) {
    runner = chdirRunner(path.resolve(options.chdir), runner);
  }

  scriptLogger.debug('Script loaded', { operation, module: module.name, inline, ownsEnvironment });
  return new Script({ executor, module, environment, runner, host, ownsEnvironment });
}

function hostOf(target: LoadTarget | undefined): HostRuntime {
  if (target instanceof Script || target instanceof Policy || target instanceof ManagedEnvironment) {
    return target.host;
  }
  return getHostRuntime();
}
