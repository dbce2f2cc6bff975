/**
 * Configuration types for scriptenv
 */

export type EnvironmentStoreKind = 'global' | 'thread' | 'task';

export interface ScriptEnvConfig {
  policy?: PolicyConfig;
  script?: ScriptConfig;
  logging?: LoggingConfig;
}

export interface PolicyConfig {
  /** Which affinity store new policies use (default: 'task') */
  store?: EnvironmentStoreKind;
}

export interface ScriptConfig {
  /** Run scripts on the calling stack instead of the loop's worker (default: true) */
  inline?: boolean;
  /** Name given to freshly created script modules (default: '__main__') */
  module?: string;
  /** Filename reported in traces of code loaded from memory (default: '<script>') */
  filename?: string;
}

export interface LoggingConfig {
  level?: string;
  /** Write JSON logs to this file in addition to the console */
  file?: string;
}

export interface ResolvedScriptConfig {
  inline: boolean;
  module: string;
  filename: string;
}
