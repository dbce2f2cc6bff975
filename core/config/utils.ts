import type {
  EnvironmentStoreKind,
  LoggingConfig,
  PolicyConfig,
  ResolvedScriptConfig,
  ScriptConfig,
  ScriptEnvConfig
} from './types';

const STORE_KINDS: readonly EnvironmentStoreKind[] = ['global', 'thread', 'task'];

export const DEFAULT_SCRIPT_CONFIG: ResolvedScriptConfig = {
  inline: true,
  module: '__main__',
  filename: '<script>'
};

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isStoreKind(value: unknown): value is EnvironmentStoreKind {
  return STORE_KINDS.some(kind => kind === value);
}

/**
 * Keep only the recognised settings of a parsed config file.
 * Unknown keys and values of the wrong type are dropped.
 */
export function normalizeConfig(raw: unknown): ScriptEnvConfig {
  if (!isRecord(raw)) {
    throw new Error('Configuration must be a JSON object');
  }

  const config: ScriptEnvConfig = {};

  if (isRecord(raw.policy)) {
    const policy: PolicyConfig = {};
    if (raw.policy.store !== undefined) {
      if (!isStoreKind(raw.policy.store)) {
        throw new Error(`Invalid policy.store: ${String(raw.policy.store)} (expected one of ${STORE_KINDS.join(', ')})`);
      }
      policy.store = raw.policy.store;
    }
    config.policy = policy;
  }

  if (isRecord(raw.script)) {
    const script: ScriptConfig = {};
    if (typeof raw.script.inline === 'boolean') script.inline = raw.script.inline;
    if (typeof raw.script.module === 'string') script.module = raw.script.module;
    if (typeof raw.script.filename === 'string') script.filename = raw.script.filename;
    config.script = script;
  }

  if (isRecord(raw.logging)) {
    const logging: LoggingConfig = {};
    if (typeof raw.logging.level === 'string') logging.level = raw.logging.level;
    if (typeof raw.logging.file === 'string') logging.file = raw.logging.file;
    config.logging = logging;
  }

  return config;
}

export function resolveScriptDefaults(config: ScriptEnvConfig = {}): ResolvedScriptConfig {
  return { ...DEFAULT_SCRIPT_CONFIG, ...config.script };
}
