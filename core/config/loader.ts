import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import type { ScriptEnvConfig } from './types';
import { normalizeConfig } from './utils';
import { logger } from '@core/utils/logger';

/**
 * Load scriptenv configuration from both global and project locations
 */
export class ConfigLoader {
  private globalConfigPath: string;
  private projectConfigPath: string;
  private cachedConfig?: ScriptEnvConfig;

  constructor(projectPath?: string) {
    // Global config location: ~/.config/scriptenv.json
    this.globalConfigPath = path.join(os.homedir(), '.config', 'scriptenv.json');

    // Project config location: <project>/scriptenv.config.json
    this.projectConfigPath = projectPath
      ? path.join(projectPath, 'scriptenv.config.json')
      : path.join(process.cwd(), 'scriptenv.config.json');
  }

  /**
   * Load and merge configurations
   */
  load(): ScriptEnvConfig {
    if (this.cachedConfig) {
      return this.cachedConfig;
    }

    const globalConfig = this.loadConfigFile(this.globalConfigPath);
    const projectConfig = this.loadConfigFile(this.projectConfigPath);

    // Project overrides global
    this.cachedConfig = this.mergeConfigs(globalConfig, projectConfig);

    return this.cachedConfig;
  }

  /**
   * Drop the cached result so the next load() reads the files again
   */
  reload(): ScriptEnvConfig {
    this.cachedConfig = undefined;
    return this.load();
  }

  private loadConfigFile(filePath: string): ScriptEnvConfig {
    try {
      if (fs.existsSync(filePath)) {
        const content = fs.readFileSync(filePath, 'utf8');
        return normalizeConfig(JSON.parse(content));
      }
    } catch (error) {
      logger.warn(`Failed to load config from ${filePath}`, {
        error: error instanceof Error ? error.message : String(error)
      });
    }

    return {};
  }

  private mergeConfigs(global: ScriptEnvConfig, project: ScriptEnvConfig): ScriptEnvConfig {
    const merged: ScriptEnvConfig = {};

    if (global.policy || project.policy) {
      merged.policy = { ...global.policy, ...project.policy };
    }

    if (global.script || project.script) {
      merged.script = { ...global.script, ...project.script };
    }

    if (global.logging || project.logging) {
      merged.logging = { ...global.logging, ...project.logging };
    }

    return merged;
  }
}

let defaultLoader: ConfigLoader | undefined;

/**
 * Configuration of the current working directory, loaded once.
 */
export function loadConfig(): ScriptEnvConfig {
  defaultLoader ??= new ConfigLoader();
  return defaultLoader.load();
}
