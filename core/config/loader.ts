import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { ConfigError } from '@core/errors';
import { configLogger as logger } from '@core/utils/logger';
import type { MdtaskConfig } from './types';
import { findConfigProblem, isMdtaskConfig } from './utils';

export const GLOBAL_CONFIG_FILE = path.join('.config', 'mdtask.json');
export const PROJECT_CONFIG_FILE = 'mdtask.config.json';

/**
 * Load mdtask configuration from both global and project locations
 */
export class ConfigLoader {
  private globalConfigPath: string;
  private projectConfigPath: string;
  private cachedConfig?: MdtaskConfig;

  constructor(projectPath?: string, homeDirectory: string = os.homedir()) {
    // Global config location: ~/.config/mdtask.json
    this.globalConfigPath = path.join(homeDirectory, GLOBAL_CONFIG_FILE);

    // Project config location: <project>/mdtask.config.json
    this.projectConfigPath = path.join(projectPath ?? process.cwd(), PROJECT_CONFIG_FILE);
  }

  /**
   * Load and merge configurations
   */
  load(): MdtaskConfig {
    if (this.cachedConfig) {
      return this.cachedConfig;
    }

    const globalConfig = this.loadConfigFile(this.globalConfigPath);
    const projectConfig = this.loadConfigFile(this.projectConfigPath);

    // Project overrides global
    this.cachedConfig = mergeConfigs(globalConfig, projectConfig);
    return this.cachedConfig;
  }

  /**
   * Load a single config file; a missing file is an empty config
   */
  private loadConfigFile(filePath: string): MdtaskConfig {
    if (!fs.existsSync(filePath)) {
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigError(filePath, reason, error);
    }

    if (!isMdtaskConfig(parsed)) {
      throw new ConfigError(filePath, findConfigProblem(parsed) ?? 'unexpected value');
    }

    logger.debug('Loaded configuration', { path: filePath });
    return parsed;
  }
}

/**
 * Merge two configs; language mappings merge by tag, everything else is replaced
 */
export function mergeConfigs(global: MdtaskConfig, project: MdtaskConfig): MdtaskConfig {
  const merged: MdtaskConfig = {};

  if (global.languages || project.languages) {
    merged.languages = { ...global.languages, ...project.languages };
  }

  const documentNames = project.documentNames ?? global.documentNames;
  if (documentNames) {
    merged.documentNames = documentNames;
  }

  const logLevel = project.logLevel ?? global.logLevel;
  if (logLevel) {
    merged.logLevel = logLevel;
  }

  return merged;
}
