import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import type { ResolvedConfig, TextblocksConfig } from './types';
import { applyDefaults, assertValidConfig, validateConfig } from './utils';
import { ConfigurationError } from '@core/errors/ConfigurationError';
import { configLogger as logger } from '@core/utils/logger';

export const PROJECT_CONFIG_FILE = 'textblocks.config.json';

export interface ConfigLoaderOptions {
  projectPath?: string;
  // Overrides ~/.config/textblocks.json, mostly for tests
  globalConfigPath?: string;
}

/**
 * Load textblocks configuration from both global and project locations
 */
export class ConfigLoader {
  private globalConfigPath: string;
  private projectConfigPath: string;
  private cachedConfig?: ResolvedConfig;

  constructor(options: ConfigLoaderOptions = {}) {
    this.globalConfigPath = options.globalConfigPath
      ?? path.join(os.homedir(), '.config', 'textblocks.json');

    this.projectConfigPath = path.join(options.projectPath ?? process.cwd(), PROJECT_CONFIG_FILE);
  }

  /**
   * Load, merge, default and validate configurations.
   * @throws {ConfigurationError} if a file is unreadable or the result is invalid
   */
  load(): ResolvedConfig {
    if (this.cachedConfig) {
      return this.cachedConfig;
    }

    const globalConfig = this.loadConfigFile(this.globalConfigPath);
    const projectConfig = this.loadConfigFile(this.projectConfigPath);

    const resolved = applyDefaults(this.mergeConfigs(globalConfig, projectConfig));
    assertValidConfig(resolved, this.projectConfigPath);

    logger.debug('Loaded configuration', {
      globalConfigPath: this.globalConfigPath,
      projectConfigPath: this.projectConfigPath
    });

    this.cachedConfig = resolved;
    return resolved;
  }

  /**
   * Persist the project configuration. Invalid settings are rejected before
   * anything is written.
   */
  save(config: TextblocksConfig): ResolvedConfig {
    const resolved = applyDefaults(config);
    const issues = validateConfig(resolved);
    if (issues.length > 0) {
      logger.warn('Rejected configuration save', { issues });
      throw new ConfigurationError('Refusing to save invalid textblocks configuration', {
        issues,
        filePath: this.projectConfigPath
      });
    }

    fs.mkdirSync(path.dirname(this.projectConfigPath), { recursive: true });
    fs.writeFileSync(this.projectConfigPath, JSON.stringify(config, null, 2) + '\n', 'utf8');
    this.cachedConfig = undefined;
    return resolved;
  }

  getProjectConfigPath(): string {
    return this.projectConfigPath;
  }

  private loadConfigFile(filePath: string): TextblocksConfig {
    if (!fs.existsSync(filePath)) {
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    } catch (error) {
      throw new ConfigurationError(
        `Failed to read config from ${filePath}`,
        { issues: [{ path: '', message: error instanceof Error ? error.message : String(error) }], filePath },
        error
      );
    }

    if (!isConfigObject(parsed)) {
      throw new ConfigurationError(`Config in ${filePath} must be a JSON object`, {
        issues: [{ path: '', message: 'expected an object' }],
        filePath
      });
    }
    return parsed;
  }

  /**
   * Project settings override global ones section by section; corpus fields
   * are replaced, not concatenated.
   */
  private mergeConfigs(global: TextblocksConfig, project: TextblocksConfig): TextblocksConfig {
    return {
      grammar: { ...global.grammar, ...project.grammar },
      language: { ...global.language, ...project.language },
      templates: { ...global.templates, ...project.templates },
      corpus: { ...global.corpus, ...project.corpus }
    };
  }
}

function isConfigObject(value: unknown): value is TextblocksConfig {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  return ['grammar', 'language', 'templates', 'corpus'].every(key => {
    const section: unknown = Reflect.get(value, key);
    return section === undefined || (typeof section === 'object' && section !== null && !Array.isArray(section));
  });
}
