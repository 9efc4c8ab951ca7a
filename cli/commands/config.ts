import * as path from 'path';
import chalk from 'chalk';
import { ConfigLoader } from '@core/config/loader';
import type { ResolvedConfig } from '@core/config/types';
import { consoleOutput, type CommandContextOptions } from '../utils/command-context';

export interface ConfigCommandOptions extends Pick<CommandContextOptions, 'startPath' | 'globalConfigPath' | 'output'> {
  validate?: boolean;
}

/**
 * Print the merged configuration, or only confirm that it is valid.
 * @throws {ConfigurationError} when either config file is rejected
 */
export function configCommand(options: ConfigCommandOptions = {}): ResolvedConfig {
  const output = options.output ?? consoleOutput;
  const loader = new ConfigLoader({
    projectPath: path.resolve(options.startPath ?? process.cwd()),
    globalConfigPath: options.globalConfigPath
  });
  const config = loader.load();

  if (options.validate) {
    output.log(chalk.green('Configuration is valid'));
  } else {
    output.log(JSON.stringify(config, null, 2));
  }
  return config;
}
