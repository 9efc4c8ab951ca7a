import chalk from 'chalk';
import { getCommandContext, type CommandContextOptions } from '../utils/command-context';

export interface GetCommandOptions extends CommandContextOptions {
  name: string;
  multi?: boolean;
  itemized?: boolean;
  fields?: string[];
  lang?: string;
}

/**
 * Look up a block across the corpus and print its content.
 */
export async function getCommand(options: GetCommandOptions): Promise<void> {
  const { engine, output } = getCommandContext({ ...options, language: options.lang });

  const resolved = await engine.getBlock(options.name, {
    multiplicity: options.multi ? 'multi' : 'single',
    resultShape: options.itemized ? 'itemized' : 'concatenated',
    fieldScope: options.fields,
    language: options.lang
  });

  if (typeof resolved === 'string') {
    if (resolved === '') {
      output.error(chalk.yellow(`No block named "${options.name}" was found`));
      return;
    }
    output.log(resolved);
    return;
  }

  if (resolved.length === 0) {
    output.error(chalk.yellow(`No block named "${options.name}" was found`));
    return;
  }
  resolved.forEach((item, index) => {
    output.log(chalk.dim(`[${index + 1}]`) + ' ' + item);
  });
}
