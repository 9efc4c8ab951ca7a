import { Command, CommanderError } from 'commander';
import { version } from '@core/version';
import { cliLogger } from '@core/utils/logger';
import { ErrorHandler } from './error/ErrorHandler';
import { consoleOutput, type CommandOutput } from './utils/command-context';
import { renderCommand } from './commands/render';
import { getCommand } from './commands/get';
import { checkCommand } from './commands/check';
import { configCommand } from './commands/config';

export type CLIOptions = {
  cwd?: string;
  debug?: boolean;
};

export interface ProgramOptions {
  output?: CommandOutput;
  // Overrides ~/.config/textblocks.json for every command
  globalConfigPath?: string;
}

interface GetOptions {
  multi?: boolean;
  itemized?: boolean;
  field?: string[];
  lang?: string;
}

export function createProgram(programOptions: ProgramOptions = {}): Command {
  const output = programOptions.output ?? consoleOutput;
  const program = new Command();

  program
    .name('textblocks')
    .description('Render, look up and check text blocks in a document corpus')
    .version(version)
    .option('-C, --cwd <dir>', 'Project directory', process.cwd())
    .option('--debug', 'Show stack traces and debug logging')
    .exitOverride()
    .configureOutput({
      writeOut: text => output.log(text.trimEnd()),
      writeErr: text => output.error(text.trimEnd())
    })
    .hook('preAction', () => {
      if (program.opts<CLIOptions>().debug) {
        cliLogger.level = 'debug';
      }
    });

  const base = () => {
    const globals = program.opts<CLIOptions>();
    return { startPath: globals.cwd, globalConfigPath: programOptions.globalConfigPath, output };
  };

  program
    .command('render')
    .description('Format every block-enabled field of a document')
    .argument('<documentId>', 'Document to render')
    .option('-f, --field <field...>', 'Only render these fields')
    .option('-l, --lang <code>', 'Language to render in')
    .action(async (documentId: string, options: { field?: string[]; lang?: string }) => {
      await renderCommand({ ...base(), documentId, fields: options.field, lang: options.lang });
    });

  program
    .command('get')
    .description('Print a block defined anywhere in the corpus')
    .argument('<name>', 'Block name')
    .option('-m, --multi', 'Look up a multi-value block')
    .option('-i, --itemized', 'Print each match separately')
    .option('-f, --field <field...>', 'Only search these fields')
    .option('-l, --lang <code>', 'Language to look up')
    .action(async (name: string, options: GetOptions) => {
      await getCommand({
        ...base(),
        name,
        multi: options.multi,
        itemized: options.itemized,
        fields: options.field,
        lang: options.lang
      });
    });

  program
    .command('check')
    .description('Convert block names that collide with another document to multi-value form')
    .option('-w, --write', 'Save the converted documents')
    .action(async (options: { write?: boolean }) => {
      await checkCommand({ ...base(), write: options.write });
    });

  program
    .command('config')
    .description('Print the merged configuration')
    .option('--validate', 'Only check that the configuration is valid')
    .action((options: { validate?: boolean }) => {
      configCommand({ ...base(), validate: options.validate });
    });

  return program;
}

/**
 * Run the CLI and resolve to the process exit code.
 */
export async function main(args: string[] = process.argv.slice(2), programOptions: ProgramOptions = {}): Promise<number> {
  const program = createProgram(programOptions);

  try {
    await program.parseAsync(args, { from: 'user' });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    const debug = program.opts<CLIOptions>().debug === true;
    return new ErrorHandler(programOptions.output).handleError(error, { debug });
  }
}
