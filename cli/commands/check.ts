import chalk from 'chalk';
import { getCommandContext, type CommandContextOptions } from '../utils/command-context';

export interface CheckCommandOptions extends CommandContextOptions {
  write?: boolean;
}

export interface CheckSummary {
  documents: number;
  renamed: number;
}

/**
 * Run the save-time uniqueness check over every document in the corpus.
 * With `write`, rewritten values are saved back before the next document is
 * checked, so a collision is only reported once per pair.
 */
export async function checkCommand(options: CheckCommandOptions = {}): Promise<CheckSummary> {
  const { engine, store, config, reporter, output } = getCommandContext(options);
  const fields = config.corpus.fields;
  const summary: CheckSummary = { documents: 0, renamed: 0 };

  for (const document of await store.listDocuments()) {
    summary.documents++;
    let changed = false;

    for (const field of fields) {
      for (const entry of document.fieldEntries(field)) {
        const result = await engine.beforeSave(document.id, fields, entry.value);
        if (!result.changed) continue;

        summary.renamed += result.renamed.length;
        const where = entry.language ? `${document.id} (${field}, ${entry.language})` : `${document.id} (${field})`;
        for (const warning of reporter.drain()) {
          output.log(chalk.yellow(`${where}: `) + warning);
        }

        if (options.write) {
          document.setFieldValue(field, result.text, entry.language);
          changed = true;
        }
      }
    }

    if (changed) {
      await store.saveDocument(document.id);
      output.log(chalk.green(`Updated ${document.id}`));
    }
  }

  if (summary.renamed === 0) {
    output.log(chalk.green(`No block name collisions in ${summary.documents} document(s)`));
  } else if (!options.write) {
    output.log(`${summary.renamed} block(s) would be converted; run again with --write to save`);
  }
  return summary;
}
