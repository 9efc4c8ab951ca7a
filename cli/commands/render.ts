import chalk from 'chalk';
import { DocumentStoreError } from '@core/errors/DocumentStoreError';
import { getCommandContext, type CommandContextOptions } from '../utils/command-context';

export interface RenderCommandOptions extends CommandContextOptions {
  documentId: string;
  fields?: string[];
  lang?: string;
}

/**
 * Print the rendered value of each block-enabled field of one document.
 */
export async function renderCommand(options: RenderCommandOptions): Promise<void> {
  const context = getCommandContext({ ...options, language: options.lang });
  const { engine, store, config, output } = context;

  const document = await store.getDocument(options.documentId);
  if (!document) {
    throw new DocumentStoreError(`No document with id "${options.documentId}"`, {
      documentId: options.documentId,
      operation: 'load'
    });
  }

  const fields = options.fields && options.fields.length > 0 ? options.fields : config.corpus.fields;
  const language = options.lang ?? config.language.current;
  const showHeadings = fields.length > 1;

  for (const field of fields) {
    const value = document.getFieldValue(field, language) ?? document.getFieldValue(field, config.language.default);
    if (value === undefined) continue;

    if (showHeadings) {
      output.log(chalk.bold(`# ${field}`));
    }
    output.log(await engine.formatDocumentText(value, engine.createRenderScope()));
  }
}
