import * as path from 'path';
import { Liquid, type Template } from 'liquidjs';
import type { ITemplateRenderer, TemplateRenderContext } from '@core/types/document';
import { templateLogger as logger } from '@core/utils/logger';
import type { IFileSystemService } from '@services/fs/IFileSystemService';

export interface LiquidTemplateRendererOptions {
  directory: string;
  extension: string;
  fileSystem: IFileSystemService;
}

/**
 * Renders a resolved block through `<directory>/block--<name><extension>`
 * when that file exists. Templates see `content`, `block.name`,
 * `block.content` and `language`; output is not HTML-escaped.
 */
export class LiquidTemplateRenderer implements ITemplateRenderer {
  private readonly engine = new Liquid({ strictVariables: false, strictFilters: false });
  private readonly cache = new Map<string, Template[] | null>();

  constructor(private readonly options: LiquidTemplateRendererOptions) {}

  templatePath(blockName: string): string {
    return path.join(this.options.directory, `block--${blockName.toLowerCase()}${this.options.extension}`);
  }

  async render(blockName: string, value: string, context: TemplateRenderContext = {}): Promise<string | undefined> {
    const templates = await this.load(blockName);
    if (!templates) {
      return undefined;
    }

    const output: unknown = await this.engine.render(templates, {
      content: value,
      block: { name: blockName, content: value },
      language: context.language
    });
    logger.debug('Applied template override', { blockName, language: context.language });
    return String(output);
  }

  private async load(blockName: string): Promise<Template[] | null> {
    const filePath = this.templatePath(blockName);
    const cached = this.cache.get(filePath);
    if (cached !== undefined) {
      return cached;
    }

    let templates: Template[] | null = null;
    if (await this.options.fileSystem.exists(filePath)) {
      templates = this.engine.parse(await this.options.fileSystem.readFile(filePath), filePath);
    }
    this.cache.set(filePath, templates);
    return templates;
  }
}
