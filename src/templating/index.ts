/**
 * Templating Module
 *
 * Template lookup by key against an injectable source, plus Handlebars
 * rendering. Used for prompt text and for the PDF HTML layout.
 */

import { readFile } from 'fs/promises';
import { join } from 'path';
import Handlebars from 'handlebars';

/**
 * Resolves a template body by name. `null` means no template exists.
 */
export interface TemplateSource {
  load(name: string): Promise<string | null>;
}

const TEMPLATE_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Reads `<directory>/<name><suffix>` from disk
 */
export class FileTemplateSource implements TemplateSource {
  constructor(
    private readonly directory: string,
    private readonly suffix = ''
  ) {}

  async load(name: string): Promise<string | null> {
    if (!TEMPLATE_NAME_PATTERN.test(name)) {
      return null;
    }
    try {
      return await readFile(join(this.directory, `${name}${this.suffix}`), 'utf-8');
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }
}

export class MemoryTemplateSource implements TemplateSource {
  private readonly templates: Map<string, string>;

  constructor(templates: Record<string, string> = {}) {
    this.templates = new Map(Object.entries(templates));
  }

  async load(name: string): Promise<string | null> {
    return this.templates.get(name) ?? null;
  }
}

export interface RenderTemplateOptions {
  /** HTML-escape `{{value}}` interpolations */
  escape: boolean;
}

const handlebars = Handlebars.create();

// {{join list ", "}}
handlebars.registerHelper('join', (value: unknown, separator: unknown) => {
  const glue = typeof separator === 'string' ? separator : ', ';
  return Array.isArray(value) ? value.map(String).join(glue) : '';
});

/**
 * Substitute `context` into a Handlebars template. Missing values render empty.
 */
export function renderTemplate(
  template: string,
  context: Record<string, unknown>,
  options: RenderTemplateOptions
): string {
  const compiled = handlebars.compile(template, { noEscape: !options.escape });
  return compiled(context);
}
