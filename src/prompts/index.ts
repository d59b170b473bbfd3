/**
 * Prompt Builder
 *
 * Renders the prompt for a document type from its template, the request
 * fields and the optional branding snapshot.
 */

import { ConfigurationFailure } from '../errors/index.js';
import { renderTemplate, type TemplateSource } from '../templating/index.js';
import type { BrandingContext, Logger } from '../types/index.js';

export const BRANDING_DEFAULTS = {
  company_name: 'Our Company',
  industry: 'Technology',
  company_size: 'Growing team',
} as const;

const defaultLogger: Logger = {
  info: (msg, meta) => console.log(`[INFO] [prompts] ${msg}`, meta ? JSON.stringify(meta) : ''),
  warn: (msg, meta) => console.warn(`[WARN] [prompts] ${msg}`, meta ? JSON.stringify(meta) : ''),
  error: (msg, meta) => console.error(`[ERROR] [prompts] ${msg}`, meta ? JSON.stringify(meta) : ''),
  debug: (msg, meta) => console.debug(`[DEBUG] [prompts] ${msg}`, meta ? JSON.stringify(meta) : ''),
};

/**
 * Template variables derived from a branding snapshot
 */
export function brandingFields(branding: BrandingContext): Record<string, string> {
  return {
    company_name: branding.name || BRANDING_DEFAULTS.company_name,
    industry: branding.industry || BRANDING_DEFAULTS.industry,
    company_size: branding.size || BRANDING_DEFAULTS.company_size,
    company_location: branding.location ?? '',
    company_website: branding.website ?? '',
    company_description: branding.description ?? '',
    company_values: branding.values ?? '',
  };
}

export class PromptBuilder {
  constructor(
    private readonly templates: TemplateSource,
    private readonly logger: Logger = defaultLogger
  ) {}

  /**
   * Render the prompt for `docType`. Branding fields override request fields;
   * without branding only the neutral defaults are filled in, and only where
   * the request does not already supply them.
   */
  async build(docType: string, fields: Record<string, unknown>, branding?: BrandingContext): Promise<string> {
    const template = await this.templates.load(docType);
    if (template === null) {
      throw new ConfigurationFailure(`Prompt template not found: ${docType}`, {
        code: 'PROMPT_TEMPLATE_NOT_FOUND',
      });
    }

    const context: Record<string, unknown> = branding
      ? { ...fields, ...brandingFields(branding) }
      : { ...BRANDING_DEFAULTS, ...fields };

    const prompt = renderTemplate(template, context, { escape: false });

    this.logger.debug('Prompt built', {
      docType,
      promptLength: prompt.length,
      hasBranding: branding !== undefined,
    });

    return prompt;
  }
}
