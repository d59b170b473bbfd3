/**
 * PDF Engines
 *
 * Two-tier HTML-to-PDF rendering:
 * 1. Primary: headless Chromium (playwright-core), full CSS with running
 *    header and "Page X of Y" footer
 * 2. Fallback: pdf-lib layout engine, fed the HTML with a reduced stylesheet
 *    inlined
 *
 * Engine availability is resolved once when the strategy is built. There is
 * no third tier: if the fallback cannot produce the document, rendering fails
 * with a ConfigurationFailure.
 */

import { existsSync } from 'fs';
import Handlebars from 'handlebars';
import { chromium, type Browser } from 'playwright-core';
import { ConfigurationFailure } from '../errors/index.js';
import type { Logger } from '../types/index.js';
import { FallbackPdfEngine } from './fallback.js';

export { FallbackPdfEngine, layoutHtml, blockText } from './fallback.js';
export type { LayoutBlock, LayoutDocument, LayoutRun } from './fallback.js';

// ============================================================================
// Types
// ============================================================================

export interface PdfRenderOptions {
  /** Stylesheet applied on top of the document's own styles */
  stylesheet?: string;
  /** Text of the running page header */
  headerText?: string;
}

export interface PdfEngine {
  readonly name: string;
  isAvailable(): boolean;
  render(html: string, options?: PdfRenderOptions): Promise<Buffer>;
}

export interface PdfJob {
  html: string;
  /** Full stylesheet for the primary engine */
  stylesheet: string;
  /** Reduced stylesheet inlined for the fallback engine */
  fallbackStylesheet: string;
  headerText?: string;
}

export interface PdfOutcome {
  data: Buffer;
  engine: string;
}

const defaultLogger: Logger = {
  info: (msg, meta) => console.log(`[INFO] [pdf] ${msg}`, meta ? JSON.stringify(meta) : ''),
  warn: (msg, meta) => console.warn(`[WARN] [pdf] ${msg}`, meta ? JSON.stringify(meta) : ''),
  error: (msg, meta) => console.error(`[ERROR] [pdf] ${msg}`, meta ? JSON.stringify(meta) : ''),
  debug: (msg, meta) => console.debug(`[DEBUG] [pdf] ${msg}`, meta ? JSON.stringify(meta) : ''),
};

// ============================================================================
// Style Inlining
// ============================================================================

/**
 * Inline `css` into the document: right after an existing `<style>` opening
 * tag, else before `</head>`, else before `</html>`, else by wrapping the
 * fragment in a full document.
 */
export function inlineStyles(html: string, css: string): string {
  if (html.includes('<style>')) {
    return html.replace('<style>', `<style>\n${css}\n`);
  }

  const styleTag = `<style>\n${css}\n</style>`;
  if (html.includes('</head>')) {
    return html.replace('</head>', `${styleTag}\n</head>`);
  }
  if (html.includes('</html>')) {
    return html.replace('</html>', `${styleTag}\n</html>`);
  }
  return `<html><head>${styleTag}</head><body>${html}</body></html>`;
}

// ============================================================================
// Chromium Engine
// ============================================================================

export interface ChromiumEngineOptions {
  /** Browser binary; falls back to the playwright-managed Chromium location */
  executablePath?: string;
  logger?: Logger;
}

function resolveChromiumPath(configured?: string): string | null {
  if (configured) {
    return existsSync(configured) ? configured : null;
  }
  try {
    const managed = chromium.executablePath();
    return managed && existsSync(managed) ? managed : null;
  } catch {
    return null;
  }
}

const PAGE_MARGIN = '25mm';

/**
 * Close the browser without letting a close error replace the render outcome
 */
export async function closeBrowser(browser: Pick<Browser, 'close'>, logger: Logger): Promise<void> {
  try {
    await browser.close();
  } catch (error) {
    logger.warn('Failed to close Chromium', { error: error instanceof Error ? error.message : String(error) });
  }
}

export class ChromiumPdfEngine implements PdfEngine {
  readonly name = 'chromium';
  private readonly executablePath: string | null;
  private readonly logger: Logger;

  constructor(options: ChromiumEngineOptions = {}) {
    this.executablePath = resolveChromiumPath(options.executablePath);
    this.logger = options.logger ?? defaultLogger;
  }

  isAvailable(): boolean {
    return this.executablePath !== null;
  }

  async render(html: string, options: PdfRenderOptions = {}): Promise<Buffer> {
    if (this.executablePath === null) {
      throw new ConfigurationFailure('Chromium executable not found', {
        code: 'PDF_ENGINE_UNAVAILABLE',
        provider: this.name,
      });
    }

    let browser: Browser | null = null;
    try {
      browser = await chromium.launch({
        headless: true,
        executablePath: this.executablePath,
        args: ['--no-sandbox', '--disable-setuid-sandbox'],
      });
      const page = await browser.newPage();
      await page.setContent(html, { waitUntil: 'load' });
      if (options.stylesheet) {
        await page.addStyleTag({ content: options.stylesheet });
      }

      const header = options.headerText ? Handlebars.escapeExpression(options.headerText) : '';
      return await page.pdf({
        format: 'A4',
        printBackground: true,
        preferCSSPageSize: true,
        displayHeaderFooter: true,
        headerTemplate: `<div style="font-size:10px;color:#666;width:100%;text-align:center;">${header}</div>`,
        footerTemplate:
          '<div style="font-size:9px;color:#666;width:100%;text-align:center;">' +
          'Page <span class="pageNumber"></span> of <span class="totalPages"></span></div>',
        margin: { top: PAGE_MARGIN, right: PAGE_MARGIN, bottom: PAGE_MARGIN, left: PAGE_MARGIN },
      });
    } finally {
      if (browser) await closeBrowser(browser, this.logger);
    }
  }
}

// ============================================================================
// Strategy
// ============================================================================

export interface PdfEngines {
  primary?: PdfEngine;
  fallback?: PdfEngine;
}

export class PdfRenderStrategy {
  readonly primaryAvailable: boolean;
  readonly fallbackAvailable: boolean;
  private readonly primary: PdfEngine | null;
  private readonly fallback: PdfEngine | null;

  constructor(
    engines: PdfEngines,
    private readonly logger: Logger = defaultLogger
  ) {
    this.primary = engines.primary ?? null;
    this.fallback = engines.fallback ?? null;
    this.primaryAvailable = this.primary?.isAvailable() ?? false;
    this.fallbackAvailable = this.fallback?.isAvailable() ?? false;
  }

  async render(job: PdfJob): Promise<PdfOutcome> {
    if (!this.primaryAvailable && !this.fallbackAvailable) {
      throw new ConfigurationFailure('No PDF engine available', { code: 'PDF_ENGINE_UNAVAILABLE' });
    }

    if (this.primary && this.primaryAvailable) {
      try {
        const data = await this.primary.render(job.html, {
          stylesheet: job.stylesheet,
          headerText: job.headerText,
        });
        if (data.length > 0) {
          this.logger.info('PDF generated', { engine: this.primary.name, bytes: data.length });
          return { data, engine: this.primary.name };
        }
        this.logger.warn('Primary PDF engine returned no output, trying fallback', { engine: this.primary.name });
      } catch (error) {
        this.logger.warn('Primary PDF engine failed, trying fallback', {
          engine: this.primary.name,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    if (!this.fallback || !this.fallbackAvailable) {
      throw new ConfigurationFailure('Primary PDF engine failed and no fallback engine is available', {
        code: 'PDF_ENGINE_UNAVAILABLE',
      });
    }

    let data: Buffer;
    try {
      data = await this.fallback.render(inlineStyles(job.html, job.fallbackStylesheet), {
        headerText: job.headerText,
      });
    } catch (error) {
      throw new ConfigurationFailure(
        `Fallback PDF engine failed: ${error instanceof Error ? error.message : String(error)}`,
        { code: 'PDF_RENDER_FAILED', provider: this.fallback.name, cause: error }
      );
    }
    if (data.length === 0) {
      throw new ConfigurationFailure('Fallback PDF engine produced no output', {
        code: 'PDF_RENDER_FAILED',
        provider: this.fallback.name,
      });
    }

    this.logger.info('PDF generated', { engine: this.fallback.name, bytes: data.length });
    return { data, engine: this.fallback.name };
  }
}

export interface PdfStrategySettings {
  primaryEnabled: boolean;
  chromiumPath?: string;
}

export function createPdfStrategy(settings: PdfStrategySettings, logger?: Logger): PdfRenderStrategy {
  return new PdfRenderStrategy(
    {
      primary: settings.primaryEnabled
        ? new ChromiumPdfEngine({ executablePath: settings.chromiumPath, logger })
        : undefined,
      fallback: new FallbackPdfEngine(),
    },
    logger
  );
}
