/**
 * Renderers Module
 *
 * Turns generated markdown plus metadata and optional branding into binary
 * artifacts:
 * - DOCX: line-oriented markdown translation onto docx paragraphs
 * - PDF: markdown -> HTML (marked, Prism code highlighting) -> per-type or
 *   default HTML layout -> PDF through the two-tier engine strategy
 *
 * The DOCX converter is line based. Tables, blockquotes and multi-line list
 * items are not recognised and come out as plain paragraphs.
 */

import {
  AlignmentType,
  Document,
  Footer,
  Header,
  HeadingLevel,
  LevelFormat,
  Packer,
  Paragraph,
  TextRun,
  convertInchesToTwip,
} from 'docx';
import Handlebars from 'handlebars';
import { Marked, type Tokens } from 'marked';
import Prism from 'prismjs';
import loadLanguages from 'prismjs/components/index';
import { ConfigurationFailure } from '../errors/index.js';
import { noopMetrics } from '../logging/index.js';
import type { PdfRenderStrategy } from '../pdf-engines/index.js';
import { renderTemplate, type TemplateSource } from '../templating/index.js';
import type {
  BrandingContext,
  ExportFormat,
  Logger,
  Metrics,
  RenderMetadata,
  RenderRequest,
  RenderedArtifact,
} from '../types/index.js';
import { DEFAULT_HTML_TEMPLATE, FALLBACK_STYLESHEET, PRIMARY_STYLESHEET } from './styles.js';

export { DEFAULT_HTML_TEMPLATE, FALLBACK_STYLESHEET, PRIMARY_STYLESHEET };

export const DOCX_MIME_TYPE = 'application/vnd.openxmlformats-officedocument.wordprocessingml.document';
export const PDF_MIME_TYPE = 'application/pdf';

export const MIME_TYPES: Record<ExportFormat, string> = {
  docx: DOCX_MIME_TYPE,
  pdf: PDF_MIME_TYPE,
};

const NUMBERED_LIST_REFERENCE = 'numbered-list';

const defaultLogger: Logger = {
  info: (msg, meta) => console.log(`[INFO] [renderers] ${msg}`, meta ? JSON.stringify(meta) : ''),
  warn: (msg, meta) => console.warn(`[WARN] [renderers] ${msg}`, meta ? JSON.stringify(meta) : ''),
  error: (msg, meta) => console.error(`[ERROR] [renderers] ${msg}`, meta ? JSON.stringify(meta) : ''),
  debug: (msg, meta) => console.debug(`[DEBUG] [renderers] ${msg}`, meta ? JSON.stringify(meta) : ''),
};

// ============================================================================
// Shared Helpers
// ============================================================================

/**
 * `performance_review` -> `Performance Review`
 */
export function titleFromDocType(docType: string): string {
  return docType
    .split('_')
    .filter((word) => word !== '')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}

function isoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

// ============================================================================
// DOCX Block Parsing
// ============================================================================

export interface DocxRun {
  text: string;
  bold: boolean;
}

export type DocxBlock =
  | { kind: 'heading'; level: 1 | 2 | 3; text: string }
  | { kind: 'bullet'; text: string }
  | { kind: 'numbered'; text: string }
  | { kind: 'paragraph'; runs: DocxRun[] };

const NUMBERED_ITEM = /^\d+\.\s+(.*)$/;

/**
 * Split `text` on `**`; odd-indexed parts are bold, empty parts dropped
 */
export function splitBoldRuns(text: string): DocxRun[] {
  return text
    .split('**')
    .map((part, index) => ({ text: part, bold: index % 2 === 1 }))
    .filter((run) => run.text !== '');
}

/**
 * Translate markdown into DOCX blocks one trimmed, non-blank line at a time
 */
export function parseMarkdownBlocks(content: string): DocxBlock[] {
  const blocks: DocxBlock[] = [];

  for (const raw of content.split('\n')) {
    const line = raw.trim();
    if (line === '') {
      continue;
    }

    if (line.startsWith('### ')) {
      blocks.push({ kind: 'heading', level: 3, text: line.slice(4).trim() });
    } else if (line.startsWith('## ')) {
      blocks.push({ kind: 'heading', level: 2, text: line.slice(3).trim() });
    } else if (line.startsWith('# ')) {
      blocks.push({ kind: 'heading', level: 1, text: line.slice(2).trim() });
    } else if (line.startsWith('- ') || line.startsWith('* ')) {
      blocks.push({ kind: 'bullet', text: line.slice(2).trim() });
    } else if (NUMBERED_ITEM.test(line)) {
      blocks.push({ kind: 'numbered', text: NUMBERED_ITEM.exec(line)?.[1] ?? line });
    } else if (line.includes('**')) {
      blocks.push({ kind: 'paragraph', runs: splitBoldRuns(line) });
    } else {
      blocks.push({ kind: 'paragraph', runs: [{ text: line, bold: false }] });
    }
  }

  return blocks;
}

const HEADING_LEVELS = {
  1: HeadingLevel.HEADING_1,
  2: HeadingLevel.HEADING_2,
  3: HeadingLevel.HEADING_3,
} as const;

function toParagraph(block: DocxBlock): Paragraph {
  switch (block.kind) {
    case 'heading':
      return new Paragraph({ heading: HEADING_LEVELS[block.level], children: [new TextRun(block.text)] });
    case 'bullet':
      return new Paragraph({ bullet: { level: 0 }, children: [new TextRun(block.text)] });
    case 'numbered':
      return new Paragraph({
        numbering: { reference: NUMBERED_LIST_REFERENCE, level: 0 },
        children: [new TextRun(block.text)],
      });
    case 'paragraph':
      return new Paragraph({
        children: block.runs.map((run) => new TextRun({ text: run.text, bold: run.bold })),
      });
  }
}

// ============================================================================
// Markdown -> HTML
// ============================================================================

const HIGHLIGHT_LANGUAGES = ['typescript', 'python', 'bash', 'json', 'yaml', 'sql'];
loadLanguages(HIGHLIGHT_LANGUAGES);

function highlightCode(code: string, lang: string | undefined): string {
  const language = (lang ?? '').trim().split(/\s+/)[0]?.toLowerCase() ?? '';
  // Prism.languages also carries helper functions; only objects are grammars
  const grammar = /^[a-z0-9+#-]+$/.test(language) ? Prism.languages[language] : undefined;
  if (typeof grammar !== 'object' || grammar === null) {
    return `<pre><code>${Handlebars.escapeExpression(code)}</code></pre>\n`;
  }
  const highlighted = Prism.highlight(code, grammar, language);
  return `<pre><code class="language-${language}">${highlighted}</code></pre>\n`;
}

const markdown = new Marked({
  gfm: true,
  renderer: {
    code(token: Tokens.Code): string {
      return highlightCode(token.text, token.lang);
    },
  },
});

/**
 * GitHub-flavoured markdown (tables included) to an HTML fragment
 */
export function markdownToHtml(content: string): string {
  const html = markdown.parse(content, { async: false });
  if (typeof html !== 'string') {
    throw new ConfigurationFailure('Markdown conversion returned a pending result', {
      code: 'MARKDOWN_RENDER_FAILED',
    });
  }
  return html;
}

// ============================================================================
// Document Renderer
// ============================================================================

export interface DocumentRendererOptions {
  /** Bound at construction; absent means unbranded output */
  branding?: BrandingContext;
  pdf: PdfRenderStrategy;
  /** Looked up as `<docType>_template` */
  htmlTemplates?: TemplateSource;
  now?: () => Date;
  logger?: Logger;
  metrics?: Metrics;
}

export class DocumentRenderer {
  private readonly branding: BrandingContext | undefined;
  private readonly pdf: PdfRenderStrategy;
  private readonly htmlTemplates: TemplateSource | undefined;
  private readonly now: () => Date;
  private readonly logger: Logger;
  private readonly metrics: Metrics;

  constructor(options: DocumentRendererOptions) {
    this.branding = options.branding;
    this.pdf = options.pdf;
    this.htmlTemplates = options.htmlTemplates;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? defaultLogger;
    this.metrics = options.metrics ?? noopMetrics;
  }

  async render(
    format: ExportFormat,
    content: string,
    docType: string,
    metadata: RenderMetadata = {}
  ): Promise<RenderedArtifact> {
    const data =
      format === 'docx'
        ? await this.renderDocx(content, docType, metadata)
        : await this.renderPdf(content, docType, metadata);
    return { data, mimeType: MIME_TYPES[format] };
  }

  async renderDocx(content: string, docType: string, metadata: RenderMetadata = {}): Promise<Buffer> {
    const startTime = Date.now();
    const title = metadata.title || titleFromDocType(docType);
    const date = metadata.date || isoDate(this.now());

    const metadataRuns = [new TextRun(`Generated: ${date}`)];
    if (metadata.reference) {
      metadataRuns.push(new TextRun({ text: `Reference: ${metadata.reference}`, break: 1 }));
    }

    const children = [
      new Paragraph({ heading: HeadingLevel.TITLE, alignment: AlignmentType.CENTER, children: [new TextRun(title)] }),
      new Paragraph({ alignment: AlignmentType.CENTER, children: metadataRuns }),
      new Paragraph({}),
      ...parseMarkdownBlocks(content).map(toParagraph),
    ];

    const margin = convertInchesToTwip(1);
    const doc = new Document({
      title,
      creator: this.branding?.name ?? 'HR Document Studio',
      numbering: {
        config: [
          {
            reference: NUMBERED_LIST_REFERENCE,
            levels: [
              {
                level: 0,
                format: LevelFormat.DECIMAL,
                text: '%1.',
                alignment: AlignmentType.START,
                style: { paragraph: { indent: { left: 720, hanging: 360 } } },
              },
            ],
          },
        ],
      },
      sections: [
        {
          properties: {
            page: { margin: { top: margin, right: margin, bottom: margin, left: margin } },
          },
          ...this.docxHeaderFooter(),
          children,
        },
      ],
    });

    let buffer: Buffer;
    try {
      buffer = await Packer.toBuffer(doc);
    } catch (error) {
      throw new ConfigurationFailure(
        `DOCX rendering failed: ${error instanceof Error ? error.message : String(error)}`,
        { code: 'DOCX_RENDER_FAILED', cause: error }
      );
    }

    this.metrics.timing('renderer.docx.duration', Date.now() - startTime, { doc_type: docType });
    this.logger.info('DOCX generated', { docType, bytes: buffer.length, branded: this.branding !== undefined });
    return buffer;
  }

  async renderPdf(content: string, docType: string, metadata: RenderMetadata = {}): Promise<Buffer> {
    const startTime = Date.now();
    const html = await this.buildHtml(content, docType, metadata);

    const outcome = await this.pdf.render({
      html,
      stylesheet: PRIMARY_STYLESHEET,
      fallbackStylesheet: FALLBACK_STYLESHEET,
      headerText: this.branding?.name,
    });

    this.metrics.increment('renderer.pdf.engine', { engine: outcome.engine });
    this.metrics.timing('renderer.pdf.duration', Date.now() - startTime, { doc_type: docType });
    return outcome.data;
  }

  /**
   * Full HTML document for the PDF path
   */
  async buildHtml(content: string, docType: string, metadata: RenderMetadata = {}): Promise<string> {
    const template = (await this.htmlTemplates?.load(`${docType}_template`)) ?? DEFAULT_HTML_TEMPLATE;
    const now = this.now();

    return renderTemplate(
      template,
      {
        company: this.branding ?? null,
        content: markdownToHtml(content),
        title: metadata.title || titleFromDocType(docType),
        date: metadata.date || isoDate(now),
        reference: metadata.reference ?? '',
        year: now.getUTCFullYear(),
      },
      { escape: true }
    );
  }

  private docxHeaderFooter(): { headers?: { default: Header }; footers?: { default: Footer } } {
    if (!this.branding) {
      return {};
    }
    const { name, location, website } = this.branding;

    const headerRuns = [new TextRun({ text: name, bold: true, size: 28 })];
    if (location) {
      headerRuns.push(new TextRun({ text: location, size: 18, break: 1 }));
    }

    const footerStyle = { size: 18, color: '808080' };
    const footerRuns = [
      new TextRun({ text: `© ${this.now().getUTCFullYear()} ${name}. All rights reserved.`, ...footerStyle }),
    ];
    if (website) {
      footerRuns.push(new TextRun({ text: `Website: ${website}`, break: 1, ...footerStyle }));
    }

    return {
      headers: { default: new Header({ children: [new Paragraph({ alignment: AlignmentType.CENTER, children: headerRuns })] }) },
      footers: { default: new Footer({ children: [new Paragraph({ alignment: AlignmentType.CENTER, children: footerRuns })] }) },
    };
  }
}

// ============================================================================
// Convenience
// ============================================================================

export interface RenderDependencies {
  pdf: PdfRenderStrategy;
  htmlTemplates?: TemplateSource;
  now?: () => Date;
  logger?: Logger;
  metrics?: Metrics;
}

/**
 * Render one request with a renderer bound to the request's branding
 */
export async function renderArtifact(
  format: ExportFormat,
  request: RenderRequest,
  deps: RenderDependencies
): Promise<RenderedArtifact> {
  const renderer = new DocumentRenderer({ ...deps, branding: request.branding });
  return renderer.render(format, request.content, request.docType, request.metadata);
}
