/**
 * Pure-software PDF engine: node-html-parser builds a block layout from the
 * HTML and its inline stylesheet, pdf-lib draws it onto A4 pages with the
 * standard PDF fonts.
 */

import { HTMLElement, TextNode, parse, type Node } from 'node-html-parser';
import { PDFDocument, PageSizes, StandardFonts, rgb, type PDFFont, type PDFPage } from 'pdf-lib';
import {
  matchingRules,
  parseStylesheet,
  toStylePatch,
  type CssRule,
  type ElementKey,
  type RgbValue,
  type StylePatch,
  type TextAlign,
} from './css.js';
import type { PdfEngine, PdfRenderOptions } from './index.js';

// ============================================================================
// Layout Model
// ============================================================================

export interface TextStyle {
  fontSize: number;
  color: RgbValue;
  textAlign: TextAlign;
  bold: boolean;
  italic: boolean;
  monospace: boolean;
}

export interface LayoutRun {
  text: string;
  style: TextStyle;
}

export interface LayoutBlock {
  kind: 'text' | 'rule';
  runs: LayoutRun[];
  align: TextAlign;
  /** Left indent in points */
  indent: number;
  /** Vertical space above the block in points */
  spaceBefore: number;
}

export interface LayoutDocument {
  title?: string;
  subject?: string;
  blocks: LayoutBlock[];
}

const USER_AGENT_CSS = `
h1 { font-size: 22pt; font-weight: bold; margin-top: 14pt; margin-bottom: 8pt; }
h2 { font-size: 17pt; font-weight: bold; margin-top: 12pt; margin-bottom: 6pt; }
h3 { font-size: 14pt; font-weight: bold; margin-top: 10pt; margin-bottom: 5pt; }
h4, h5, h6 { font-weight: bold; margin-top: 8pt; margin-bottom: 4pt; }
p { margin-bottom: 8pt; }
ul, ol, table, pre, blockquote { margin-bottom: 8pt; }
li { margin-bottom: 3pt; }
blockquote { margin-left: 18pt; }
strong, b, th { font-weight: bold; }
em, i { font-style: italic; }
code, pre, kbd, samp { font-family: monospace; }
`;

const USER_AGENT_RULES = parseStylesheet(USER_AGENT_CSS);
const AUTHOR_ORDER_OFFSET = 100_000;

const SKIPPED_TAGS = new Set(['head', 'title', 'style', 'script', 'noscript', 'meta', 'link', 'template']);

const BLOCK_TAGS = new Set([
  'html', 'body', 'header', 'footer', 'main', 'section', 'article', 'nav', 'aside', 'div',
  'p', 'h1', 'h2', 'h3', 'h4', 'h5', 'h6', 'ul', 'ol', 'li', 'table', 'thead', 'tbody',
  'tfoot', 'tr', 'pre', 'blockquote', 'figure', 'address', 'dl', 'dt', 'dd',
]);

const LIST_INDENT = 18;

const INITIAL_STYLE: TextStyle = {
  fontSize: 11,
  color: { r: 0, g: 0, b: 0 },
  textAlign: 'left',
  bold: false,
  italic: false,
  monospace: false,
};

interface Frame {
  path: ElementKey[];
  style: TextStyle;
  indent: number;
  pre: boolean;
  list?: { ordered: boolean; counter: number };
}

function inheritStyle(parent: TextStyle, patch: StylePatch): TextStyle {
  return {
    fontSize: patch.fontSize ?? parent.fontSize,
    color: patch.color ?? parent.color,
    textAlign: patch.textAlign ?? parent.textAlign,
    bold: patch.bold ?? parent.bold,
    italic: patch.italic ?? parent.italic,
    monospace: patch.monospace ?? parent.monospace,
  };
}

class LayoutBuilder {
  readonly blocks: LayoutBlock[] = [];
  private runs: LayoutRun[] = [];
  private align: TextAlign = 'left';
  private indent = 0;
  private pendingSpace = 0;

  constructor(private readonly rules: CssRule[]) {}

  visit(node: Node, parent: Frame): void {
    if (node instanceof TextNode) {
      this.visitText(node.text, parent);
      return;
    }
    if (!(node instanceof HTMLElement)) {
      return;
    }

    const tag = node.rawTagName ? node.rawTagName.toLowerCase() : '';
    if (tag === '') {
      for (const child of node.childNodes) this.visit(child, parent);
      return;
    }
    if (SKIPPED_TAGS.has(tag)) {
      return;
    }

    const classes = (node.getAttribute('class') ?? '').split(/\s+/).filter((c) => c !== '');
    const path = [...parent.path, { tag, classes }];
    const patch = this.resolve(path, parent.style.fontSize);
    const frame: Frame = {
      path,
      style: inheritStyle(parent.style, patch),
      indent: parent.indent + (patch.marginLeft ?? 0),
      pre: parent.pre || tag === 'pre',
      list: parent.list,
    };

    switch (tag) {
      case 'br':
        this.flush();
        return;
      case 'hr':
        this.flush();
        this.blocks.push({ kind: 'rule', runs: [], align: 'left', indent: frame.indent, spaceBefore: this.takeSpace() });
        return;
      case 'ul':
      case 'ol':
        frame.list = { ordered: tag === 'ol', counter: 0 };
        frame.indent += LIST_INDENT;
        break;
      case 'td':
      case 'th':
        if (this.runs.length > 0) this.addRun(' | ', frame);
        break;
    }

    const isBlock = BLOCK_TAGS.has(tag);
    if (isBlock) {
      this.flush();
      this.space(patch.marginTop ?? 0);
    }
    if (tag === 'li') {
      const list = parent.list;
      const marker = list?.ordered ? `${++list.counter}. ` : '• ';
      this.addRun(marker, frame);
    }

    for (const child of node.childNodes) {
      this.visit(child, frame);
    }

    if (isBlock) {
      this.flush();
      this.space(patch.marginBottom ?? 0);
    }
  }

  flush(): void {
    while (this.runs.length > 0) {
      const last = this.runs[this.runs.length - 1];
      if (!last) break;
      const trimmed = last.text.trimEnd();
      if (trimmed !== '') {
        last.text = trimmed;
        break;
      }
      this.runs.pop();
    }

    if (this.runs.length > 0) {
      this.blocks.push({
        kind: 'text',
        runs: this.runs,
        align: this.align,
        indent: this.indent,
        spaceBefore: this.takeSpace(),
      });
    }
    this.runs = [];
  }

  private visitText(raw: string, frame: Frame): void {
    if (frame.pre) {
      raw.split('\n').forEach((line, index) => {
        if (index > 0) this.flush();
        if (line !== '') this.addRun(line.replace(/\t/g, '    '), frame);
      });
      return;
    }

    let text = raw.replace(/\s+/g, ' ');
    const last = this.runs[this.runs.length - 1];
    if (!last || last.text.endsWith(' ')) {
      text = text.trimStart();
    }
    if (text !== '') {
      this.addRun(text, frame);
    }
  }

  private addRun(text: string, frame: Frame): void {
    if (this.runs.length === 0) {
      this.align = frame.style.textAlign;
      this.indent = frame.indent;
    }
    this.runs.push({ text, style: frame.style });
  }

  private space(amount: number): void {
    this.pendingSpace = Math.max(this.pendingSpace, amount);
  }

  private takeSpace(): number {
    const space = this.pendingSpace;
    this.pendingSpace = 0;
    return space;
  }

  private resolve(path: ElementKey[], parentFontSize: number): StylePatch {
    const patch: StylePatch = {};
    for (const rule of matchingRules(USER_AGENT_RULES, path)) {
      Object.assign(patch, toStylePatch(rule.declarations, parentFontSize));
    }
    for (const rule of matchingRules(this.rules, path)) {
      Object.assign(patch, toStylePatch(rule.declarations, parentFontSize));
    }
    return patch;
  }
}

/**
 * Build the block layout for an HTML document, applying the CSS subset found
 * in its `<style>` elements.
 */
const DECLARATION = /<!doctype[^>]*>|<\?xml[^>]*\?>/gi;

export function layoutHtml(html: string): LayoutDocument {
  // the parser keeps declarations as text
  const root = parse(html.replace(DECLARATION, ''), {
    blockTextElements: { script: true, noscript: true, style: true },
  });

  const css = root
    .querySelectorAll('style')
    .map((el) => el.rawText)
    .join('\n');
  const builder = new LayoutBuilder(parseStylesheet(css, AUTHOR_ORDER_OFFSET));
  builder.visit(root, { path: [], style: INITIAL_STYLE, indent: 0, pre: false });
  builder.flush();

  const title = root.querySelector('title')?.text.trim();
  const subject = root.querySelector('meta[name="document-reference"]')?.getAttribute('content')?.trim();

  return {
    title: title || undefined,
    subject: subject || undefined,
    blocks: builder.blocks,
  };
}

export function blockText(block: LayoutBlock): string {
  return block.runs.map((run) => run.text).join('');
}

// ============================================================================
// Drawing
// ============================================================================

/** 25mm */
const PAGE_MARGIN = 70.87;
const LINE_SPACING = 1.35;
const FURNITURE_SIZE = 9;
const FURNITURE_COLOR = rgb(0.4, 0.4, 0.4);

type FontKey = 'regular' | 'bold' | 'italic' | 'boldItalic' | 'mono' | 'monoBold';

interface EmbeddedFont {
  font: PDFFont;
  charset: Set<number>;
}

type FontSet = Record<FontKey, EmbeddedFont>;

interface Piece {
  text: string;
  font: PDFFont;
  size: number;
  color: RgbValue;
  width: number;
}

async function embedFonts(doc: PDFDocument): Promise<FontSet> {
  const embed = async (name: StandardFonts): Promise<EmbeddedFont> => {
    const font = await doc.embedFont(name);
    return { font, charset: new Set(font.getCharacterSet()) };
  };
  return {
    regular: await embed(StandardFonts.Helvetica),
    bold: await embed(StandardFonts.HelveticaBold),
    italic: await embed(StandardFonts.HelveticaOblique),
    boldItalic: await embed(StandardFonts.HelveticaBoldOblique),
    mono: await embed(StandardFonts.Courier),
    monoBold: await embed(StandardFonts.CourierBold),
  };
}

function fontKey(style: TextStyle): FontKey {
  if (style.monospace) return style.bold ? 'monoBold' : 'mono';
  if (style.bold && style.italic) return 'boldItalic';
  if (style.bold) return 'bold';
  if (style.italic) return 'italic';
  return 'regular';
}

/**
 * Replace characters the standard fonts cannot encode
 */
export function toEncodable(text: string, charset: Set<number>): string {
  let out = '';
  for (const ch of text) {
    const codePoint = ch.codePointAt(0) ?? 0;
    if (charset.has(codePoint)) {
      out += ch;
    } else {
      out += /\s/.test(ch) ? ' ' : '?';
    }
  }
  return out;
}

class PageWriter {
  private readonly pages: PDFPage[] = [];
  private page: PDFPage;
  private cursor = 0;

  constructor(
    private readonly doc: PDFDocument,
    private readonly fonts: FontSet
  ) {
    this.page = this.addPage();
  }

  write(block: LayoutBlock): void {
    if (this.cursor < this.top()) {
      this.cursor -= block.spaceBefore;
    }

    const left = PAGE_MARGIN + block.indent;
    const right = this.page.getWidth() - PAGE_MARGIN;

    if (block.kind === 'rule') {
      this.ensure(8);
      this.page.drawLine({
        start: { x: left, y: this.cursor - 4 },
        end: { x: right, y: this.cursor - 4 },
        thickness: 0.75,
        color: FURNITURE_COLOR,
      });
      this.cursor -= 8;
      return;
    }

    for (const line of this.wrap(block.runs, right - left)) {
      const size = Math.max(...line.map((p) => p.size));
      const lineHeight = size * LINE_SPACING;
      this.ensure(lineHeight);

      const width = line.reduce((sum, p) => sum + p.width, 0);
      let x = left;
      if (block.align === 'center') x = left + (right - left - width) / 2;
      else if (block.align === 'right') x = right - width;

      for (const piece of line) {
        this.page.drawText(piece.text, {
          x,
          y: this.cursor - size,
          size: piece.size,
          font: piece.font,
          color: rgb(piece.color.r, piece.color.g, piece.color.b),
        });
        x += piece.width;
      }
      this.cursor -= lineHeight;
    }
  }

  /**
   * Draw the running header and "Page X of Y" footer on every page
   */
  finish(headerText?: string): void {
    const { font, charset } = this.fonts.regular;
    const total = this.pages.length;

    this.pages.forEach((page, index) => {
      const centre = (text: string, y: number): void => {
        const safe = toEncodable(text, charset);
        const width = font.widthOfTextAtSize(safe, FURNITURE_SIZE);
        page.drawText(safe, {
          x: (page.getWidth() - width) / 2,
          y,
          size: FURNITURE_SIZE,
          font,
          color: FURNITURE_COLOR,
        });
      };

      if (headerText) {
        centre(headerText, page.getHeight() - PAGE_MARGIN / 2);
      }
      centre(`Page ${index + 1} of ${total}`, PAGE_MARGIN / 2);
    });
  }

  private top(): number {
    return this.page.getHeight() - PAGE_MARGIN;
  }

  private addPage(): PDFPage {
    const page = this.doc.addPage(PageSizes.A4);
    this.pages.push(page);
    this.page = page;
    this.cursor = page.getHeight() - PAGE_MARGIN;
    return page;
  }

  private ensure(height: number): void {
    if (this.cursor - height < PAGE_MARGIN && this.cursor < this.top()) {
      this.addPage();
    }
  }

  private wrap(runs: LayoutRun[], maxWidth: number): Piece[][] {
    const lines: Piece[][] = [];
    let line: Piece[] = [];
    let width = 0;

    const pushLine = (): void => {
      while (line.length > 0 && line[line.length - 1]?.text === ' ') line.pop();
      if (line.length > 0) lines.push(line);
      line = [];
      width = 0;
    };

    for (const run of runs) {
      const { font, charset } = this.fonts[fontKey(run.style)];
      const size = run.style.fontSize;
      const text = toEncodable(run.text, charset);

      for (const token of text.split(/(\s+)/)) {
        if (token === '') continue;
        const isSpace = /^\s+$/.test(token);
        if (isSpace) {
          if (line.length === 0) continue;
          const piece = { text: ' ', font, size, color: run.style.color, width: font.widthOfTextAtSize(' ', size) };
          line.push(piece);
          width += piece.width;
          continue;
        }

        for (const chunk of splitToWidth(token, font, size, maxWidth)) {
          const chunkWidth = font.widthOfTextAtSize(chunk, size);
          if (width + chunkWidth > maxWidth && line.length > 0) {
            pushLine();
          }
          line.push({ text: chunk, font, size, color: run.style.color, width: chunkWidth });
          width += chunkWidth;
        }
      }
    }
    pushLine();

    return lines;
  }
}

/**
 * Break a single word that is wider than the line into line-sized chunks
 */
function splitToWidth(word: string, font: PDFFont, size: number, maxWidth: number): string[] {
  if (font.widthOfTextAtSize(word, size) <= maxWidth) {
    return [word];
  }
  const chunks: string[] = [];
  let current = '';
  for (const ch of word) {
    if (current !== '' && font.widthOfTextAtSize(current + ch, size) > maxWidth) {
      chunks.push(current);
      current = '';
    }
    current += ch;
  }
  if (current !== '') chunks.push(current);
  return chunks;
}

// ============================================================================
// Engine
// ============================================================================

export class FallbackPdfEngine implements PdfEngine {
  readonly name = 'pdf-lib';

  isAvailable(): boolean {
    return true;
  }

  async render(html: string, options: PdfRenderOptions = {}): Promise<Buffer> {
    const layout = layoutHtml(html);
    const doc = await PDFDocument.create();
    const writer = new PageWriter(doc, await embedFonts(doc));

    for (const block of layout.blocks) {
      writer.write(block);
    }
    writer.finish(options.headerText);

    if (layout.title) doc.setTitle(layout.title);
    if (layout.subject) doc.setSubject(layout.subject);
    doc.setProducer('HR Document Studio');
    doc.setCreator('hr-document-studio');

    return Buffer.from(await doc.save());
  }
}
