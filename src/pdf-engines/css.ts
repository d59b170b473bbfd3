/**
 * CSS subset used by the fallback PDF engine.
 *
 * Selectors: tag, .class, tag.class and descendant combinations of those.
 * Properties: font-size, color, text-align, font-weight, font-style,
 * font-family (monospace only), margin, margin-top, margin-bottom, margin-left.
 * At-rules and anything else are ignored.
 */

export interface RgbValue {
  r: number;
  g: number;
  b: number;
}

export type TextAlign = 'left' | 'center' | 'right';

export interface StylePatch {
  fontSize?: number;
  color?: RgbValue;
  textAlign?: TextAlign;
  bold?: boolean;
  italic?: boolean;
  monospace?: boolean;
  marginTop?: number;
  marginBottom?: number;
  marginLeft?: number;
}

export interface CompoundSelector {
  tag?: string;
  classes: string[];
}

export interface CssRule {
  selector: CompoundSelector[];
  specificity: number;
  order: number;
  declarations: Map<string, string>;
}

/** Tag name and classes of one element on the path from the root */
export interface ElementKey {
  tag: string;
  classes: string[];
}

const COMPOUND_PATTERN = /^([a-z][a-z0-9]*)?((?:\.[A-Za-z0-9_-]+)*)$/i;

const NAMED_COLORS: Record<string, RgbValue> = {
  black: { r: 0, g: 0, b: 0 },
  white: { r: 1, g: 1, b: 1 },
  gray: { r: 0.5, g: 0.5, b: 0.5 },
  grey: { r: 0.5, g: 0.5, b: 0.5 },
  silver: { r: 0.75, g: 0.75, b: 0.75 },
  red: { r: 1, g: 0, b: 0 },
  green: { r: 0, g: 0.5, b: 0 },
  blue: { r: 0, g: 0, b: 1 },
  navy: { r: 0, g: 0, b: 0.5 },
};

// ============================================================================
// Parsing
// ============================================================================

export function parseSelector(text: string): CompoundSelector[] | null {
  const parts = text.trim().split(/\s+/);
  const compounds: CompoundSelector[] = [];

  for (const part of parts) {
    const match = COMPOUND_PATTERN.exec(part);
    if (!match || part === '') {
      return null;
    }
    const tag = match[1]?.toLowerCase();
    const classes = (match[2] ?? '').split('.').filter((c) => c !== '');
    compounds.push(tag ? { tag, classes } : { classes });
  }

  return compounds.length > 0 ? compounds : null;
}

function parseDeclarations(body: string): Map<string, string> {
  const declarations = new Map<string, string>();
  for (const entry of body.split(';')) {
    const colon = entry.indexOf(':');
    if (colon === -1) {
      continue;
    }
    const property = entry.slice(0, colon).trim().toLowerCase();
    const value = entry.slice(colon + 1).replace(/!important/i, '').trim();
    if (property !== '' && value !== '') {
      declarations.set(property, value);
    }
  }
  return declarations;
}

/**
 * Parse a stylesheet into one rule per supported selector. `orderOffset`
 * keeps source order stable across several stylesheets.
 */
export function parseStylesheet(css: string, orderOffset = 0): CssRule[] {
  const source = css.replace(/\/\*[\s\S]*?\*\//g, '');
  const rules: CssRule[] = [];
  let depth = 0;
  let prelude = '';
  let buffer = '';

  for (const ch of source) {
    if (ch === '{') {
      depth++;
      if (depth === 1) {
        prelude = buffer.trim();
        buffer = '';
        continue;
      }
    } else if (ch === '}') {
      depth--;
      if (depth === 0) {
        if (!prelude.startsWith('@')) {
          const declarations = parseDeclarations(buffer);
          for (const selectorText of prelude.split(',')) {
            const selector = parseSelector(selectorText);
            if (selector) {
              rules.push({
                selector,
                specificity: selector.reduce((sum, c) => sum + c.classes.length * 10 + (c.tag ? 1 : 0), 0),
                order: orderOffset + rules.length,
                declarations,
              });
            }
          }
        }
        buffer = '';
        continue;
      }
      if (depth < 0) {
        depth = 0;
        buffer = '';
        continue;
      }
    }
    buffer += ch;
  }

  return rules;
}

// ============================================================================
// Matching
// ============================================================================

function matchesCompound(compound: CompoundSelector, element: ElementKey): boolean {
  if (compound.tag && compound.tag !== element.tag) {
    return false;
  }
  return compound.classes.every((c) => element.classes.includes(c));
}

/**
 * `path` runs from the outermost ancestor to the element itself
 */
export function matchesSelector(selector: CompoundSelector[], path: ElementKey[]): boolean {
  const last = selector[selector.length - 1];
  const element = path[path.length - 1];
  if (!last || !element || !matchesCompound(last, element)) {
    return false;
  }

  let index = path.length - 2;
  for (let s = selector.length - 2; s >= 0; s--) {
    const compound = selector[s];
    if (!compound) {
      return false;
    }
    let found = false;
    while (index >= 0 && !found) {
      const ancestor = path[index];
      index--;
      found = ancestor !== undefined && matchesCompound(compound, ancestor);
    }
    if (!found) {
      return false;
    }
  }
  return true;
}

/**
 * Rules matching the element, weakest first
 */
export function matchingRules(rules: CssRule[], path: ElementKey[]): CssRule[] {
  return rules
    .filter((rule) => matchesSelector(rule.selector, path))
    .sort((a, b) => a.specificity - b.specificity || a.order - b.order);
}

// ============================================================================
// Values
// ============================================================================

/**
 * Length in points. `em` resolves against `baseSize`.
 */
export function parseLength(value: string, baseSize: number): number | undefined {
  const match = /^(-?\d*\.?\d+)(pt|px|mm|cm|in|em)?$/i.exec(value.trim());
  if (!match || match[1] === undefined) {
    return undefined;
  }
  const amount = Number.parseFloat(match[1]);
  switch ((match[2] ?? '').toLowerCase()) {
    case 'pt':
      return amount;
    case 'px':
      return amount * 0.75;
    case 'mm':
      return (amount * 72) / 25.4;
    case 'cm':
      return (amount * 72) / 2.54;
    case 'in':
      return amount * 72;
    case 'em':
      return amount * baseSize;
    default:
      return amount === 0 ? 0 : undefined;
  }
}

export function parseColor(value: string): RgbValue | undefined {
  const text = value.trim().toLowerCase();
  const named = NAMED_COLORS[text];
  if (named) {
    return named;
  }

  let hex = /^#([0-9a-f]{3}|[0-9a-f]{6})$/.exec(text)?.[1];
  if (hex === undefined) {
    return undefined;
  }
  if (hex.length === 3) {
    hex = hex
      .split('')
      .map((c) => c + c)
      .join('');
  }
  return {
    r: Number.parseInt(hex.slice(0, 2), 16) / 255,
    g: Number.parseInt(hex.slice(2, 4), 16) / 255,
    b: Number.parseInt(hex.slice(4, 6), 16) / 255,
  };
}

function parseMarginShorthand(value: string, baseSize: number): StylePatch {
  const lengths = value.split(/\s+/).map((part) => (part === 'auto' ? 0 : parseLength(part, baseSize)));
  if (lengths.some((l) => l === undefined)) {
    return {};
  }
  const [top = 0, right = top, bottom = top, left = right] = lengths.map((l) => l ?? 0);
  return { marginTop: top, marginBottom: bottom, marginLeft: left };
}

/**
 * Convert declarations into a patch. `parentFontSize` resolves `em` values.
 */
export function toStylePatch(declarations: Map<string, string>, parentFontSize: number): StylePatch {
  const patch: StylePatch = {};
  const fontSizeValue = declarations.get('font-size');
  const fontSize = fontSizeValue === undefined ? undefined : parseLength(fontSizeValue, parentFontSize);
  if (fontSize !== undefined && fontSize > 0) {
    patch.fontSize = fontSize;
  }
  const base = patch.fontSize ?? parentFontSize;

  for (const [property, value] of declarations) {
    switch (property) {
      case 'color': {
        const color = parseColor(value);
        if (color) patch.color = color;
        break;
      }
      case 'text-align':
        if (value === 'center' || value === 'right') {
          patch.textAlign = value;
        } else if (value === 'left' || value === 'justify') {
          patch.textAlign = 'left';
        }
        break;
      case 'font-weight':
        patch.bold = value === 'bold' || value === 'bolder' || Number.parseInt(value, 10) >= 600;
        break;
      case 'font-style':
        patch.italic = value === 'italic' || value === 'oblique';
        break;
      case 'font-family':
        patch.monospace = /monospace|courier/i.test(value);
        break;
      case 'margin':
        Object.assign(patch, parseMarginShorthand(value, base));
        break;
      case 'margin-top':
      case 'margin-bottom':
      case 'margin-left': {
        const length = value === 'auto' ? 0 : parseLength(value, base);
        if (length === undefined) break;
        if (property === 'margin-top') patch.marginTop = length;
        else if (property === 'margin-bottom') patch.marginBottom = length;
        else patch.marginLeft = length;
        break;
      }
    }
  }

  return patch;
}
