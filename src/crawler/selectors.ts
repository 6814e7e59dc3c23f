import * as cheerio from 'cheerio';
import { hasChildren, isTag, isText } from 'domhandler';
import type { AnyNode, Element } from 'domhandler';
import { PriceResolution } from '../types';
import { canonicalUrl } from '../utils/url';
import {
  CATEGORY_LINK_SELECTORS,
  IMAGE_ATTRIBUTES,
  LISTING_BRAND_PATTERNS,
  LISTING_OUT_OF_STOCK,
  LISTING_PRESCRIPTION,
  MIN_NAME_LENGTH,
  NAME_CLASS_SELECTOR,
  PRICE_TOKEN,
  PRODUCT_LINK_SELECTORS,
} from './patterns';

export type StrategyKind = 'selector' | 'attribute' | 'text' | 'url';

export interface Scope {
  $: cheerio.CheerioAPI;
  node: cheerio.Cheerio<AnyNode>;
  baseUrl: string;
}

export interface Strategy<T> {
  kind: StrategyKind;
  label: string;
  run(scope: Scope): T[];
}

export interface LinkCandidate {
  url: string;
  element: cheerio.Cheerio<Element>;
}

export interface FieldValues {
  name: string;
  brand: string;
  price: PriceResolution;
  image: string;
  inStock: boolean;
  prescriptionRequired: boolean;
  productLinks: LinkCandidate[];
  categoryLinks: LinkCandidate[];
}

const SKIPPED_TAGS = new Set(['script', 'style', 'noscript', 'template', 'svg', 'head']);
const BLOCK_TAGS = new Set([
  'address', 'article', 'aside', 'blockquote', 'dd', 'div', 'dl', 'dt', 'fieldset',
  'figcaption', 'figure', 'footer', 'form', 'h1', 'h2', 'h3', 'h4', 'h5', 'h6', 'header',
  'hr', 'li', 'main', 'nav', 'ol', 'p', 'pre', 'section', 'table', 'tbody', 'td', 'th',
  'thead', 'tr', 'ul',
]);

const PRICE_ANCESTOR_LEVELS = 3;
const FLAG_ANCESTOR_LEVELS = 2;
const IMAGE_ANCESTOR_LEVELS = 2;

export const cleanText = (value: string): string => value.replace(/\s+/g, ' ').trim();

export function textNodes(nodes: AnyNode[]): string[] {
  const texts: string[] = [];

  const walk = (node: AnyNode): void => {
    if (isText(node)) {
      texts.push(node.data);
    } else if (isTag(node)) {
      if (SKIPPED_TAGS.has(node.name)) return;
      node.children.forEach(walk);
    } else if (hasChildren(node)) {
      node.children.forEach(walk);
    }
  };

  nodes.forEach(walk);
  return texts;
}

export function visibleText(nodes: AnyNode[]): string {
  const parts: string[] = [];

  const walk = (node: AnyNode): void => {
    if (isText(node)) {
      parts.push(node.data);
    } else if (isTag(node)) {
      if (SKIPPED_TAGS.has(node.name)) return;
      if (node.name === 'br') {
        parts.push('\n');
        return;
      }
      const block = BLOCK_TAGS.has(node.name);
      if (block) parts.push('\n');
      node.children.forEach(walk);
      if (block) parts.push('\n');
    } else if (hasChildren(node)) {
      node.children.forEach(walk);
    }
  };

  nodes.forEach(walk);
  return parts
    .join('')
    .replace(/[^\S\n]+/g, ' ')
    .replace(/ *\n\s*/g, '\n')
    .trim();
}

export function scopeOf($: cheerio.CheerioAPI, node: cheerio.Cheerio<AnyNode>, baseUrl: string): Scope {
  return { $, node, baseUrl };
}

export function withAncestors(scope: Scope, levels: number): Scope[] {
  const ancestors = scope.node.first().parents().toArray().slice(0, levels);
  return [scope, ...ancestors.map(el => scopeOf(scope.$, scope.$(el), scope.baseUrl))];
}

/** Runs strategies in order; the first one yielding anything wins. */
export function cascadeFirst<T>(strategies: ReadonlyArray<Strategy<T>>, scopes: Scope[]): T | undefined {
  for (const scope of scopes) {
    for (const strategy of strategies) {
      const [first] = strategy.run(scope);
      if (first !== undefined) return first;
    }
  }
  return undefined;
}

/** Runs every strategy over every scope and keeps the first value per key. */
export function cascadePooled<T>(
  strategies: ReadonlyArray<Strategy<T>>,
  scopes: Scope[],
  key: (value: T) => string | number
): T[] {
  const seen = new Set<string | number>();
  const pooled: T[] = [];

  for (const scope of scopes) {
    for (const strategy of strategies) {
      for (const value of strategy.run(scope)) {
        const k = key(value);
        if (seen.has(k)) continue;
        seen.add(k);
        pooled.push(value);
      }
    }
  }

  return pooled;
}

export function priceTokens(texts: string[]): number[] {
  const values: number[] = [];
  for (const text of texts) {
    for (const match of text.matchAll(PRICE_TOKEN)) {
      const value = parseFloat(match[1].replace(/,/g, ''));
      if (Number.isFinite(value)) values.push(value);
    }
  }
  return values;
}

export const roundTo2 = (value: number): number => Math.round(value * 100) / 100;

export function discountPercentage(current: number, original: number): number | undefined {
  if (original > current && original > 0) {
    return roundTo2(((original - current) / original) * 100);
  }
  return undefined;
}

/** Lowest distinct price is the current one, highest the original. */
export function resolvePrices(values: number[]): PriceResolution {
  const distinct = [...new Set(values)].sort((a, b) => a - b);
  if (distinct.length === 0) return {};

  const current = distinct[0];
  if (distinct.length === 1) return { current };

  const original = distinct[distinct.length - 1];
  return { current, original, discountPercentage: discountPercentage(current, original) };
}

export function normalisePricePair(current?: number, original?: number): PriceResolution {
  if (current === undefined) return original === undefined ? {} : { current: original };
  if (original === undefined || original <= current) return { current };
  return { current, original, discountPercentage: discountPercentage(current, original) };
}

export function containsKeyword(text: string, keywords: readonly string[]): boolean {
  const lower = text.toLowerCase();
  return keywords.some(keyword => lower.includes(keyword));
}

export function labelValue(text: string, patterns: readonly RegExp[]): string | undefined {
  for (const pattern of patterns) {
    const match = pattern.exec(text);
    const value = match?.[1] ? cleanText(match[1]) : '';
    if (value) return value;
  }
  return undefined;
}

export function labelInteger(text: string, patterns: readonly RegExp[]): number | undefined {
  const value = labelValue(text, patterns);
  if (value === undefined) return undefined;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

export function imageSource(img: cheerio.Cheerio<AnyNode>): string | undefined {
  for (const attribute of IMAGE_ATTRIBUTES) {
    const value = img.attr(attribute)?.trim();
    if (value && !value.startsWith('data:')) return value;
  }
  return undefined;
}

export const linksMatching = (selector: string): Strategy<LinkCandidate> => ({
  kind: 'selector',
  label: selector,
  run: ({ $, node, baseUrl }) =>
    node
      .find(selector)
      .toArray()
      .flatMap(el => {
        const url = canonicalUrl($(el).attr('href') || '', baseUrl);
        return url ? [{ url, element: $(el) }] : [];
      }),
});

const acceptName = (value: string | undefined): string[] => {
  const name = cleanText(value || '');
  return name.length >= MIN_NAME_LENGTH ? [name] : [];
};

const NAME_STRATEGIES: ReadonlyArray<Strategy<string>> = [
  { kind: 'text', label: 'element text', run: ({ node }) => acceptName(node.text()) },
  { kind: 'attribute', label: 'title', run: ({ node }) => acceptName(node.attr('title')) },
  {
    kind: 'attribute',
    label: 'alt',
    run: ({ node }) => acceptName(node.attr('alt') || node.find('img[alt]').first().attr('alt')),
  },
  {
    kind: 'selector',
    label: 'heading',
    run: ({ node }) => acceptName(node.find('h1, h2, h3, h4, h5, h6').first().text()),
  },
  {
    kind: 'selector',
    label: 'name or title class',
    run: ({ node }) =>
      acceptName(node.find(NAME_CLASS_SELECTOR).first().text() || node.siblings(NAME_CLASS_SELECTOR).first().text()),
  },
];

const BRAND_STRATEGY: Strategy<string> = {
  kind: 'text',
  label: 'brand label',
  run: ({ node }) => {
    const text = visibleText(node.toArray());
    for (const pattern of LISTING_BRAND_PATTERNS) {
      const brand = cleanText(pattern.exec(text)?.[1] || '');
      if (brand.length > 1 && !/\d/.test(brand)) return [brand];
    }
    return [];
  },
};

const PRICE_STRATEGY: Strategy<number> = {
  kind: 'text',
  label: 'currency token',
  run: ({ node }) => priceTokens(textNodes(node.toArray())),
};

const IMAGE_STRATEGY: Strategy<string> = {
  kind: 'attribute',
  label: 'img source',
  run: ({ node, baseUrl, $ }) => {
    const images = node.is('img') ? node.toArray() : node.find('img').toArray();
    return images.flatMap(img => {
      const src = imageSource($(img));
      const url = src ? canonicalUrl(src, baseUrl) : undefined;
      return url ? [url] : [];
    });
  },
};

const flagText = (scope: Scope): string =>
  withAncestors(scope, FLAG_ANCESTOR_LEVELS)
    .map(s => visibleText(s.node.toArray()))
    .join('\n');

const LOCATORS: { [F in keyof FieldValues]: (scope: Scope) => FieldValues[F] | undefined } = {
  name: scope => cascadeFirst(NAME_STRATEGIES, [scope]),
  brand: scope => cascadeFirst([BRAND_STRATEGY], withAncestors(scope, FLAG_ANCESTOR_LEVELS)),
  price: scope => {
    const values = cascadePooled([PRICE_STRATEGY], withAncestors(scope, PRICE_ANCESTOR_LEVELS), v => v);
    return values.length > 0 ? resolvePrices(values) : undefined;
  },
  image: scope => cascadePooled([IMAGE_STRATEGY], withAncestors(scope, IMAGE_ANCESTOR_LEVELS), v => v)[0],
  inStock: scope => !containsKeyword(flagText(scope), LISTING_OUT_OF_STOCK),
  prescriptionRequired: scope => containsKeyword(flagText(scope), LISTING_PRESCRIPTION),
  productLinks: scope => cascadePooled(PRODUCT_LINK_SELECTORS.map(linksMatching), [scope], link => link.url),
  categoryLinks: scope => cascadePooled(CATEGORY_LINK_SELECTORS.map(linksMatching), [scope], link => link.url),
};

export function locate<F extends keyof FieldValues>(scope: Scope, field: F): FieldValues[F] | undefined {
  return LOCATORS[field](scope);
}
