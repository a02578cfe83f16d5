import * as cheerio from 'cheerio';
import type { ProductInfo } from './types.js';

// Rakuten item pages expose title, price and shop through schema.org markup.
// Each list is tried in order until one selector matches.
export const TITLE_SELECTORS: readonly string[] = [
  "meta[property='og:title']",
  "h1[itemprop='name']",
  'title',
];

export const PRICE_SELECTORS: readonly string[] = [
  "span[itemprop='price']",
  '.price2',
  "span[class*='price']",
];

export const SHOP_SELECTORS: readonly string[] = [
  "a[itemprop='seller']",
  "a[class*='ShopName']",
];

export const DEFAULT_TITLE = '楽天の商品';

/**
 * Collapses whitespace runs (including newlines) into single spaces and trims.
 */
export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function cleanText(value: string | undefined): string | undefined {
  if (!value) return undefined;
  const cleaned = normalizeWhitespace(value);
  return cleaned || undefined;
}

/**
 * Returns the text of the first element matched by any selector, in list order.
 * Stops at the first selector that matches; `content` (meta tags) wins over
 * the element's text.
 */
export function firstTextMatch($: cheerio.CheerioAPI, selectors: readonly string[]): string | undefined {
  for (const selector of selectors) {
    const node = $(selector).first();
    if (node.length === 0) continue;

    const content = node.attr('content');
    if (content !== undefined) {
      return content;
    }
    return node.text().trim();
  }
  return undefined;
}

/**
 * Extracts title, price and shop name from product page HTML.
 */
export function extractProductInfo(html: string): ProductInfo {
  const $ = cheerio.load(html);

  const title = cleanText(firstTextMatch($, TITLE_SELECTORS)) ?? DEFAULT_TITLE;
  const price = cleanText(firstTextMatch($, PRICE_SELECTORS));
  const shopName = cleanText(firstTextMatch($, SHOP_SELECTORS));

  return { title, price, shopName };
}
