import { describe, it, expect } from 'vitest';
import * as cheerio from 'cheerio';
import {
  DEFAULT_TITLE,
  extractProductInfo,
  firstTextMatch,
  normalizeWhitespace,
} from '../extractor.js';

const PRODUCT_PAGE = `
<!DOCTYPE html>
<html>
<head>
  <meta property="og:title" content="【公式】フード付き
     ブランケット  ひざ掛け">
  <title>楽天市場 | フード付きブランケット</title>
</head>
<body>
  <h1 itemprop="name">フード付きブランケット</h1>
  <span itemprop="price" content="3980">¥3,980</span>
  <a itemprop="seller" href="/shop">
    ○○ショップ
  </a>
</body>
</html>
`;

describe('normalizeWhitespace', () => {
  it('collapses whitespace runs and trims', () => {
    expect(normalizeWhitespace('  a \n\t b   c \n')).toBe('a b c');
  });

  it('is idempotent', () => {
    const once = normalizeWhitespace(' ふわふわ\n\n  毛布 \t 大判 ');
    expect(normalizeWhitespace(once)).toBe(once);
  });
});

describe('firstTextMatch', () => {
  it('prefers the content attribute over element text', () => {
    const $ = cheerio.load('<span itemprop="price" content="3980">¥3,980</span>');
    expect(firstTextMatch($, ["span[itemprop='price']"])).toBe('3980');
  });

  it('falls through to later selectors when earlier ones miss', () => {
    const $ = cheerio.load('<div class="price2"> ¥1,200 </div>');
    expect(firstTextMatch($, ["span[itemprop='price']", '.price2'])).toBe('¥1,200');
  });

  it('stops at the first matching selector', () => {
    // The second selector is invalid and throws if it is ever evaluated
    const selectors = ['h1.name', 'div:bogus-pseudo'];

    const $ = cheerio.load('<h1 class="name">最初</h1>');
    expect(firstTextMatch($, selectors)).toBe('最初');

    const $empty = cheerio.load('<p>none</p>');
    expect(() => firstTextMatch($empty, selectors)).toThrow();
  });

  it('returns undefined when nothing matches', () => {
    const $ = cheerio.load('<p>none</p>');
    expect(firstTextMatch($, ['h1', '.price2'])).toBeUndefined();
  });
});

describe('extractProductInfo', () => {
  it('extracts title, price and shop from schema.org markup', () => {
    expect(extractProductInfo(PRODUCT_PAGE)).toEqual({
      title: '【公式】フード付き ブランケット ひざ掛け',
      price: '3980',
      shopName: '○○ショップ',
    });
  });

  it('falls back to the h1 and class-based selectors', () => {
    const html = `
      <h1 itemprop="name">  電気ケトル
        1.0L </h1>
      <span class="item-price-value">¥2,480</span>
      <a class="ItemShopName" href="/shop">家電ストア</a>
    `;
    expect(extractProductInfo(html)).toEqual({
      title: '電気ケトル 1.0L',
      price: '¥2,480',
      shopName: '家電ストア',
    });
  });

  it('uses the default title and no price or shop when nothing matches', () => {
    const info = extractProductInfo('<html><body><p>商品なし</p></body></html>');
    expect(info).toEqual({ title: DEFAULT_TITLE, price: undefined, shopName: undefined });
    expect(info.title).toBe('楽天の商品');
  });

  it('uses the default title when the matched title is blank', () => {
    const info = extractProductInfo('<html><head><title>   </title></head></html>');
    expect(info.title).toBe(DEFAULT_TITLE);
  });
});
