import type { ProductInfo } from './types.js';

export const MAX_REVIEW_LENGTH = 400;
// Kept characters when truncating, before the ellipsis
const TRUNCATED_LENGTH = 397;
const ELLIPSIS = '…';

/**
 * Builds the ROOM review text for a product.
 *
 * Layout: a "要点" summary line, a blank line, then three fixed bullets. Text over
 * 400 characters (code points) is cut to its first 397 plus an ellipsis.
 */
export function generateReview(info: ProductInfo): string {
  const keyPoints = [info.title];
  if (info.price) {
    keyPoints.push(`${info.price}で手に入る`);
  }
  if (info.shopName) {
    keyPoints.push(`${info.shopName}の人気アイテム`);
  }

  const bulletPoints = [
    `デザイン: ${info.title}の魅力を活かした上質な仕上がり。`,
    '使い勝手: 日常から特別なシーンまで幅広く活躍。',
    '満足度: 口コミでも高評価で贈り物にもおすすめ。',
  ];

  const lines = [
    `要点: ${keyPoints.join('・')}`,
    '',
    ...bulletPoints.map((point) => `・${point}`),
  ];

  const review = lines.join('\n');
  const chars = Array.from(review);
  if (chars.length > MAX_REVIEW_LENGTH) {
    return chars.slice(0, TRUNCATED_LENGTH).join('') + ELLIPSIS;
  }
  return review;
}
