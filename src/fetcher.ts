import { fetch } from 'undici';
import { TextDecoder } from 'node:util';
import { FetchFailedError, getErrorMessage } from './errors.js';
import { createChildLogger, logger } from './logger.js';

// Fixed desktop Chrome User-Agent for the product page request
export const BROWSER_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64)' +
  ' AppleWebKit/537.36 (KHTML, like Gecko)' +
  ' Chrome/123.0.0.0 Safari/537.36';

export const FETCH_FAILED_MESSAGE =
  '商品ページの取得中にタイムアウトまたは通信エラーが発生しました。';

// Retry configuration
const DEFAULT_RETRIES = 3;
const DEFAULT_TIMEOUT_MS = 20000;
const BACKOFF_STEP_MS = 2000;
const DEFAULT_CHARSET = 'utf-8';

export interface FetchPageOptions {
  retries?: number;
  timeoutMs?: number;
  // Replaces the backoff wait (tests record the delays instead of sleeping)
  delay?: (ms: number) => Promise<void>;
}

/**
 * Delays execution for a given number of milliseconds
 */
function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Reads the charset label from a Content-Type header, e.g. `text/html; charset=EUC-JP`
 */
export function charsetFromContentType(contentType: string | null): string {
  const match = contentType?.match(/charset\s*=\s*["']?([^;"'\s]+)/i);
  return match ? match[1].toLowerCase() : DEFAULT_CHARSET;
}

/**
 * Decodes a response body with the charset its Content-Type declares.
 * Labels TextDecoder does not know fall back to UTF-8.
 */
export function decodeBody(body: ArrayBuffer | Uint8Array, contentType: string | null): string {
  const charset = charsetFromContentType(contentType);
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(charset);
  } catch (err) {
    if (!(err instanceof RangeError)) {
      throw err;
    }
    logger.warn({ charset }, 'Unsupported charset, decoding as UTF-8');
    decoder = new TextDecoder(DEFAULT_CHARSET);
  }
  return decoder.decode(body);
}

/**
 * Fetches the raw HTML of a product page.
 *
 * Timeouts, transport errors and non-2xx statuses are retried with a linear
 * backoff (2s, 4s, ...). There is no wait after the last attempt; it throws
 * FetchFailedError with the last failure as `cause`.
 */
export async function fetchProductPage(url: string, options: FetchPageOptions = {}): Promise<string> {
  const retries = options.retries ?? DEFAULT_RETRIES;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const wait = options.delay ?? delay;
  const log = createChildLogger({ step: 'fetch_product_page', url });

  let lastError: unknown = null;

  for (let attempt = 1; attempt <= retries; attempt++) {
    try {
      log.debug({ attempt, timeoutMs }, 'Fetching product page');

      const response = await fetch(url, {
        method: 'GET',
        headers: {
          'User-Agent': BROWSER_USER_AGENT,
        },
        signal: AbortSignal.timeout(timeoutMs),
      });

      if (!response.ok) {
        throw new Error(`HTTP ${response.status}: ${response.statusText}`);
      }

      const html = decodeBody(await response.arrayBuffer(), response.headers.get('content-type'));
      log.info({ attempt, bytes: html.length }, 'Product page fetched');
      return html;
    } catch (err) {
      lastError = err;
      log.warn({ attempt, retries, error: getErrorMessage(err) }, 'Product page fetch attempt failed');

      if (attempt < retries) {
        await wait(BACKOFF_STEP_MS * attempt);
      }
    }
  }

  throw new FetchFailedError(FETCH_FAILED_MESSAGE, { cause: lastError });
}
