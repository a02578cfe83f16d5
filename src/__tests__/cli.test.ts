import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { fetch, Response } from 'undici';
import type { SessionOptions } from '../browser.js';
import { FETCH_FAILURE_NOTICE, USAGE, parseCliArgs, resolvePosterConfig, run } from '../cli.js';
import { resetConfig } from '../config.js';
import { PosterError } from '../errors.js';
import { FakeSession, fakeElement } from '../room/__tests__/fake-session.js';

vi.mock('undici', async (importOriginal) => {
  const actual = await importOriginal<typeof import('undici')>();
  return { ...actual, fetch: vi.fn() };
});

const fetchMock = vi.mocked(fetch);
const PRODUCT_URL = 'https://item.rakuten.co.jp/example-shop/blanket-001/';

const PRODUCT_PAGE = `
<html>
<head><meta property="og:title" content="フード付きブランケット"></head>
<body>
  <span itemprop="price">¥3,980</span>
  <a itemprop="seller">○○ショップ</a>
</body>
</html>
`;

const EXPECTED_REVIEW =
  '要点: フード付きブランケット・¥3,980で手に入る・○○ショップの人気アイテム\n' +
  '\n' +
  '・デザイン: フード付きブランケットの魅力を活かした上質な仕上がり。\n' +
  '・使い勝手: 日常から特別なシーンまで幅広く活躍。\n' +
  '・満足度: 口コミでも高評価で贈り物にもおすすめ。';

const ENV_KEYS = ['RAKUTEN_ROOM_USERNAME', 'RAKUTEN_ROOM_PASSWORD', 'PLAYWRIGHT_HEADLESS', 'FETCH_RETRIES'] as const;

describe('parseCliArgs', () => {
  it('parses the URL with defaults', () => {
    expect(parseCliArgs([PRODUCT_URL])).toEqual({
      kind: 'run',
      args: { url: PRODUCT_URL, username: undefined, password: undefined, noHeadless: false, dryRun: false },
    });
  });

  it('accepts separate and inline flag values', () => {
    const parsed = parseCliArgs(['--username', 'test-user', `--password=test-secret`, '--no-headless', PRODUCT_URL]);
    expect(parsed).toEqual({
      kind: 'run',
      args: { url: PRODUCT_URL, username: 'test-user', password: 'test-secret', noHeadless: true, dryRun: false },
    });
  });

  it('recognises --dry-run', () => {
    const parsed = parseCliArgs([PRODUCT_URL, '--dry-run']);
    expect(parsed.kind === 'run' && parsed.args.dryRun).toBe(true);
  });

  it('returns help for -h and --help', () => {
    expect(parseCliArgs(['-h'])).toEqual({ kind: 'help' });
    expect(parseCliArgs([PRODUCT_URL, '--help'])).toEqual({ kind: 'help' });
  });

  const invalid: Array<[string[], string]> = [
    [[], 'Missing product URL'],
    [['not a url'], 'Invalid product URL: not a url'],
    [[PRODUCT_URL, 'extra'], 'Unexpected argument: extra'],
    [[PRODUCT_URL, '--verbose'], 'Unknown option: --verbose'],
    [[PRODUCT_URL, '--username'], 'Option --username requires a value'],
    [['--password', '--dry-run', PRODUCT_URL], 'Option --password requires a value'],
  ];

  it.each(invalid)('rejects %j', (argv, message) => {
    expect(() => parseCliArgs(argv)).toThrow(new PosterError('INVALID_ARGUMENTS', message));
  });
});

describe('CLI run', () => {
  const saved: Partial<Record<(typeof ENV_KEYS)[number], string>> = {};
  let out: string[];
  let err: string[];

  function deps(session: FakeSession = new FakeSession()) {
    return {
      openSession: vi.fn(async (_options: SessionOptions) => session),
      stdout: (text: string) => {
        out.push(text);
      },
      stderr: (text: string) => {
        err.push(text);
      },
    };
  }

  beforeEach(() => {
    for (const key of ENV_KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
    process.env.FETCH_RETRIES = '1';
    resetConfig();
    fetchMock.mockReset();
    out = [];
    err = [];
  });

  afterEach(() => {
    for (const key of ENV_KEYS) {
      const value = saved[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    resetConfig();
  });

  it('prints usage for --help', async () => {
    await expect(run(['--help'], deps())).resolves.toBe(0);
    expect(out).toEqual([USAGE]);
  });

  it('exits with 2 and usage on bad arguments', async () => {
    await expect(run([], deps())).resolves.toBe(2);
    expect(err).toEqual([`Missing product URL\n\n${USAGE}`]);
  });

  it('prints the review and starts no browser in dry-run mode', async () => {
    fetchMock.mockResolvedValueOnce(new Response(PRODUCT_PAGE, { status: 200 }));
    const d = deps();

    await expect(run([PRODUCT_URL, '--dry-run'], d)).resolves.toBe(0);

    expect(out).toEqual([EXPECTED_REVIEW]);
    expect(d.openSession).not.toHaveBeenCalled();
  });

  it('reports a fetch failure with exit status 1', async () => {
    fetchMock.mockRejectedValue(new Error('getaddrinfo ENOTFOUND'));
    const d = deps();

    await expect(run([PRODUCT_URL], d)).resolves.toBe(1);

    expect(err).toEqual([FETCH_FAILURE_NOTICE]);
    expect(d.openSession).not.toHaveBeenCalled();
  });

  it('posts the generated review through the browser session', async () => {
    fetchMock.mockResolvedValueOnce(new Response(PRODUCT_PAGE, { status: 200 }));
    const textarea = fakeElement();
    const submit = fakeElement();
    const session = new FakeSession({
      elements: { "textarea[name='comment']": textarea, "button[type='submit']": submit },
    });

    await expect(run([PRODUCT_URL], deps(session))).resolves.toBe(0);

    expect(textarea.fill).toHaveBeenCalledWith(EXPECTED_REVIEW);
    expect(submit.click).toHaveBeenCalledTimes(1);
    expect(session.closed).toBe(true);
  });

  it('exits with 1 when posting fails, after closing the browser', async () => {
    fetchMock.mockResolvedValueOnce(new Response(PRODUCT_PAGE, { status: 200 }));
    const session = new FakeSession({ linkAvailable: false });

    await expect(run([PRODUCT_URL], deps(session))).resolves.toBe(1);

    expect(session.closed).toBe(true);
    expect(err).toEqual(['ROOMへの投稿に失敗しました: Link "ROOMへ投稿" was not clickable within 15000ms']);
  });
});

describe('resolvePosterConfig', () => {
  afterEach(() => {
    delete process.env.RAKUTEN_ROOM_USERNAME;
    delete process.env.RAKUTEN_ROOM_PASSWORD;
    resetConfig();
  });

  it('prefers CLI credentials over the environment', () => {
    process.env.RAKUTEN_ROOM_USERNAME = 'env-user';
    process.env.RAKUTEN_ROOM_PASSWORD = 'env-secret';
    resetConfig();

    const config = resolvePosterConfig({ url: PRODUCT_URL, username: 'cli-user', noHeadless: true, dryRun: false });

    expect(config.username).toBe('cli-user');
    expect(config.password).toBe('env-secret');
    expect(config.headless).toBe(false);
  });
});
