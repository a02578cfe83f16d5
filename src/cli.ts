import { z } from 'zod';
import { launchBrowserSession, type SessionFactory } from './browser.js';
import { buildPosterConfig, getConfig } from './config.js';
import { FetchFailedError, PosterError, getErrorMessage } from './errors.js';
import { extractProductInfo } from './extractor.js';
import { fetchProductPage } from './fetcher.js';
import { logger } from './logger.js';
import { generateReview } from './review.js';
import { runPostingWorkflow } from './room/workflow.js';
import { ErrorCodes, type PosterConfig } from './types.js';

export const USAGE = `楽天の商品URLからレビューを自動生成し、ROOMへ投稿するスクリプトです。

使い方:
  room-review-poster <url> [options]

引数:
  url                   投稿したい楽天商品のURL

オプション:
  --username <id>       楽天ID (既定値: 環境変数 RAKUTEN_ROOM_USERNAME)
  --password <pw>       楽天パスワード (既定値: 環境変数 RAKUTEN_ROOM_PASSWORD)
  --no-headless         ヘッドレスモードを無効化します
  --dry-run             レビューを表示するだけで投稿しません
  -h, --help            このヘルプを表示します

実行例:
  room-review-poster "https://item.rakuten.co.jp/..."`;

export const FETCH_FAILURE_NOTICE =
  '商品情報の取得に失敗しました。ネットワーク環境を確認し、再度お試しください。';

export interface CliArgs {
  url: string;
  username?: string;
  password?: string;
  noHeadless: boolean;
  dryRun: boolean;
}

export type ParsedCommand = { kind: 'help' } | { kind: 'run'; args: CliArgs };

const ProductUrlSchema = z.string().url();

const VALUE_FLAGS = ['username', 'password'] as const;
type ValueFlag = (typeof VALUE_FLAGS)[number];

function isValueFlag(name: string): name is ValueFlag {
  return (VALUE_FLAGS as readonly string[]).includes(name);
}

function invalidArguments(message: string): PosterError {
  return new PosterError(ErrorCodes.INVALID_ARGUMENTS, message);
}

/**
 * Parses command-line arguments (without the node/script prefix).
 * Supports `--flag value` and `--flag=value`.
 */
export function parseCliArgs(argv: readonly string[]): ParsedCommand {
  const values: Partial<Record<ValueFlag, string>> = {};
  const positionals: string[] = [];
  let noHeadless = false;
  let dryRun = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '-h' || arg === '--help') {
      return { kind: 'help' };
    }
    if (!arg.startsWith('--')) {
      positionals.push(arg);
      continue;
    }

    const eqIdx = arg.indexOf('=');
    const name = eqIdx === -1 ? arg.slice(2) : arg.slice(2, eqIdx);

    if (name === 'no-headless' && eqIdx === -1) {
      noHeadless = true;
      continue;
    }
    if (name === 'dry-run' && eqIdx === -1) {
      dryRun = true;
      continue;
    }
    if (!isValueFlag(name)) {
      throw invalidArguments(`Unknown option: ${arg}`);
    }

    let value: string | undefined;
    if (eqIdx !== -1) {
      value = arg.slice(eqIdx + 1);
    } else {
      value = argv[i + 1];
      i++;
    }
    if (value === undefined || value.startsWith('--')) {
      throw invalidArguments(`Option --${name} requires a value`);
    }
    values[name] = value;
  }

  if (positionals.length === 0) {
    throw invalidArguments('Missing product URL');
  }
  if (positionals.length > 1) {
    throw invalidArguments(`Unexpected argument: ${positionals[1]}`);
  }

  const url = ProductUrlSchema.safeParse(positionals[0]);
  if (!url.success) {
    throw invalidArguments(`Invalid product URL: ${positionals[0]}`);
  }

  return {
    kind: 'run',
    args: {
      url: url.data,
      username: values.username,
      password: values.password,
      noHeadless,
      dryRun,
    },
  };
}

/**
 * Merges CLI flags over environment configuration
 */
export function resolvePosterConfig(args: CliArgs): PosterConfig {
  const config = getConfig();
  return buildPosterConfig({
    username: args.username ?? config.username,
    password: args.password ?? config.password,
    headless: args.noHeadless ? false : config.playwrightHeadless,
    browserChannel: config.browserChannel,
    browserExecutablePath: config.browserExecutablePath,
  });
}

export interface RunDependencies {
  openSession: SessionFactory;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const defaultDependencies: RunDependencies = {
  openSession: launchBrowserSession,
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
};

/**
 * Runs the CLI and returns the process exit status.
 * 0: success or help, 1: fetch or posting failure, 2: bad arguments.
 */
export async function run(
  argv: readonly string[],
  deps: RunDependencies = defaultDependencies
): Promise<number> {
  let command: ParsedCommand;
  try {
    command = parseCliArgs(argv);
  } catch (err) {
    if (err instanceof PosterError && err.code === ErrorCodes.INVALID_ARGUMENTS) {
      deps.stderr(`${err.message}\n\n${USAGE}`);
      return 2;
    }
    throw err;
  }

  if (command.kind === 'help') {
    deps.stdout(USAGE);
    return 0;
  }

  const { args } = command;
  const config = getConfig();
  const posterConfig = resolvePosterConfig(args);

  let html: string;
  try {
    html = await fetchProductPage(args.url, {
      retries: config.fetchRetries,
      timeoutMs: config.fetchTimeoutMs,
    });
  } catch (err) {
    if (err instanceof FetchFailedError) {
      logger.error({ url: args.url, error: err.message, cause: getErrorMessage(err.cause) }, 'Product fetch failed');
      deps.stderr(FETCH_FAILURE_NOTICE);
      return 1;
    }
    throw err;
  }

  const info = extractProductInfo(html);
  logger.info({ title: info.title, price: info.price, shopName: info.shopName }, 'Product info extracted');

  const review = generateReview(info);

  if (args.dryRun) {
    deps.stdout(review);
    return 0;
  }

  try {
    await runPostingWorkflow(args.url, review, posterConfig, deps.openSession);
  } catch (err) {
    deps.stderr(`ROOMへの投稿に失敗しました: ${getErrorMessage(err)}`);
    return 1;
  }
  return 0;
}
