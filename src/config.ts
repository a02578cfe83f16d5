import { z } from 'zod';
import { ROOM_REVIEW_LOCATORS, ROOM_SUBMIT_LOCATORS } from './room/selectors.js';
import { LocatorDescriptorSchema, type Config, type PosterConfig } from './types.js';

function getEnvOptional(key: string): string | undefined {
  const value = process.env[key]?.trim();
  return value ? value : undefined;
}

function getEnvOrDefault(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue;
}

function getEnvBool(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

function getEnvInt(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

export function loadConfig(): Config {
  const channel = getEnvOrDefault('BROWSER_CHANNEL', 'chrome').trim();

  return {
    // Rakuten credentials (optional; login is skipped without them)
    username: getEnvOptional('RAKUTEN_ROOM_USERNAME'),
    password: getEnvOptional('RAKUTEN_ROOM_PASSWORD'),

    // Playwright settings
    playwrightHeadless: getEnvBool('PLAYWRIGHT_HEADLESS', true),
    browserChannel: channel || undefined,
    browserExecutablePath: getEnvOptional('BROWSER_EXECUTABLE_PATH'),

    // Product page fetch
    fetchRetries: Math.max(1, getEnvInt('FETCH_RETRIES', 3)),
    fetchTimeoutMs: Math.max(1, getEnvInt('FETCH_TIMEOUT_MS', 20000)),
  };
}

// Singleton config instance
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

// Allow resetting config (useful for testing)
export function resetConfig(): void {
  configInstance = null;
}

// Blank credentials are treated as not supplied
const OptionalCredential = z
  .string()
  .optional()
  .transform((value) => (value && value.length > 0 ? value : undefined));

export const PosterConfigSchema = z.object({
  username: OptionalCredential,
  password: OptionalCredential,
  headless: z.boolean().default(true),
  reviewLocators: z.array(LocatorDescriptorSchema).default(() => [...ROOM_REVIEW_LOCATORS]),
  submitLocators: z.array(LocatorDescriptorSchema).default(() => [...ROOM_SUBMIT_LOCATORS]),
  browserChannel: z.string().min(1).optional(),
  browserExecutablePath: z.string().min(1).optional(),
});

export type PosterConfigInput = z.input<typeof PosterConfigSchema>;

/**
 * Validates merged CLI/environment values into a PosterConfig.
 */
export function buildPosterConfig(input: PosterConfigInput): PosterConfig {
  return PosterConfigSchema.parse(input);
}
