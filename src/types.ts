import { z } from 'zod';

// Error codes for the review poster
export const ErrorCodes = {
  INVALID_ARGUMENTS: 'INVALID_ARGUMENTS',
  FETCH_FAILED: 'FETCH_FAILED',
  ELEMENT_NOT_FOUND: 'ELEMENT_NOT_FOUND',
  SUBMIT_CONTROL_NOT_FOUND: 'SUBMIT_CONTROL_NOT_FOUND',
  WINDOW_WAIT_TIMEOUT: 'WINDOW_WAIT_TIMEOUT',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// ============================================================================
// Locator descriptors
// ============================================================================

export const LocatorStrategies = {
  ID: 'id',
  NAME: 'name',
  CSS: 'css',
  LINK_TEXT: 'link_text',
} as const;

export type LocatorStrategy = (typeof LocatorStrategies)[keyof typeof LocatorStrategies];

export const LocatorDescriptorSchema = z.object({
  strategy: z.nativeEnum(LocatorStrategies),
  value: z.string().min(1),
});

export type LocatorDescriptor = z.infer<typeof LocatorDescriptorSchema>;

// ============================================================================
// Product data
// ============================================================================

// Metadata scraped from the product page
export interface ProductInfo {
  readonly title: string;
  readonly price?: string;
  readonly shopName?: string;
}

// ============================================================================
// Poster configuration
// ============================================================================

// Credentials and locator lists for one posting run
export interface PosterConfig {
  username?: string;
  password?: string;
  headless: boolean;
  reviewLocators: LocatorDescriptor[];
  submitLocators: LocatorDescriptor[];
  browserChannel?: string;
  browserExecutablePath?: string;
}

// Runtime configuration read from the environment
export interface Config {
  username?: string;
  password?: string;
  playwrightHeadless: boolean;
  browserChannel?: string;
  browserExecutablePath?: string;
  fetchRetries: number;
  fetchTimeoutMs: number;
}
