/**
 * Rakuten ROOM selectors and timeouts
 *
 * Every element the posting flow touches is described by an ordered fallback
 * list. The lists are tried top to bottom; the first locator that matches wins.
 *
 * When the Rakuten login or ROOM UI changes, update the lists here.
 */

import { LocatorStrategies, type LocatorDescriptor } from '../types.js';

// ============================================================================
// TIMEOUTS
// ============================================================================

export const TIMEOUTS = {
  // "ROOMへ投稿" link on the product page
  ROOM_LINK: 15000,
  // Each login field / the login submit control
  LOGIN_FORM: 15000,
  // Login popup closing (back to a single page)
  LOGIN_WINDOWS: 15000,
  // Review textarea and ROOM submit control
  REVIEW_FORM: 20000,
  // Time for the ROOM tab to open after clicking the link
  NEW_PAGE_PAUSE: 1000,
  // Settling time after login
  POST_LOGIN_PAUSE: 1000,
  // Time for the submission to go through
  POST_SUBMIT_PAUSE: 3000,
} as const;

// ============================================================================
// TEXT CONSTANTS
// ============================================================================

export const TEXT = {
  ROOM_LINK: 'ROOMへ投稿',
} as const;

// ============================================================================
// LOGIN LOCATORS
// ============================================================================

// Login forms use different input names depending on the flow
export const LOGIN_USERNAME_LOCATORS: readonly LocatorDescriptor[] = [
  { strategy: LocatorStrategies.ID, value: 'loginInner_u' },
  { strategy: LocatorStrategies.NAME, value: 'u' },
  { strategy: LocatorStrategies.NAME, value: 'login_id' },
];

export const LOGIN_PASSWORD_LOCATORS: readonly LocatorDescriptor[] = [
  { strategy: LocatorStrategies.ID, value: 'loginInner_p' },
  { strategy: LocatorStrategies.NAME, value: 'p' },
  { strategy: LocatorStrategies.NAME, value: 'passwd' },
];

export const LOGIN_SUBMIT_LOCATORS: readonly LocatorDescriptor[] = [
  { strategy: LocatorStrategies.ID, value: 'loginInner_y' },
  { strategy: LocatorStrategies.NAME, value: 'submit' },
  { strategy: LocatorStrategies.CSS, value: "button[type='submit']" },
];

// ============================================================================
// ROOM POST FORM LOCATORS
// ============================================================================

export const ROOM_REVIEW_LOCATORS: readonly LocatorDescriptor[] = [
  { strategy: LocatorStrategies.CSS, value: "textarea[name='comment']" },
  { strategy: LocatorStrategies.CSS, value: "textarea[class*='comment']" },
];

export const ROOM_SUBMIT_LOCATORS: readonly LocatorDescriptor[] = [
  { strategy: LocatorStrategies.CSS, value: "button[type='submit']" },
  { strategy: LocatorStrategies.CSS, value: "button[class*='submit']" },
];
