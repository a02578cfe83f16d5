import { v4 as uuidv4 } from 'uuid';
import type { PosterSession, SessionElement, SessionFactory } from '../browser.js';
import { ElementNotFoundError, SubmitControlNotFoundError, getErrorMessage } from '../errors.js';
import { createChildLogger, logger } from '../logger.js';
import type { PosterConfig } from '../types.js';
import {
  LOGIN_PASSWORD_LOCATORS,
  LOGIN_SUBMIT_LOCATORS,
  LOGIN_USERNAME_LOCATORS,
  TEXT,
  TIMEOUTS,
} from './selectors.js';

/**
 * Posting steps, in order
 */
export const Steps = {
  NAVIGATE_TO_FORM: 'navigate_to_form',
  OPTIONAL_LOGIN: 'optional_login',
  FILL_REVIEW: 'fill_review',
  SUBMITTED: 'submitted',
} as const;

export type Step = (typeof Steps)[keyof typeof Steps];

/**
 * Opens the product page and follows the "ROOMへ投稿" link.
 * The ROOM flow usually opens in a new tab; the session moves to it.
 */
export async function navigateToRoom(session: PosterSession, productUrl: string): Promise<void> {
  const log = logger.child({ step: Steps.NAVIGATE_TO_FORM });

  log.info({ url: productUrl }, 'Opening product page');
  await session.goto(productUrl);

  await session.clickLinkByText(TEXT.ROOM_LINK, TIMEOUTS.ROOM_LINK);
  log.debug('Clicked ROOM link');

  await session.pause(TIMEOUTS.NEW_PAGE_PAUSE);
  if (session.pageCount() > 1) {
    await session.switchToLatestPage();
    log.debug('Switched to ROOM tab');
  }
}

/**
 * Logs into Rakuten if credentials are configured and a login form shows up.
 *
 * Returns true when a login was submitted. A missing login form is not an
 * error; a form without a submit control is.
 */
export async function loginIfRequired(session: PosterSession, config: PosterConfig): Promise<boolean> {
  if (!config.username || !config.password) {
    return false;
  }

  const log = logger.child({ step: Steps.OPTIONAL_LOGIN });

  let usernameInput: SessionElement;
  let passwordInput: SessionElement;
  try {
    usernameInput = await session.findFirst(LOGIN_USERNAME_LOCATORS, TIMEOUTS.LOGIN_FORM);
    passwordInput = await session.findFirst(LOGIN_PASSWORD_LOCATORS, TIMEOUTS.LOGIN_FORM);
  } catch (err) {
    if (err instanceof ElementNotFoundError) {
      log.warn({ error: err.message }, 'No login form detected, continuing without login');
      return false;
    }
    throw err;
  }

  await usernameInput.clear();
  await usernameInput.fill(config.username);
  await passwordInput.clear();
  await passwordInput.fill(config.password);

  let loginButton: SessionElement;
  try {
    loginButton = await session.findFirst(LOGIN_SUBMIT_LOCATORS, TIMEOUTS.LOGIN_FORM);
  } catch (err) {
    if (err instanceof ElementNotFoundError) {
      throw new SubmitControlNotFoundError('Unable to locate login submit button.', { cause: err });
    }
    throw err;
  }

  await loginButton.click();
  log.info('Submitted login form');

  // The login popup closes once authentication completes
  await session.waitForPageCount(1, TIMEOUTS.LOGIN_WINDOWS);
  await session.pause(TIMEOUTS.POST_LOGIN_PAUSE);
  return true;
}

/**
 * Fills the ROOM review form and submits it. Nothing is read back from the
 * page; the post is assumed to go through once the pause elapses.
 */
export async function postReview(session: PosterSession, review: string, config: PosterConfig): Promise<void> {
  const log = logger.child({ step: Steps.FILL_REVIEW });

  let textarea: SessionElement;
  try {
    textarea = await session.findFirst(config.reviewLocators, TIMEOUTS.REVIEW_FORM);
  } catch (err) {
    if (err instanceof ElementNotFoundError) {
      throw new ElementNotFoundError('Unable to locate ROOM review textarea.', { cause: err });
    }
    throw err;
  }

  await textarea.clear();
  await textarea.fill(review);
  log.debug({ length: review.length }, 'Review entered');

  let submitButton: SessionElement;
  try {
    submitButton = await session.findFirst(config.submitLocators, TIMEOUTS.REVIEW_FORM);
  } catch (err) {
    if (err instanceof ElementNotFoundError) {
      throw new SubmitControlNotFoundError('Unable to locate ROOM submit button.', { cause: err });
    }
    throw err;
  }

  await submitButton.click();
  log.info('Clicked ROOM submit');

  await session.pause(TIMEOUTS.POST_SUBMIT_PAUSE);
}

/**
 * Runs navigation, optional login and posting in one browser session.
 * The session is closed on every exit path; failures are logged and rethrown.
 */
export async function runPostingWorkflow(
  productUrl: string,
  review: string,
  config: PosterConfig,
  openSession: SessionFactory
): Promise<void> {
  const runId = uuidv4();
  const log = createChildLogger({ run_id: runId });
  log.info(
    {
      url: productUrl,
      headless: config.headless,
      hasCredentials: Boolean(config.username && config.password),
    },
    'Starting ROOM posting'
  );

  const session = await openSession({
    headless: config.headless,
    channel: config.browserChannel,
    executablePath: config.browserExecutablePath,
  });

  let step: Step = Steps.NAVIGATE_TO_FORM;
  try {
    await navigateToRoom(session, productUrl);

    step = Steps.OPTIONAL_LOGIN;
    const loggedIn = await loginIfRequired(session, config);
    log.info({ loggedIn }, 'Login step finished');

    step = Steps.FILL_REVIEW;
    await postReview(session, review, config);

    step = Steps.SUBMITTED;
    log.info({ step }, 'Review posted');
  } catch (err) {
    log.error({ step, error: getErrorMessage(err) }, 'ROOM posting failed');
    throw err;
  } finally {
    await session.close();
  }
}
