/**
 * NotebookLM chat selectors
 *
 * The NotebookLM UI has no stable API, so each element is looked up through a
 * primary selector and a list of fallbacks. `confirmed` marks selectors
 * verified against the live UI.
 */

export interface SelectorInfo {
  primary: string;
  fallbacks: readonly string[];
  confirmed: boolean;
}

export const NOTEBOOKLM_SELECTORS = {
  /** Question input at the bottom of the chat panel */
  chatInput: {
    primary: "textarea.query-box-input",
    fallbacks: [
      'textarea[aria-label="Query box"]',
      'textarea[aria-label="Feld für Anfragen"]',
      'textarea[aria-label*="query" i]',
      "textarea[placeholder]",
    ],
    confirmed: true,
  },

  /** Send button next to the input; Enter is used when none is found */
  sendButton: {
    primary: "button.submit-button",
    fallbacks: [
      'button[aria-label="Submit"]',
      'button[aria-label*="Send" i]',
      'button[type="submit"]',
    ],
    confirmed: true,
  },

  /** Text of each assistant reply, last one is the newest */
  responseText: {
    primary: ".to-user-container .message-text-content",
    fallbacks: [
      ".response-container .message-text-content",
      ".response-container",
      "[data-message-author='bot']",
      ".prose",
    ],
    confirmed: true,
  },

  /** Shown while the answer is being generated */
  thinkingIndicator: {
    primary: "div.thinking-message",
    fallbacks: [
      '[aria-label*="loading" i]',
      '[role="progressbar"]',
    ],
    confirmed: false,
  },

  /** Google sign-in form, present when the profile lost its session */
  signInForm: {
    primary: 'input[type="email"]',
    fallbacks: ['form[action*="signin"]'],
    confirmed: false,
  },
} as const;

export type SelectorKey = keyof typeof NOTEBOOKLM_SELECTORS;

/**
 * Get all selectors for a key (primary + fallbacks)
 */
export function getSelectors(key: SelectorKey): string[] {
  const info: SelectorInfo = NOTEBOOKLM_SELECTORS[key];
  return [info.primary, ...info.fallbacks].filter((s) => s.length > 0);
}

/** The locator calls used by the helpers below */
export interface LocatorLike {
  count(): Promise<number>;
  last(): LocatorLike;
  first(): LocatorLike;
  waitFor(options?: { state?: "attached" | "detached" | "visible" | "hidden"; timeout?: number }): Promise<void>;
}

export interface PageLike<L extends LocatorLike> {
  locator(selector: string): L;
}

/**
 * First selector for the key that currently matches at least one element.
 */
export async function findSelector<L extends LocatorLike>(page: PageLike<L>, key: SelectorKey): Promise<string | null> {
  for (const selector of getSelectors(key)) {
    try {
      if ((await page.locator(selector).count()) > 0) {
        return selector;
      }
    } catch {
      // an invalid selector for this engine counts as no match
      continue;
    }
  }
  return null;
}

/**
 * Wait until one of the key's selectors becomes visible. The total timeout is
 * shared between the selectors. Returns the selector that matched.
 */
export async function waitForSelector<L extends LocatorLike>(
  page: PageLike<L>,
  key: SelectorKey,
  timeout: number = 10000
): Promise<string | null> {
  const selectors = getSelectors(key);
  const perSelectorTimeout = Math.max(1000, timeout / selectors.length);

  for (const selector of selectors) {
    try {
      await page.locator(selector).first().waitFor({ state: "visible", timeout: perSelectorTimeout });
      return selector;
    } catch {
      continue;
    }
  }
  return null;
}
