/**
 * NotebookLM Client
 *
 * Asks questions in a NotebookLM notebook by driving its chat UI. Questions
 * are serialised because they share one browser page.
 */

import { log } from "../utils/logger.js";
import { BackendError, errorMessage } from "../errors.js";
import { findSelector, getSelectors, waitForSelector, type LocatorLike, type PageLike } from "./selectors.js";
import { waitForStableText } from "./stable-text.js";

/** The locator calls the chat driver makes; patchright's Locator satisfies it */
export interface ChatLocator extends LocatorLike {
  first(): ChatLocator;
  last(): ChatLocator;
  isVisible(): Promise<boolean>;
  scrollIntoViewIfNeeded(): Promise<void>;
  click(): Promise<void>;
  fill(value: string): Promise<void>;
  press(key: string): Promise<void>;
  innerText(): Promise<string>;
}

export interface ChatPage extends PageLike<ChatLocator> {
  url(): string;
  goto(url: string, options?: { waitUntil?: "domcontentloaded"; timeout?: number }): Promise<unknown>;
  waitForLoadState(state?: "networkidle", options?: { timeout?: number }): Promise<void>;
}

/** Source of the shared page, BrowserSession in production */
export interface ChatSession {
  readonly timeout: number;
  getPage(): Promise<ChatPage>;
}

export interface NotebookLMClientOptions {
  /** How long to wait for the answer to stop changing */
  answerTimeoutMs?: number;
  pollIntervalMs?: number;
}

export class NotebookLMClient {
  private queue: Promise<void> = Promise.resolve();
  private readonly answerTimeoutMs: number;
  private readonly pollIntervalMs: number;

  constructor(
    private readonly session: ChatSession,
    options: NotebookLMClientOptions = {}
  ) {
    this.answerTimeoutMs = options.answerTimeoutMs ?? 120_000;
    this.pollIntervalMs = options.pollIntervalMs ?? 500;
  }

  /**
   * Ask a question in the notebook at `notebookUrl` and return the answer text.
   */
  ask(notebookUrl: string, question: string): Promise<string> {
    const run = this.queue.then(() => this.askNow(notebookUrl, question));
    // The chain only orders tasks; each caller gets its own outcome through `run`.
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async askNow(notebookUrl: string, question: string): Promise<string> {
    const started = Date.now();
    const page = await this.session.getPage();

    await this.openNotebook(page, notebookUrl);

    if (await findSelector(page, "signInForm")) {
      throw new BackendError(
        "notebooklm",
        "NotebookLM is not signed in. Sign in once in the visible browser window, then retry."
      );
    }

    const inputSelector = await waitForSelector(page, "chatInput", this.session.timeout);
    if (!inputSelector) {
      throw new BackendError("notebooklm", "Could not find the NotebookLM chat input on the page");
    }

    const input = page.locator(inputSelector).first();
    await input.scrollIntoViewIfNeeded();
    await input.click();
    await input.fill(question);

    const previousCount = await this.countResponses(page);

    const sendSelector = await findSelector(page, "sendButton");
    if (sendSelector) {
      await page.locator(sendSelector).first().click();
    } else {
      await input.press("Enter");
    }
    log.info(`💬 Question sent to NotebookLM (${question.length} chars)`);

    const answer = await waitForStableText(() => this.readNewResponse(page, previousCount), {
      intervalMs: this.pollIntervalMs,
      timeoutMs: this.answerTimeoutMs,
    });

    log.success(`NotebookLM answered in ${Math.round((Date.now() - started) / 1000)}s`);
    return answer;
  }

  /**
   * Navigate only when the shared page is not already on this notebook.
   */
  private async openNotebook(page: ChatPage, notebookUrl: string): Promise<void> {
    if (page.url().startsWith(notebookUrl)) {
      return;
    }

    log.info(`🌐 Opening notebook ${notebookUrl}`);
    await page.goto(notebookUrl, { waitUntil: "domcontentloaded", timeout: this.session.timeout });
    await page.waitForLoadState("networkidle", { timeout: this.session.timeout }).catch((error: unknown) => {
      log.dim(`Network did not go idle: ${errorMessage(error)}`);
    });
  }

  /**
   * Replies in the chat so far, counted with the first response selector that
   * matches.
   */
  private async countResponses(page: ChatPage): Promise<number> {
    for (const selector of getSelectors("responseText")) {
      const count = await page.locator(selector).count();
      if (count > 0) return count;
    }
    return 0;
  }

  /**
   * Text of the newest reply once there are more than `previousCount`
   * replies, or "" while the answer is still being generated.
   */
  private async readNewResponse(page: ChatPage, previousCount: number): Promise<string> {
    for (const selector of getSelectors("thinkingIndicator")) {
      if (await page.locator(selector).first().isVisible()) {
        return "";
      }
    }

    for (const selector of getSelectors("responseText")) {
      const responses = page.locator(selector);
      const count = await responses.count();
      if (count > 0) {
        if (count <= previousCount) return "";
        const last = responses.last();
        await last.scrollIntoViewIfNeeded();
        return last.innerText();
      }
    }
    return "";
  }
}
