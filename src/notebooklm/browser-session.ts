/**
 * Browser Session
 *
 * One persistent Chromium profile (patchright) shared by every NotebookLM
 * question. The profile directory keeps the Google login between restarts and
 * a single page is reused so NotebookLM keeps its focus and chat state.
 */

import { chromium, type BrowserContext, type Page } from "patchright";
import { CONFIG } from "../config.js";
import { log } from "../utils/logger.js";
import { mkdirSecure } from "../utils/file-permissions.js";

export interface BrowserSessionOptions {
  userDataDir: string;
  /** Visible by default */
  headless: boolean;
  timeout: number;
}

export class BrowserSession {
  private context: BrowserContext | null = null;
  private page: Page | null = null;
  private launching: Promise<BrowserContext> | null = null;
  private readonly options: BrowserSessionOptions;

  constructor(options: Partial<BrowserSessionOptions> = {}) {
    this.options = {
      userDataDir: CONFIG.notebooklmUserDataDir,
      headless: CONFIG.notebooklmHeadless,
      timeout: CONFIG.notebooklmTimeout,
      ...options,
    };
  }

  get timeout(): number {
    return this.options.timeout;
  }

  isOpen(): boolean {
    return this.context !== null;
  }

  private async getContext(): Promise<BrowserContext> {
    if (this.context) return this.context;
    if (!this.launching) {
      this.launching = this.launch().finally(() => {
        this.launching = null;
      });
    }
    return this.launching;
  }

  private async launch(): Promise<BrowserContext> {
    log.info(`🌐 Launching browser (${this.options.headless ? "headless" : "visible"}) with profile ${this.options.userDataDir}`);
    mkdirSecure(this.options.userDataDir);

    const context = await chromium.launchPersistentContext(this.options.userDataDir, {
      headless: this.options.headless,
      viewport: null,
      timeout: this.options.timeout,
    });
    context.setDefaultTimeout(this.options.timeout);
    context.on("close", () => {
      log.warning("⚠️ Browser context closed");
      this.context = null;
      this.page = null;
    });

    this.context = context;
    log.success("Browser ready");
    return context;
  }

  /**
   * The shared page, reopened if it was closed.
   */
  async getPage(): Promise<Page> {
    if (this.page && !this.page.isClosed()) {
      return this.page;
    }
    const context = await this.getContext();
    this.page = context.pages()[0] ?? (await context.newPage());
    return this.page;
  }

  async close(): Promise<void> {
    const context = this.context;
    this.context = null;
    this.page = null;
    if (context) {
      await context.close();
      log.info("🌐 Browser closed");
    }
  }
}
