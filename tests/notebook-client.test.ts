import { describe, expect, it, vi } from "vitest";
import { NotebookLMClient, type ChatLocator, type ChatPage } from "../src/notebooklm/notebook-client.js";
import { findSelector, getSelectors, waitForSelector } from "../src/notebooklm/selectors.js";
import { BackendError, TimeoutError } from "../src/errors.js";

const NOTEBOOK_URL = "https://notebooklm.google.com/notebook/0123456789abcdef0123456789abcdef";
const INPUT = getSelectors("chatInput")[0];
const SEND = getSelectors("sendButton")[0];
const RESPONSES = new Set(getSelectors("responseText"));

/** In-memory chat page: sending appends `reply` to the responses */
class FakeChatPage implements ChatPage {
  currentUrl = "about:blank";
  visible = new Set<string>([INPUT, SEND]);
  broken = new Set<string>();
  responses: string[] = [];
  reply: string | null = "New answer\n";
  filled: string[] = [];
  pressed: string[] = [];
  visits: string[] = [];
  waitTimeouts: number[] = [];

  url(): string {
    return this.currentUrl;
  }

  async goto(url: string): Promise<unknown> {
    this.visits.push(url);
    this.currentUrl = url;
    return null;
  }

  async waitForLoadState(): Promise<void> {
    await Promise.resolve();
  }

  locator(selector: string): ChatLocator {
    return new FakeLocator(this, selector);
  }

  send(): void {
    if (this.reply !== null) this.responses.push(this.reply);
  }
}

class FakeLocator implements ChatLocator {
  constructor(
    private readonly page: FakeChatPage,
    private readonly selector: string
  ) {}

  first(): ChatLocator {
    return this;
  }

  last(): ChatLocator {
    return this;
  }

  async count(): Promise<number> {
    if (this.page.broken.has(this.selector)) throw new Error(`Unexpected token in ${this.selector}`);
    if (RESPONSES.has(this.selector)) return this.page.responses.length;
    return this.page.visible.has(this.selector) ? 1 : 0;
  }

  async waitFor(options?: { timeout?: number }): Promise<void> {
    this.page.waitTimeouts.push(options?.timeout ?? 0);
    if (!this.page.visible.has(this.selector)) {
      throw new Error(`Timeout waiting for ${this.selector}`);
    }
  }

  async isVisible(): Promise<boolean> {
    return this.page.visible.has(this.selector);
  }

  async scrollIntoViewIfNeeded(): Promise<void> {
    await Promise.resolve();
  }

  async click(): Promise<void> {
    if (this.selector === SEND) this.page.send();
  }

  async fill(value: string): Promise<void> {
    this.page.filled.push(value);
  }

  async press(key: string): Promise<void> {
    this.page.pressed.push(key);
    if (key === "Enter") this.page.send();
  }

  async innerText(): Promise<string> {
    return this.page.responses[this.page.responses.length - 1] ?? "";
  }
}

function setup(page: FakeChatPage = new FakeChatPage()) {
  const getPage = vi.fn(async (): Promise<ChatPage> => page);
  const client = new NotebookLMClient({ timeout: 10000, getPage }, { pollIntervalMs: 1, answerTimeoutMs: 2000 });
  return { page, getPage, client };
}

describe("NotebookLMClient", () => {
  it("returns the reply that appears after the question", async () => {
    const { page, client } = setup();
    page.responses = ["Old answer\n"];

    expect(await client.ask(NOTEBOOK_URL, "Какие сроки?")).toBe("New answer");
    expect(page.visits).toEqual([NOTEBOOK_URL]);
    expect(page.filled).toEqual(["Какие сроки?"]);
    expect(page.pressed).toEqual([]);
  });

  it("accepts a reply that repeats the previous one", async () => {
    const { page, client } = setup();
    page.responses = ["Same answer\n"];
    page.reply = "Same answer\n";

    expect(await client.ask(NOTEBOOK_URL, "Again?")).toBe("Same answer");
  });

  it("stays on a notebook that is already open", async () => {
    const { page, client } = setup();
    page.currentUrl = `${NOTEBOOK_URL}?authuser=0`;

    await client.ask(NOTEBOOK_URL, "q");
    expect(page.visits).toEqual([]);
  });

  it("presses Enter when there is no send button", async () => {
    const { page, client } = setup();
    page.visible = new Set([INPUT]);

    expect(await client.ask(NOTEBOOK_URL, "q")).toBe("New answer");
    expect(page.pressed).toEqual(["Enter"]);
  });

  it("fails when the chat input never shows up", async () => {
    const { page, client } = setup();
    page.visible = new Set();

    const result = client.ask(NOTEBOOK_URL, "q");
    await expect(result).rejects.toThrow(BackendError);
    await expect(result).rejects.toThrow("Could not find the NotebookLM chat input on the page");
    expect(page.waitTimeouts).toEqual([2000, 2000, 2000, 2000, 2000]);
  });

  it("asks for a sign-in when the login form is shown", async () => {
    const { page, client } = setup();
    page.visible.add(getSelectors("signInForm")[0]);

    await expect(client.ask(NOTEBOOK_URL, "q")).rejects.toThrow(
      "NotebookLM is not signed in. Sign in once in the visible browser window, then retry."
    );
    expect(page.filled).toEqual([]);
  });

  it("times out when no reply arrives", async () => {
    const page = new FakeChatPage();
    page.reply = null;
    const client = new NotebookLMClient(
      { timeout: 10000, getPage: async () => page },
      { pollIntervalMs: 1, answerTimeoutMs: 30 }
    );

    await expect(client.ask(NOTEBOOK_URL, "q")).rejects.toThrow(TimeoutError);
  });

  it("runs one question at a time", async () => {
    const { page, getPage, client } = setup();
    let release: (page: ChatPage) => void = () => undefined;
    getPage.mockImplementationOnce(
      () =>
        new Promise<ChatPage>((resolve) => {
          release = resolve;
        })
    );

    const first = client.ask(NOTEBOOK_URL, "first");
    const second = client.ask(NOTEBOOK_URL, "second");
    await new Promise((resolve) => setTimeout(resolve, 20));
    expect(getPage).toHaveBeenCalledTimes(1);
    expect(page.filled).toEqual([]);

    release(page);
    await expect(first).resolves.toBe("New answer");
    await expect(second).resolves.toBe("New answer");
    expect(page.filled).toEqual(["first", "second"]);
  });

  it("keeps serving questions after one fails", async () => {
    const { getPage, client } = setup();
    getPage.mockRejectedValueOnce(new Error("browser crashed"));

    const first = client.ask(NOTEBOOK_URL, "first");
    const second = client.ask(NOTEBOOK_URL, "second");

    await expect(first).rejects.toThrow("browser crashed");
    await expect(second).resolves.toBe("New answer");
  });
});

describe("selector helpers", () => {
  it("skips selectors the engine rejects", async () => {
    const page = new FakeChatPage();
    const [primary, fallback] = getSelectors("sendButton");
    page.broken.add(primary);
    page.visible = new Set([fallback]);

    expect(await findSelector(page, "sendButton")).toBe(fallback);
    expect(await findSelector(page, "signInForm")).toBeNull();
  });

  it("shares the wait timeout between the selectors", async () => {
    const page = new FakeChatPage();
    const selectors = getSelectors("chatInput");
    page.visible = new Set([selectors[2]]);

    expect(await waitForSelector(page, "chatInput", 3000)).toBe(selectors[2]);
    expect(page.waitTimeouts).toEqual([1000, 1000, 1000]);

    page.visible = new Set();
    page.waitTimeouts = [];
    expect(await waitForSelector(page, "chatInput", 20000)).toBeNull();
    expect(page.waitTimeouts).toEqual([4000, 4000, 4000, 4000, 4000]);
  });
});
