/**
 * Poll a text source until it stops changing.
 *
 * NotebookLM streams its answer into the page, so the answer is taken once the
 * text has been identical and non-empty for `stableRounds` consecutive polls.
 * `read` returns "" while there is nothing to take yet.
 */

import { TimeoutError } from "../errors.js";

export interface StableTextOptions {
  intervalMs?: number;
  stableRounds?: number;
  timeoutMs?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export async function waitForStableText(
  read: () => Promise<string>,
  options: StableTextOptions = {}
): Promise<string> {
  const intervalMs = options.intervalMs ?? 500;
  const stableRounds = options.stableRounds ?? 3;
  const timeoutMs = options.timeoutMs ?? 120_000;
  const sleep = options.sleep ?? defaultSleep;
  const now = options.now ?? Date.now;

  const started = now();
  let previous = "";
  let unchanged = 0;

  while (now() - started < timeoutMs) {
    const text = (await read()).trim();

    if (text && text === previous) {
      unchanged++;
      if (unchanged >= stableRounds) {
        return text;
      }
    } else {
      unchanged = text ? 1 : 0;
    }
    previous = text;

    await sleep(intervalMs);
  }

  throw new TimeoutError(`Answer did not stabilise within ${Math.round(timeoutMs / 1000)}s`, timeoutMs);
}
