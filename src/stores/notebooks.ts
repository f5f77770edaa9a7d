/**
 * NotebookLM notebook URLs
 */

import { ValidationError } from "../errors.js";

export const NOTEBOOKLM_HOST = "notebooklm.google.com";
export const NOTEBOOK_ID_PREFIX = "notebooklm:";
const MIN_NOTEBOOK_ID_LENGTH = 32;

/**
 * Extract the notebook id from a NotebookLM URL, or undefined when the URL is
 * not a notebook link.
 */
export function extractNotebookId(url: string): string | undefined {
  let parsed: URL;
  try {
    parsed = new URL(url.trim());
  } catch {
    return undefined;
  }

  if (parsed.hostname !== NOTEBOOKLM_HOST) return undefined;

  const match = /^\/notebook\/([A-Za-z0-9_-]+)\/?$/.exec(parsed.pathname);
  if (!match || match[1].length < MIN_NOTEBOOK_ID_LENGTH) return undefined;
  return match[1];
}

export function notebookUrl(notebookId: string): string {
  return `https://${NOTEBOOKLM_HOST}/notebook/${notebookId}`;
}

/**
 * Validate a pasted URL and return its canonical form and store id.
 */
export function parseNotebookUrl(url: string): { notebookId: string; url: string; storeId: string } {
  const notebookId = extractNotebookId(url);
  if (!notebookId) {
    throw new ValidationError(
      `Invalid NotebookLM URL. Expected format: https://${NOTEBOOKLM_HOST}/notebook/{id}`
    );
  }
  return { notebookId, url: notebookUrl(notebookId), storeId: `${NOTEBOOK_ID_PREFIX}${notebookId}` };
}
