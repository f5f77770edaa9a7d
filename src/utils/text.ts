/**
 * Small string helpers shared by the bot and the query pipeline.
 */

/** Telegram rejects messages longer than 4096 characters */
export const TELEGRAM_MESSAGE_LIMIT = 4000;

export function truncate(text: string, max: number, suffix: string = "..."): string {
  return text.length > max ? text.slice(0, max) + suffix : text;
}

/**
 * Split text into chunks no longer than `limit`, preferring paragraph, then
 * line, then word boundaries.
 */
export function splitMessage(text: string, limit: number = TELEGRAM_MESSAGE_LIMIT): string[] {
  if (text.length <= limit) return [text];

  const chunks: string[] = [];
  let rest = text;

  while (rest.length > limit) {
    const window = rest.slice(0, limit);
    let cut = window.lastIndexOf("\n\n");
    if (cut < limit / 2) cut = window.lastIndexOf("\n");
    if (cut < limit / 2) cut = window.lastIndexOf(" ");
    if (cut <= 0) cut = limit;

    chunks.push(rest.slice(0, cut).trimEnd());
    rest = rest.slice(cut).trimStart();
  }

  if (rest.length > 0) chunks.push(rest);
  return chunks;
}

/** Remove one pair of matching surrounding quotes */
export function stripQuotes(text: string): string {
  const trimmed = text.trim();
  for (const quote of ['"', "'", "«"]) {
    const closing = quote === "«" ? "»" : quote;
    if (trimmed.length >= 2 && trimmed.startsWith(quote) && trimmed.endsWith(closing)) {
      return trimmed.slice(1, -1).trim();
    }
  }
  return trimmed;
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}
