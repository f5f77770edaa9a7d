/**
 * Owner-only file helpers
 *
 * State files hold Telegram user ids and conversation text, so directories
 * are created 0700 and files written 0600. Windows has no POSIX modes; there
 * the files are written with the default ACL.
 */

import fs from "fs";
import path from "path";

export const isWindows = process.platform === "win32";

export const PERMISSION_MODES = {
  /** Owner read/write only */
  OWNER_READ_WRITE: 0o600,
  /** Owner read/write/execute only (directories) */
  OWNER_FULL: 0o700,
} as const;

export function mkdirSecure(dirPath: string, mode: number = PERMISSION_MODES.OWNER_FULL): void {
  if (fs.existsSync(dirPath)) return;
  fs.mkdirSync(dirPath, isWindows ? { recursive: true } : { recursive: true, mode });
}

/**
 * Write through a temporary sibling that is renamed into place.
 */
export function writeFileSecure(
  filePath: string,
  content: string | Buffer,
  mode: number = PERMISSION_MODES.OWNER_READ_WRITE
): void {
  mkdirSecure(path.dirname(filePath));

  const tmpPath = `${filePath}.${process.pid}.tmp`;
  fs.writeFileSync(tmpPath, content, isWindows ? undefined : { mode });
  fs.renameSync(tmpPath, filePath);
}

export function appendFileSecure(
  filePath: string,
  content: string,
  mode: number = PERMISSION_MODES.OWNER_READ_WRITE
): void {
  if (!fs.existsSync(filePath)) {
    mkdirSecure(path.dirname(filePath));
    fs.writeFileSync(filePath, content, isWindows ? undefined : { mode });
    return;
  }
  fs.appendFileSync(filePath, content);
}
