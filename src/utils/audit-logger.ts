/**
 * Audit trail for store administration and access control.
 *
 * Events are appended to a daily JSONL file (audit-YYYY-MM-DD.jsonl). Each
 * event carries the hash of the previous one so edits to a file can be
 * detected with verifyIntegrity().
 */

import fs from "fs";
import path from "path";
import crypto from "crypto";
import { CONFIG } from "../config.js";
import { log } from "./logger.js";
import { errorMessage } from "../errors.js";
import { mkdirSecure, appendFileSecure } from "./file-permissions.js";

export type AuditCategory =
  | "store"   // Store create/delete/rename/sync
  | "upload"  // Documents added to a store
  | "access"  // Denied commands and messages
  | "system"; // Start-up, shutdown, scheduled jobs

export interface AuditEvent {
  timestamp: string;
  category: AuditCategory;
  action: string;
  userId?: number;
  success: boolean;
  details: Record<string, unknown>;
  hash: string;
  previousHash: string;
}

export interface AuditConfig {
  enabled: boolean;
  logDir: string;
  retentionDays: number;
}

const GENESIS = "GENESIS";
const SENSITIVE_KEY = /password|secret|token|key|credential/i;

/** Masks anything shaped like a bot token or Google API key */
export function redactSecrets(value: string): string {
  return value
    .replace(/\b\d{6,}:[A-Za-z0-9_-]{30,}\b/g, "[REDACTED]")
    .replace(/\bAIza[0-9A-Za-z_-]{20,}\b/g, "[REDACTED]");
}

export class AuditLogger {
  private config: AuditConfig;
  private previousHash = GENESIS;
  private currentDay = "";

  constructor(config?: Partial<AuditConfig>) {
    this.config = {
      enabled: true,
      logDir: CONFIG.auditDir,
      retentionDays: 30,
      ...config,
    };

    if (this.config.enabled) {
      mkdirSecure(this.config.logDir);
      this.rollOver(this.today());
      this.cleanOldLogs();
    }
  }

  private today(): string {
    return new Date().toISOString().slice(0, 10);
  }

  fileFor(day: string): string {
    return path.join(this.config.logDir, `audit-${day}.jsonl`);
  }

  /**
   * Switch to a new day's file, continuing the chain from its last entry.
   */
  private rollOver(day: string): void {
    this.currentDay = day;
    this.previousHash = GENESIS;

    const file = this.fileFor(day);
    if (!fs.existsSync(file)) return;

    const lines = fs.readFileSync(file, "utf-8").split("\n").filter((l) => l.length > 0);
    const last = lines[lines.length - 1];
    if (!last) return;

    try {
      const parsed: unknown = JSON.parse(last);
      if (typeof parsed === "object" && parsed !== null && "hash" in parsed && typeof parsed.hash === "string") {
        this.previousHash = parsed.hash;
      }
    } catch (error) {
      log.warning(`⚠️ Audit file ${file} has a corrupt last line, starting a new chain: ${errorMessage(error)}`);
    }
  }

  private cleanOldLogs(): void {
    const cutoff = Date.now() - this.config.retentionDays * 24 * 60 * 60 * 1000;

    for (const file of fs.readdirSync(this.config.logDir)) {
      const match = /^audit-(\d{4}-\d{2}-\d{2})\.jsonl$/.exec(file);
      if (!match) continue;
      if (new Date(match[1]).getTime() < cutoff) {
        fs.unlinkSync(path.join(this.config.logDir, file));
      }
    }
  }

  private computeHash(event: Omit<AuditEvent, "hash">): string {
    const data = JSON.stringify({
      timestamp: event.timestamp,
      category: event.category,
      action: event.action,
      userId: event.userId,
      success: event.success,
      details: event.details,
      previousHash: event.previousHash,
    });
    return crypto.createHash("sha256").update(data).digest("hex").slice(0, 16);
  }

  private sanitize(details: Record<string, unknown>): Record<string, unknown> {
    const sanitized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(details)) {
      if (SENSITIVE_KEY.test(key)) {
        sanitized[key] = "[REDACTED]";
      } else if (typeof value === "string") {
        sanitized[key] = redactSecrets(value.length > 200 ? `${value.slice(0, 200)}…` : value);
      } else {
        sanitized[key] = value;
      }
    }
    return sanitized;
  }

  record(
    category: AuditCategory,
    action: string,
    success: boolean,
    details: Record<string, unknown> = {},
    userId?: number
  ): AuditEvent | null {
    if (!this.config.enabled) return null;

    const day = this.today();
    if (day !== this.currentDay) {
      this.rollOver(day);
    }

    const unsigned: Omit<AuditEvent, "hash"> = {
      timestamp: new Date().toISOString(),
      category,
      action,
      userId,
      success,
      details: this.sanitize(details),
      previousHash: this.previousHash,
    };
    const event: AuditEvent = { ...unsigned, hash: this.computeHash(unsigned) };
    this.previousHash = event.hash;

    try {
      appendFileSecure(this.fileFor(day), JSON.stringify(event) + "\n");
    } catch (error) {
      log.error(`❌ Failed to write audit event ${category}/${action}: ${errorMessage(error)}`);
    }
    return event;
  }

  /**
   * Re-walk a day's file and report every broken link or altered entry.
   */
  verifyIntegrity(day: string = this.currentDay): { valid: boolean; errors: string[] } {
    const file = this.fileFor(day);
    if (!fs.existsSync(file)) {
      return { valid: false, errors: ["Log file does not exist"] };
    }

    const errors: string[] = [];
    const lines = fs.readFileSync(file, "utf-8").split("\n").filter((l) => l.length > 0);
    let expectedPrevious = GENESIS;

    lines.forEach((line, index) => {
      let event: AuditEvent;
      try {
        event = JSON.parse(line);
      } catch {
        errors.push(`Line ${index + 1}: Invalid JSON`);
        return;
      }

      if (event.previousHash !== expectedPrevious) {
        errors.push(`Line ${index + 1}: Hash chain broken`);
      }
      const { hash, ...unsigned } = event;
      if (this.computeHash(unsigned) !== hash) {
        errors.push(`Line ${index + 1}: Hash mismatch`);
      }
      expectedPrevious = hash;
    });

    return { valid: errors.length === 0, errors };
  }
}

let globalAuditLogger: AuditLogger | null = null;

export function getAuditLogger(): AuditLogger {
  if (!globalAuditLogger) {
    globalAuditLogger = new AuditLogger();
  }
  return globalAuditLogger;
}

export const audit = {
  store: (action: string, userId: number | undefined, details?: Record<string, unknown>, success = true) =>
    getAuditLogger().record("store", action, success, details, userId),

  upload: (userId: number | undefined, details: Record<string, unknown>, success = true) =>
    getAuditLogger().record("upload", "document_uploaded", success, details, userId),

  accessDenied: (userId: number | undefined, details?: Record<string, unknown>) =>
    getAuditLogger().record("access", "access_denied", false, details, userId),

  system: (action: string, details?: Record<string, unknown>) =>
    getAuditLogger().record("system", action, true, details),
};
