/**
 * Job Scheduler
 *
 * node-cron jobs for housekeeping: daily memory cleanup, hourly removal of
 * old export files, and the optional store auto-sync. The auto-sync interval
 * and the time of the last sync live in settings.json so they survive
 * restarts.
 */

import * as cron from "node-cron";
import { z } from "zod";
import { CONFIG } from "../config.js";
import { log } from "../utils/logger.js";
import { ValidationError, errorMessage } from "../errors.js";
import { JsonFile } from "../utils/json-file.js";
import { audit } from "../utils/audit-logger.js";
import type { ConversationMemory } from "../session/memory.js";
import type { ExportClient } from "../export/export-client.js";
import type { StoreService } from "../stores/store-service.js";
import type { AutoSyncControl } from "../bot/action-dispatcher.js";

const settingsSchema = z.object({
  autoSyncHours: z.number().int().min(0).default(0),
  lastSyncAt: z.string().optional(),
});

export type SchedulerSettings = z.infer<typeof settingsSchema>;

export const SCHEDULES = {
  memoryCleanup: "0 3 * * *",
  exportCleanup: "0 * * * *",
  autoSyncCheck: "5 * * * *",
} as const;

export interface SchedulerDeps {
  memory: Pick<ConversationMemory, "cleanupOldEntries">;
  exporter: Pick<ExportClient, "cleanupOldFiles">;
  stores: Pick<StoreService, "sync">;
}

export class JobScheduler implements AutoSyncControl {
  private file: JsonFile<typeof settingsSchema>;
  private settings: SchedulerSettings;
  private tasks: cron.ScheduledTask[] = [];

  constructor(
    private readonly deps: SchedulerDeps,
    settingsFile: string = CONFIG.settingsFile,
    private readonly memoryCleanupDays: number = CONFIG.memoryCleanupDays,
    private readonly exportRetentionHours: number = CONFIG.exportRetentionHours
  ) {
    this.file = new JsonFile(settingsFile, settingsSchema, () => ({ autoSyncHours: 0 }));
    this.settings = this.file.load();
  }

  start(): void {
    if (this.tasks.length > 0) return;

    this.tasks.push(
      cron.schedule(SCHEDULES.memoryCleanup, () => {
        this.runMemoryCleanup();
      }),
      cron.schedule(SCHEDULES.exportCleanup, () => {
        this.runExportCleanup();
      }),
      cron.schedule(SCHEDULES.autoSyncCheck, async () => {
        await this.runAutoSyncIfDue();
      })
    );

    const sync = this.settings.autoSyncHours > 0 ? `every ${this.settings.autoSyncHours}h` : "off";
    log.info(`⏰ Scheduler started (auto-sync ${sync})`);
  }

  stop(): void {
    for (const task of this.tasks) {
      task.stop();
    }
    this.tasks = [];
  }

  autoSyncHours(): number {
    return this.settings.autoSyncHours;
  }

  /** 0 turns auto-sync off */
  setAutoSync(hours: number): void {
    if (!Number.isInteger(hours) || hours < 0) {
      throw new ValidationError("Auto-sync interval must be a whole number of hours");
    }
    this.settings = { ...this.settings, autoSyncHours: hours };
    this.file.save(this.settings);
    audit.system("auto_sync_changed", { hours });
    log.info(`⏰ Auto-sync ${hours > 0 ? `every ${hours}h` : "off"}`);
  }

  runMemoryCleanup(now: Date = new Date()): number {
    try {
      const removed = this.deps.memory.cleanupOldEntries(this.memoryCleanupDays, now);
      if (removed > 0) {
        log.info(`🧹 Removed ${removed} idle conversations`);
      }
      return removed;
    } catch (error) {
      log.error(`❌ Memory cleanup failed: ${errorMessage(error)}`);
      return 0;
    }
  }

  runExportCleanup(now: Date = new Date()): number {
    try {
      return this.deps.exporter.cleanupOldFiles(this.exportRetentionHours, now);
    } catch (error) {
      log.error(`❌ Export cleanup failed: ${errorMessage(error)}`);
      return 0;
    }
  }

  /**
   * Sync when auto-sync is on and the interval has passed since the last
   * sync. Returns whether a sync ran successfully.
   */
  async runAutoSyncIfDue(now: Date = new Date()): Promise<boolean> {
    const hours = this.settings.autoSyncHours;
    if (hours <= 0) return false;

    const last = this.settings.lastSyncAt ? new Date(this.settings.lastSyncAt).getTime() : 0;
    if (now.getTime() - last < hours * 3600 * 1000) return false;

    try {
      const { added } = await this.deps.stores.sync();
      this.settings = { ...this.settings, lastSyncAt: now.toISOString() };
      this.file.save(this.settings);
      log.info(`⏰ Auto-sync done, ${added.length} new store(s)`);
      return true;
    } catch (error) {
      log.error(`❌ Auto-sync failed: ${errorMessage(error)}`);
      return false;
    }
  }
}
