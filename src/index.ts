#!/usr/bin/env node

/**
 * Notebook Router Bot
 *
 * Telegram bot answering questions from per-tenant document stores backed by
 * Gemini File Search or NotebookLM notebooks.
 */

import { CONFIG, validateStartupConfig } from "./config.js";
import { log } from "./utils/logger.js";
import { errorMessage } from "./errors.js";
import { audit } from "./utils/audit-logger.js";
import { GeminiClient } from "./gemini/index.js";
import { BrowserSession, NotebookLMClient } from "./notebooklm/index.js";
import { StoreRegistry } from "./stores/store-registry.js";
import { StoreService } from "./stores/store-service.js";
import { UserStateStore } from "./session/user-state.js";
import { ConversationMemory } from "./session/memory.js";
import { eventEmitter } from "./events/event-emitter.js";
import { ChannelNotifier } from "./events/channel-notifier.js";
import { QueryProcessor, StoreRouter, PromptEnhancer } from "./routing/index.js";
import { ExportClient } from "./export/export-client.js";
import { DriveClient } from "./drive/drive-client.js";
import { JobScheduler } from "./jobs/scheduler.js";
import { AccessPolicy } from "./bot/access.js";
import { AnswerService } from "./bot/answer-service.js";
import { ActionDispatcher } from "./bot/action-dispatcher.js";
import { createBot, startPolling } from "./bot/bot.js";

async function main(): Promise<void> {
  log.info("🎯 Starting Notebook Router Bot...");
  validateStartupConfig(CONFIG);

  const gemini = new GeminiClient();
  const registry = new StoreRegistry();
  const userState = new UserStateStore();
  const memory = new ConversationMemory();
  const stores = new StoreService(registry, gemini, userState, eventEmitter);
  const exporter = new ExportClient();
  const drive = new DriveClient();
  const browser = new BrowserSession();
  const notebooks = new NotebookLMClient(browser);
  const access = new AccessPolicy();
  const scheduler = new JobScheduler({ memory, exporter, stores });

  const answers = new AnswerService({
    registry,
    userState,
    memory,
    gemini,
    notebooks,
    processor: new QueryProcessor(gemini),
    router: new StoreRouter(gemini),
    enhancer: new PromptEnhancer(gemini),
    events: eventEmitter,
  });

  const actions = new ActionDispatcher({
    registry,
    stores,
    userState,
    memory,
    exporter,
    drive,
    autoSync: scheduler,
    access,
    status: () => ({
      geminiAvailable: gemini.isAvailable(),
      notebooklmReady: browser.isOpen(),
      driveConfigured: drive.isConfigured(),
      storeCount: registry.count(),
      notebookCount: registry.list().filter((s) => s.backend === "notebooklm").length,
      model: CONFIG.geminiModel,
      thinkingLevel: CONFIG.geminiThinkingLevel,
      memory: memory.getStats(),
      autoSyncHours: scheduler.autoSyncHours(),
    }),
  });

  const bot = createBot({
    access,
    answers,
    actions,
    registry,
    userState,
    stores,
    gemini,
    botToken: CONFIG.botToken,
  });

  if (CONFIG.notificationChannelId !== undefined) {
    new ChannelNotifier(CONFIG.notificationChannelId, (chatId, text) => bot.api.sendMessage(chatId, text)).attach(
      eventEmitter
    );
    log.info(`📣 Notifications go to ${CONFIG.notificationChannelId}`);
  }

  log.info("📝 Configuration:");
  log.info(`  Data Dir: ${CONFIG.dataDir}`);
  log.info(`  Stores: ${registry.count()}`);
  log.info(`  Model: ${CONFIG.geminiModel} (pro: ${CONFIG.geminiModelPro})`);
  log.info(`  Allowed users: ${CONFIG.allowedUsers.length > 0 ? CONFIG.allowedUsers.length : "everyone"}`);
  log.info(`  NotebookLM headless: ${CONFIG.notebooklmHeadless}`);

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info(`🛑 Received ${signal}, shutting down...`);
    try {
      scheduler.stop();
      await bot.stop();
      await browser.close();
      audit.system("shutdown", { signal });
      log.success("Shutdown complete");
      process.exit(0);
    } catch (error) {
      log.error(`❌ Error during shutdown: ${errorMessage(error)}`);
      process.exit(1);
    }
  };
  const requestShutdown = (signal: string): void => {
    void shutdown(signal);
  };

  process.on("SIGINT", () => requestShutdown("SIGINT"));
  process.on("SIGTERM", () => requestShutdown("SIGTERM"));
  process.on("unhandledRejection", (reason) => {
    log.error(`💥 Unhandled rejection: ${errorMessage(reason)}`);
  });

  scheduler.start();
  audit.system("startup", { stores: registry.count() });
  await startPolling(bot);
}

main().catch((error) => {
  log.error(`💥 Fatal error starting bot: ${errorMessage(error)}`);
  process.exit(1);
});
