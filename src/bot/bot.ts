/**
 * grammY bot construction
 */

import { Bot } from "grammy";
import { log } from "../utils/logger.js";
import { errorMessage } from "../errors.js";
import { registerHandlers, type BotServices } from "./handlers.js";

export const BOT_COMMANDS = [
  { command: "help", description: "Commands and status" },
  { command: "list", description: "Show all stores" },
  { command: "select", description: "Choose the active store" },
  { command: "current", description: "Show the active store" },
  { command: "status", description: "Bot status" },
  { command: "think", description: "Deep thinking answer" },
  { command: "clear", description: "Forget the conversation" },
  { command: "export", description: "Export the last answer (pdf|docx)" },
  { command: "sync", description: "Pick up stores created elsewhere" },
];

export function createBot(services: BotServices): Bot {
  const bot = new Bot(services.botToken);
  registerHandlers(bot, services);

  bot.catch((err) => {
    log.error(`❌ Unhandled error in update ${err.ctx.update.update_id}: ${errorMessage(err.error)}`);
  });

  return bot;
}

/**
 * Start long polling. Resolves once the bot is stopped.
 */
export async function startPolling(bot: Bot): Promise<void> {
  try {
    await bot.api.setMyCommands(BOT_COMMANDS);
  } catch (error) {
    log.warning(`⚠️ Could not register the command menu: ${errorMessage(error)}`);
  }

  await bot.start({
    drop_pending_updates: true,
    onStart: (info) => log.success(`Bot @${info.username} is polling`),
  });
}
