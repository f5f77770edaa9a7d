/**
 * Telegram Handlers
 *
 * Wires grammY updates to the dispatcher and the answer service. Every
 * handler runs behind `guarded`, which checks access and turns an error into
 * a short reply instead of letting it reach grammY.
 */

import fs from "fs";
import os from "os";
import path from "path";
import { InputFile, type Bot, type CommandContext, type Context, type Filter } from "grammy";
import { CONFIG } from "../config.js";
import { log } from "../utils/logger.js";
import {
  AccessDeniedError,
  BackendError,
  NotFoundError,
  ValidationError,
  errorMessage,
} from "../errors.js";
import { splitMessage } from "../utils/text.js";
import { sanitizeFilename, type FetchFn } from "../drive/drive-client.js";
import type { GeminiClient } from "../gemini/gemini-client.js";
import type { StoreRegistry } from "../stores/store-registry.js";
import type { StoreService } from "../stores/store-service.js";
import type { UserStateStore } from "../session/user-state.js";
import type { AccessPolicy } from "./access.js";
import type { AnswerService, ProgressCallback } from "./answer-service.js";
import { textReply, type ActionDispatcher, type Reply } from "./action-dispatcher.js";
import { formatError } from "./formatting.js";
import {
  USAGE,
  commandArgs,
  parseAddNotebookArgs,
  parseAutosyncArgs,
  parseExportFormat,
  parseNameAndDescription,
  parseRenameArgs,
  parseUploadUrlArgs,
  requireArgs,
} from "./commands.js";

export interface BotServices {
  access: AccessPolicy;
  answers: AnswerService;
  actions: ActionDispatcher;
  registry: StoreRegistry;
  userState: UserStateStore;
  stores: StoreService;
  gemini: Pick<GeminiClient, "describeImage">;
  botToken: string;
  fetch?: FetchFn;
}

/** The part of a grammY context `guarded` needs */
export interface ReplyTarget {
  readonly from?: { id: number };
  reply(text: string): Promise<unknown>;
}

type Handler<C> = (ctx: C, userId: number) => Promise<void>;
type CommandCtx = CommandContext<Context>;

/**
 * Check access, run the handler, and answer any error with a reply.
 * Validation, lookup and access errors are shown as they are; anything else
 * is logged and shown as "Error: ...".
 */
export function guarded<C extends ReplyTarget>(access: AccessPolicy, handler: Handler<C>): (ctx: C) => Promise<void> {
  return async (ctx) => {
    const userId = ctx.from?.id;
    if (userId === undefined) return;

    try {
      access.assert(userId);
      await handler(ctx, userId);
    } catch (error) {
      if (error instanceof AccessDeniedError || error instanceof ValidationError || error instanceof NotFoundError) {
        await ctx.reply(error.message);
        return;
      }
      log.error(`❌ Update from ${userId} failed: ${errorMessage(error)}`);
      await ctx.reply(formatError(errorMessage(error)));
    }
  };
}

/**
 * A status message that is edited as work progresses and replaced by the
 * first reply at the end.
 */
async function startStatus(ctx: Context, text: string): Promise<{ update: ProgressCallback; finish: (replies: Reply[]) => Promise<void> }> {
  const chatId = ctx.chat?.id;
  const message = await ctx.reply(text);
  let current = text;

  const edit = async (next: string): Promise<boolean> => {
    if (next === current) return true;
    if (chatId === undefined) return false;
    try {
      await ctx.api.editMessageText(chatId, message.message_id, next);
      current = next;
      return true;
    } catch (error) {
      log.dim(`Could not edit status message: ${errorMessage(error)}`);
      return false;
    }
  };

  return {
    update: async (next) => {
      await edit(next);
    },
    finish: async (replies) => {
      const [first, ...rest] = replies;
      if (first?.kind === "text") {
        const [head, ...tail] = splitMessage(first.text);
        if (await edit(head)) {
          await sendReplies(ctx, [...tail.map(textReply), ...rest]);
          return;
        }
      }
      await sendReplies(ctx, replies);
    },
  };
}

export async function sendReplies(ctx: Context, replies: Reply[]): Promise<void> {
  for (const reply of replies) {
    if (reply.kind === "document") {
      await ctx.replyWithDocument(new InputFile(reply.filePath), { caption: reply.caption });
      continue;
    }
    for (const part of splitMessage(reply.text)) {
      await ctx.reply(part);
    }
  }
}

/**
 * Download the file attached to the current message (document or the
 * largest photo size) through the Bot API file endpoint.
 */
async function downloadAttachment(ctx: Context, services: BotServices): Promise<Buffer> {
  const file = await ctx.getFile();
  if (!file.file_path) {
    throw new BackendError("telegram", "Telegram did not return a download path for the file");
  }
  const fetchFn: FetchFn = services.fetch ?? ((input, init) => fetch(input, init));
  const response = await fetchFn(`https://api.telegram.org/file/bot${services.botToken}/${file.file_path}`);
  if (!response.ok) {
    throw new BackendError("telegram", `File download failed: HTTP ${response.status}`);
  }
  return Buffer.from(await response.arrayBuffer());
}

export function registerHandlers(bot: Bot, services: BotServices): void {
  const { access, actions, answers } = services;

  const command = (names: string | string[], handler: Handler<CommandCtx>): void => {
    bot.command(names, guarded(access, handler));
  };
  const reply = async (ctx: Context, replies: Promise<Reply[]>): Promise<void> => {
    await sendReplies(ctx, await replies);
  };

  command(["start", "help"], (ctx, userId) => reply(ctx, actions.run(userId, { action: "help" })));
  command("list", (ctx, userId) => reply(ctx, actions.run(userId, { action: "list_stores" })));
  command("status", (ctx, userId) => reply(ctx, actions.run(userId, { action: "status" })));
  command("clear", (ctx, userId) => reply(ctx, actions.run(userId, { action: "clear_memory" })));

  command("select", (ctx, userId) =>
    reply(ctx, actions.run(userId, { action: "select_store", storeName: requireArgs(ctx.match, USAGE.select) }))
  );

  command("current", async (ctx, userId) => {
    const selection = services.userState.getSelectedStore(userId);
    const store = selection ? services.registry.getById(selection.storeId) : undefined;
    await ctx.reply(store ? `Active store: ${store.name}` : "No active store. Use /select <name>.");
  });

  command("export", (ctx, userId) =>
    reply(ctx, actions.run(userId, { action: "export", format: parseExportFormat(ctx.match) }))
  );

  command("think", async (ctx, userId) => {
    const question = requireArgs(ctx.match, USAGE.think);
    await ctx.replyWithChatAction("typing");
    const status = await startStatus(ctx, "Thinking deeply...");
    const result = await answers.think(userId, question, status.update);
    await status.finish([textReply(result.text)]);
  });

  command("sync", async (ctx, userId) => {
    const status = await startStatus(ctx, "Syncing stores with the API...");
    await status.finish(await actions.run(userId, { action: "sync_now" }, status.update));
  });

  command("add", async (ctx, userId) => {
    access.assert(userId, true, "add_store");
    const { name, description } = parseNameAndDescription(ctx.match);
    const status = await startStatus(ctx, `Creating store '${name}'...`);
    await status.finish(await actions.run(userId, { action: "add_store", name, description }));
  });

  command("addnotebook", async (ctx, userId) => {
    access.assert(userId, true, "add_notebook");
    const { url, name, description } = parseAddNotebookArgs(ctx.match);
    const store = await services.stores.registerNotebook(url, name, description, userId);
    await ctx.reply(`Notebook registered!\n\nName: ${store.name}\nURL: ${store.notebookUrl ?? url}`);
  });

  command("upload", (ctx, userId) =>
    reply(ctx, actions.run(userId, { action: "upload_file", storeName: ctx.match.trim() || undefined }))
  );

  command("uploadurl", async (ctx, userId) => {
    access.assert(userId, true, "upload_url");
    const { storeName, links } = parseUploadUrlArgs(ctx.match);
    const status = await startStatus(ctx, `Importing ${links.length} link(s)...`);
    const replies = await actions.run(
      userId,
      { action: "upload_url", storeName, urls: links.map((l) => l.url) },
      status.update
    );
    await status.finish(replies);
  });

  command("delete", (ctx, userId) =>
    reply(ctx, actions.run(userId, { action: "delete_store", storeName: requireArgs(ctx.match, USAGE.delete) }))
  );

  command("rename", (ctx, userId) =>
    reply(ctx, actions.run(userId, { action: "rename_store", ...parseRenameArgs(ctx.match) }))
  );

  command("autosync", (ctx, userId) =>
    reply(ctx, actions.run(userId, { action: "set_sync", hours: parseAutosyncArgs(ctx.match) }))
  );

  bot.on(
    "message:document",
    guarded<Filter<Context, "message:document">>(access, async (ctx, userId) => {
      const caption = ctx.message.caption ?? "";
      const fromCaption = /^\/upload(?:@\w+)?(?:\s|$)/i.test(caption) ? commandArgs(caption) : "";
      const pending = actions.takePendingUpload(userId);
      const storeReference = fromCaption || pending;
      if (!storeReference) {
        await ctx.reply(`To add a file to a store:\n${USAGE.upload}`);
        return;
      }
      access.assert(userId, true, "upload_file");

      const document = ctx.message.document;
      const fileName = sanitizeFilename(document.file_name ?? `document_${document.file_unique_id}`);
      const status = await startStatus(ctx, "Downloading file...");
      const dir = fs.mkdtempSync(path.join(os.tmpdir(), "telegram-upload-"));
      try {
        const filePath = path.join(dir, fileName);
        fs.writeFileSync(filePath, await downloadAttachment(ctx, services));
        await status.update("Uploading to the store...");
        await status.finish([await actions.uploadFile(userId, storeReference, filePath, fileName)]);
      } finally {
        fs.rmSync(dir, { recursive: true, force: true });
      }
    })
  );

  bot.on(
    "message:photo",
    guarded<Filter<Context, "message:photo">>(access, async (ctx) => {
      await ctx.replyWithChatAction("typing");
      const prompt = ctx.message.caption?.trim() || CONFIG.imageDefaultPrompt;
      const image = await downloadAttachment(ctx, services);
      const description = await services.gemini.describeImage(image, "image/jpeg", prompt);
      await sendReplies(ctx, [textReply(description || "Could not describe the image.")]);
    })
  );

  bot.on(
    "message:text",
    guarded<Filter<Context, "message:text">>(access, async (ctx, userId) => {
      const text = ctx.message.text.trim();
      if (!text) return;
      if (text.startsWith("/")) {
        await ctx.reply("Unknown command. Use /help to see what I can do.");
        return;
      }

      await ctx.replyWithChatAction("typing");
      const status = await startStatus(ctx, "Analyzing question...");
      const intent = await answers.analyse(userId, text);

      if (intent.kind === "action") {
        await status.finish(await actions.run(userId, intent.action, status.update));
        return;
      }
      const result = await answers.answer(userId, text, intent.processed, status.update);
      await status.finish([textReply(result.text)]);
    })
  );
}
