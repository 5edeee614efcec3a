import { hydrateFiles, type FileApiFlavor, type FileFlavor } from "@grammyjs/files";
import { Api, Bot, Context, InlineKeyboard, InputFile } from "grammy";
import type { InlineButton, PrimaryChannel, SendOptions } from "./types.js";

export type BotContext = FileFlavor<Context>;
export type BotApi = FileApiFlavor<Api>;
export type TranscriberBot = Bot<BotContext, BotApi>;

export function createBot(token: string): TranscriberBot {
  const bot = new Bot<BotContext, BotApi>(token);
  bot.api.config.use(hydrateFiles(bot.token));
  return bot;
}

function keyboard(buttons: InlineButton[] | undefined): InlineKeyboard | undefined {
  if (!buttons || buttons.length === 0) return undefined;
  const kb = new InlineKeyboard();
  for (const button of buttons) {
    kb.text(button.text, button.data);
  }
  return kb;
}

/** PrimaryChannel over the Bot API. */
export class BotChannel implements PrimaryChannel {
  constructor(private readonly api: BotApi) {}

  async sendMessage(chatId: string, text: string, opts: SendOptions = {}): Promise<number> {
    const message = await this.api.sendMessage(chatId, text, { reply_markup: keyboard(opts.buttons) });
    return message.message_id;
  }

  async editMessage(chatId: string, messageId: number, text: string): Promise<void> {
    await this.api.editMessageText(chatId, messageId, text);
  }

  async sendDocument(chatId: string, filePath: string, opts: SendOptions = {}): Promise<number> {
    const message = await this.api.sendDocument(chatId, new InputFile(filePath), {
      caption: opts.caption,
      reply_markup: keyboard(opts.buttons),
    });
    return message.message_id;
  }

  async downloadFile(fileId: string, destPath: string): Promise<string> {
    const file = await this.api.getFile(fileId);
    return file.download(destPath);
  }

  async copyMessage(toChatId: string, fromChatId: string, messageId: number, caption: string): Promise<number> {
    const copy = await this.api.copyMessage(toChatId, fromChatId, messageId, { caption });
    return copy.message_id;
  }
}
