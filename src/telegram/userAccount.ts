import bigInt from "big-integer";
import { Api, TelegramClient } from "telegram";
import { StringSession } from "telegram/sessions/index.js";
import { describeError } from "../errors.js";
import { log } from "../utils/logger.js";
import type { RelayMessage, SecondaryAccount } from "./types.js";

const relayLog = log.withScope("relay");

// dialogs loaded on connect so numeric chat ids resolve to cached peers
const DIALOG_PRELOAD = 200;

export type UserAccountOptions = {
  apiId: number;
  apiHash: string;
  session: string;
};

function toRelayMessage(message: Api.Message): RelayMessage {
  return {
    id: message.id,
    caption: message.message ?? "",
    hasMedia: message.media !== undefined && !(message.media instanceof Api.MessageMediaEmpty),
  };
}

/** SecondaryAccount over MTProto with a pre-authorized string session. */
export class UserAccount implements SecondaryAccount {
  private readonly client: TelegramClient;
  private connecting: Promise<void> | null = null;

  constructor(opts: UserAccountOptions) {
    this.client = new TelegramClient(new StringSession(opts.session), opts.apiId, opts.apiHash, {
      connectionRetries: 5,
    });
  }

  connect(): Promise<void> {
    if (!this.connecting) {
      this.connecting = this.doConnect().catch((err: unknown) => {
        this.connecting = null;
        throw err;
      });
    }
    return this.connecting;
  }

  async disconnect(): Promise<void> {
    this.connecting = null;
    await this.client.disconnect();
  }

  async canRead(chatId: string): Promise<boolean> {
    try {
      await this.connect();
      await this.client.getMessages(bigInt(chatId), { limit: 1 });
      return true;
    } catch (err: unknown) {
      relayLog.warn(`Secondary identity cannot read ${chatId}: ${describeError(err)}`);
      return false;
    }
  }

  async getMessageById(chatId: string, messageId: number): Promise<RelayMessage | null> {
    const message = await this.fetchMessage(chatId, messageId);
    return message ? toRelayMessage(message) : null;
  }

  async getRecentMessages(chatId: string, limit: number): Promise<RelayMessage[]> {
    await this.connect();
    const messages = await this.client.getMessages(bigInt(chatId), { limit });
    return messages.map(toRelayMessage);
  }

  async getMessagesAfter(chatId: string, minId: number, limit: number): Promise<RelayMessage[]> {
    await this.connect();
    const messages = await this.client.getMessages(bigInt(chatId), { minId, limit, reverse: true });
    return messages.map(toRelayMessage);
  }

  async downloadMedia(chatId: string, messageId: number, destPath: string): Promise<string> {
    const message = await this.fetchMessage(chatId, messageId);
    if (!message?.media) {
      throw new Error(`message ${messageId} in ${chatId} has no media`);
    }
    await this.client.downloadMedia(message, { outputFile: destPath });
    return destPath;
  }

  private async fetchMessage(chatId: string, messageId: number): Promise<Api.Message | undefined> {
    await this.connect();
    const [message] = await this.client.getMessages(bigInt(chatId), { ids: messageId });
    return message;
  }

  private async doConnect(): Promise<void> {
    await this.client.connect();
    if (!(await this.client.checkAuthorization())) {
      throw new Error("TELEGRAM_SESSION is not authorized; create a session string first");
    }
    await this.client.getDialogs({ limit: DIALOG_PRELOAD });
    relayLog.info("Secondary identity connected");
  }
}
