/**
 * What the pipeline needs from the two network identities. The grammy and
 * GramJS adapters implement these; tests use in-memory fakes.
 */

export type InlineButton = {
  text: string;
  data: string;
};

export type SendOptions = {
  buttons?: InlineButton[];
  caption?: string;
};

/** The bot identity: talks to users, downloads small files, copies messages. */
export interface PrimaryChannel {
  sendMessage(chatId: string, text: string, opts?: SendOptions): Promise<number>;
  editMessage(chatId: string, messageId: number, text: string): Promise<void>;
  sendDocument(chatId: string, filePath: string, opts?: SendOptions): Promise<number>;
  downloadFile(fileId: string, destPath: string): Promise<string>;
  /** Copy a message into another chat with a new caption; returns the copy's id. */
  copyMessage(toChatId: string, fromChatId: string, messageId: number, caption: string): Promise<number>;
}

/** A message as seen by the secondary identity. */
export type RelayMessage = {
  id: number;
  caption: string;
  hasMedia: boolean;
};

/** The full-account identity: reads the relay channel and downloads any size. */
export interface SecondaryAccount {
  connect(): Promise<void>;
  canRead(chatId: string): Promise<boolean>;
  getMessageById(chatId: string, messageId: number): Promise<RelayMessage | null>;
  getRecentMessages(chatId: string, limit: number): Promise<RelayMessage[]>;
  /** Messages with id > minId, oldest first, at most `limit`. */
  getMessagesAfter(chatId: string, minId: number, limit: number): Promise<RelayMessage[]>;
  downloadMedia(chatId: string, messageId: number, destPath: string): Promise<string>;
}
