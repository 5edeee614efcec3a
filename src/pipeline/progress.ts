import { describeError } from "../errors.js";
import type { PrimaryChannel } from "../telegram/types.js";
import { log } from "../utils/logger.js";

const pipelineLog = log.withScope("pipeline");

/** Where stage updates for one request go. */
export interface ProgressReporter {
  readonly messageId?: number;
  update(status: string): Promise<void>;
}

/**
 * Edits a single status message in place. Edit failures are logged and
 * never fail the pipeline; repeated identical text is not re-sent.
 */
export class ChannelProgress implements ProgressReporter {
  private last = "";

  constructor(
    private readonly primary: PrimaryChannel,
    private readonly chatId: string,
    readonly messageId: number
  ) {}

  static async start(primary: PrimaryChannel, chatId: string, initial: string): Promise<ChannelProgress> {
    const messageId = await primary.sendMessage(chatId, initial);
    const progress = new ChannelProgress(primary, chatId, messageId);
    progress.last = initial;
    return progress;
  }

  async update(status: string): Promise<void> {
    if (status === this.last) return;
    this.last = status;
    try {
      await this.primary.editMessage(this.chatId, this.messageId, status);
    } catch (err: unknown) {
      pipelineLog.warn(`Progress update failed: ${describeError(err)}`, { chatId: this.chatId });
    }
  }
}

/** For runs with nobody to report to (local tool, unclaimed relay files without a chat). */
export class NoopProgress implements ProgressReporter {
  async update(status: string): Promise<void> {
    pipelineLog.debug(`progress: ${status}`);
  }
}
