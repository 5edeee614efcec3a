import type { ChunkBoundary } from "../config/types.js";
import { describeError } from "../errors.js";
import type { CascadeChat } from "../llm/cascade.js";
import type { SummaryKind } from "../llm/prompts/summaryPrompts.js";
import type { MediaResolver } from "../media/resolver.js";
import type { MediaRequest } from "../media/types.js";
import { classifyUrl, findUrl } from "../media/urlSources.js";
import type { JobTracker } from "../pipeline/jobs.js";
import { ChannelProgress, NoopProgress, type ProgressReporter } from "../pipeline/progress.js";
import { runPipeline, type PipelineDeps } from "../pipeline/runPipeline.js";
import type { UnclaimedRelayFile } from "../relay/monitor.js";
import type { ResultCache } from "../results/resultCache.js";
import { summarize } from "../summary/summarize.js";
import { log } from "../utils/logger.js";
import type { TranscriberBot } from "./botChannel.js";
import {
  deliverLongText,
  deliverRawTranscript,
  deliverTranscript,
  parseSummaryCallback,
  SUMMARY_CALLBACK_PREFIX,
} from "./delivery.js";
import type { PrimaryChannel } from "./types.js";

const botLog = log.withScope("bot");

export const HELP_TEXT = [
  "Send me a video, audio file or voice message and I'll transcribe it.",
  "Links to YouTube videos and public Google Drive files work too.",
  "",
  "/raw - transcript before formatting",
  "/brief - short summary of the last transcript",
  "/detailed - detailed summary of the last transcript",
].join("\n");

export const NO_TRANSCRIPT_TEXT = "There is no transcript yet. Send me a file or a link first.";
export const UNSUPPORTED_LINK_TEXT = "I can only download YouTube videos and public Google Drive files.";

type FileLike = { file_id: string; file_size?: number; duration?: number; file_name?: string };

/** The parts of an incoming chat message that decide how its media is fetched. */
export type IncomingMessage = {
  message_id: number;
  chat: { id: number };
  text?: string;
  caption?: string;
  video?: FileLike;
  audio?: FileLike;
  voice?: FileLike;
  video_note?: FileLike;
  document?: FileLike;
  forward_origin?: { type: string; chat?: { id: number }; message_id?: number };
};

function attachedFile(message: IncomingMessage): FileLike | undefined {
  return message.video ?? message.audio ?? message.voice ?? message.video_note ?? message.document;
}

/** Build a media request from a message, or null when it carries nothing to transcribe. */
export function toMediaRequest(message: IncomingMessage, requesterId: string): MediaRequest | null {
  const chatId = String(message.chat.id);
  const file = attachedFile(message);
  const origin = message.forward_origin;
  const forwardedFrom =
    origin?.type === "channel" && origin.chat && origin.message_id !== undefined
      ? { chatId: String(origin.chat.id), messageId: origin.message_id }
      : undefined;

  if (file) {
    return {
      requesterId,
      chatId,
      messageId: message.message_id,
      route: forwardedFrom ? "forwarded" : "direct",
      size: file.file_size ?? 0,
      declaredDuration: file.duration,
      fileId: file.file_id,
      fileName: file.file_name,
      forwardedFrom,
    };
  }

  const url = findUrl(message.text ?? message.caption ?? "");
  if (url) {
    return { requesterId, chatId, messageId: message.message_id, route: "url", size: 0, url };
  }

  if (forwardedFrom) {
    return { requesterId, chatId, messageId: message.message_id, route: "forwarded", size: 0, forwardedFrom };
  }
  return null;
}

export type RequestHandlerDeps = {
  primary: PrimaryChannel;
  resolver: Pick<MediaResolver, "resolve">;
  jobs: JobTracker;
  cache: ResultCache;
  chat: CascadeChat;
  pipeline: Omit<PipelineDeps, "cache" | "chat">;
  maxMessageLength: number;
  summary: { chunkChars: number; boundary: ChunkBoundary };
};

/**
 * What the bot does with each kind of update, independent of the Bot API
 * plumbing. Pipeline runs go through the job tracker; everything else
 * completes before returning.
 */
export class RequestHandlers {
  constructor(private readonly deps: RequestHandlerDeps) {}

  get jobs(): JobTracker {
    return this.deps.jobs;
  }

  /** Start transcribing; returns once the job is queued. */
  async onMedia(request: MediaRequest): Promise<void> {
    const { primary, resolver, jobs } = this.deps;

    if (request.route === "url" && request.url && !classifyUrl(request.url)) {
      await primary.sendMessage(request.chatId, UNSUPPORTED_LINK_TEXT);
      return;
    }

    const progress = await ChannelProgress.start(primary, request.chatId, "Got it, working on it...");
    botLog.info(`Media request via ${request.route}`, {
      chatId: request.chatId,
      messageId: request.messageId,
      size: request.size,
    });

    jobs.run(`${request.chatId}_${request.messageId}`, () =>
      this.transcribe(request.requesterId, request.chatId, `${request.chatId}_${request.messageId}`, progress, () =>
        resolver.resolve(request, progress)
      )
    );
  }

  /** A relayed file nobody was waiting for any more: process it for the chat in its tag. */
  async onUnclaimed(file: UnclaimedRelayFile): Promise<void> {
    const { primary, jobs } = this.deps;
    const chatId = file.tag.chatId;
    const progress: ProgressReporter = await ChannelProgress.start(
      primary,
      chatId,
      "Your large file finally arrived, working on it..."
    ).catch((err: unknown) => {
      botLog.warn(`Could not notify chat ${chatId} about a late file: ${describeError(err)}`);
      return new NoopProgress();
    });

    jobs.run(`relay_${chatId}_${file.tag.messageId}`, () =>
      this.transcribe(chatId, chatId, `relay_${chatId}_${file.tag.messageId}`, progress, async () => file.path)
    );
  }

  async onRaw(requesterId: string, chatId: string): Promise<void> {
    const entry = this.deps.cache.get(requesterId);
    if (!entry) {
      await this.deps.primary.sendMessage(chatId, NO_TRANSCRIPT_TEXT);
      return;
    }
    await deliverRawTranscript(this.deps.primary, chatId, entry.transcript, this.deps.maxMessageLength);
  }

  async onSummary(requesterId: string, chatId: string, kind: SummaryKind): Promise<void> {
    const { primary, cache, chat, summary } = this.deps;

    const lookup = await cache.getOrComputeSummary(requesterId, kind, async (transcript) => {
      await primary.sendMessage(chatId, kind === "detailed" ? "Writing a detailed summary..." : "Writing a summary...");
      return summarize(transcript.formatted, chat, { detailed: kind === "detailed", ...summary });
    });

    switch (lookup.status) {
      case "no_transcript":
        await primary.sendMessage(chatId, NO_TRANSCRIPT_TEXT);
        return;
      case "too_short":
      case "failed":
        await primary.sendMessage(chatId, lookup.message);
        return;
      case "ok":
        await deliverLongText(primary, chatId, lookup.summary.text, this.deps.maxMessageLength);
        return;
    }
  }

  private async transcribe(
    requesterId: string,
    chatId: string,
    label: string,
    progress: ProgressReporter,
    acquire: () => Promise<string>
  ): Promise<void> {
    const outcome = await runPipeline({ requesterId, label, acquire, removeSource: true }, progress, {
      ...this.deps.pipeline,
      chat: this.deps.chat,
      cache: this.deps.cache,
    });
    if (!outcome.ok) return;

    if (outcome.failedWindows > 0) {
      await progress.update(`Done, but ${outcome.failedWindows} of ${outcome.windows} parts could not be transcribed.`);
    } else {
      await progress.update("Done.");
    }
    await deliverTranscript(this.deps.primary, chatId, outcome.transcript, this.deps.maxMessageLength);
  }
}

function requesterOf(ctx: { from?: { id: number }; chat?: { id: number } }): string {
  return String(ctx.from?.id ?? ctx.chat?.id ?? "");
}

/** Wire the request handlers to bot updates. */
export function registerHandlers(bot: TranscriberBot, handlers: RequestHandlers): void {
  // The Bot API delivers one update at a time; summaries run as jobs so the next update is not held up
  const summaryJob = (requesterId: string, chatId: string, kind: SummaryKind): void => {
    handlers.jobs.run(`summary_${requesterId}_${kind}`, () => handlers.onSummary(requesterId, chatId, kind));
  };

  bot.command(["start", "help"], (ctx) => ctx.reply(HELP_TEXT));
  bot.command("raw", (ctx) => handlers.onRaw(requesterOf(ctx), String(ctx.chat.id)));
  bot.command("brief", (ctx) => summaryJob(requesterOf(ctx), String(ctx.chat.id), "brief"));
  bot.command("detailed", (ctx) => summaryJob(requesterOf(ctx), String(ctx.chat.id), "detailed"));

  bot.callbackQuery(new RegExp(`^${SUMMARY_CALLBACK_PREFIX}`), async (ctx) => {
    await ctx.answerCallbackQuery();
    const kind = parseSummaryCallback(ctx.callbackQuery.data);
    const chatId = ctx.chat?.id;
    if (!kind || chatId === undefined) return;
    summaryJob(requesterOf(ctx), String(chatId), kind);
  });

  bot.on(
    ["message:video", "message:audio", "message:voice", "message:video_note", "message:document", "message:text"],
    async (ctx) => {
      if (ctx.message.text?.startsWith("/")) return;
      const request = toMediaRequest(ctx.message, requesterOf(ctx));
      if (!request) {
        await ctx.reply(HELP_TEXT);
        return;
      }
      await handlers.onMedia(request);
    }
  );

  bot.catch((err) => {
    botLog.error(`Update ${err.ctx.update.update_id} failed: ${describeError(err.error)}`);
  });
}
