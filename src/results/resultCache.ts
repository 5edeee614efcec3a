import type { SummaryKind } from "../llm/prompts/summaryPrompts.js";
import { TtlStore } from "../store/ttlStore.js";
import type { SummaryOutcome, SummaryResult } from "../summary/summarize.js";
import type { Transcript } from "../transcript/types.js";
import { log } from "../utils/logger.js";

const resultsLog = log.withScope("results");

export type RequesterResultEntry = {
  transcript: Transcript;
  summaries: Partial<Record<SummaryKind, SummaryResult>>;
  updatedAt: number;
};

export type SummaryLookup = SummaryOutcome | { status: "no_transcript" };

/**
 * Latest transcript per requester, plus the summaries computed from it.
 * Storing a new transcript drops the old summaries; failed summaries are
 * never stored.
 */
export class ResultCache {
  private readonly store: TtlStore<string, RequesterResultEntry>;
  private readonly now: () => number;

  constructor(opts: { ttlMs: number; maxEntries: number; now?: () => number }) {
    this.now = opts.now ?? Date.now;
    this.store = new TtlStore({ ttlMs: opts.ttlMs, maxEntries: opts.maxEntries, now: this.now });
  }

  storeTranscript(requesterId: string, transcript: Transcript): void {
    this.store.set(requesterId, { transcript, summaries: {}, updatedAt: this.now() });
  }

  get(requesterId: string): RequesterResultEntry | undefined {
    return this.store.get(requesterId);
  }

  /**
   * Return the cached summary or compute it. The result is only stored if
   * the transcript it was computed from is still the current one.
   */
  async getOrComputeSummary(
    requesterId: string,
    kind: SummaryKind,
    compute: (transcript: Transcript) => Promise<SummaryOutcome>
  ): Promise<SummaryLookup> {
    const entry = this.store.get(requesterId);
    if (!entry) return { status: "no_transcript" };

    const cached = entry.summaries[kind];
    if (cached) {
      resultsLog.debug(`Summary cache hit (${kind})`, { requesterId });
      return { status: "ok", summary: cached, calls: 0 };
    }

    const outcome = await compute(entry.transcript);
    if (outcome.status === "ok") {
      const current = this.store.get(requesterId);
      if (current && current.transcript === entry.transcript) {
        current.summaries[kind] = outcome.summary;
        current.updatedAt = this.now();
      } else {
        resultsLog.info("Transcript replaced while summarizing; not caching stale summary", { requesterId });
      }
    }
    return outcome;
  }
}
