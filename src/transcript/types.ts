/** One timed span returned by the transcription service, in seconds. */
export type TranscriptSegment = {
  start: number;
  end: number;
  text: string;
};

/** Result of transcribing a single audio window. Times are window-local. */
export type WindowTranscription = {
  text: string;
  segments: TranscriptSegment[];
  failed: boolean;
};

/** A window's transcription tagged with the window's index. */
export type IndexedTranscription = WindowTranscription & {
  index: number;
};

export type Transcript = {
  raw: string;
  formatted: string;
  segments: TranscriptSegment[];
  rawPath?: string;
  formattedPath?: string;
  createdAt: number;
};
