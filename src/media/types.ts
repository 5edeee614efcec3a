export type MediaRoute = "direct" | "forwarded" | "url" | "relay";

export type MediaRequest = Readonly<{
  requesterId: string;
  chatId: string;
  messageId: number;
  route: MediaRoute;
  /** Declared size in bytes; 0 when unknown (links). */
  size: number;
  declaredDuration?: number;
  fileId?: string;
  fileName?: string;
  url?: string;
  forwardedFrom?: Readonly<{ chatId: string; messageId: number }>;
}>;
