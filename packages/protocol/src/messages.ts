// Discord REST payloads (only the fields the digest reads)

export interface DiscordAuthorPayload {
  id?: string;
  username?: string | null;
  global_name?: string | null;
}

export interface DiscordMessagePayload {
  id: string;
  timestamp?: string | null;
  content?: string | null;
  author?: DiscordAuthorPayload | null;
}

export interface DiscordChannelPayload {
  id?: string;
  name?: string | null;
}

// Digest data model

/** One configured origin of messages */
export interface ChannelSource {
  readonly id: string;
}

/** A message fetched from a source channel, immutable once built */
export interface RawMessage {
  readonly id: string;
  readonly channelId: string;
  readonly author: string;
  readonly content: string | null;
  /** ISO-8601 as received */
  readonly timestamp: string;
  /** Parsed epoch milliseconds */
  readonly time: number;
}

export interface TimeWindow {
  readonly hours: number;
  readonly cutoff: Date;
}

export interface TranscriptEntry {
  readonly channelId: string;
  readonly channel: string;
  readonly author: string;
  readonly content: string;
  readonly timestamp: string;
  readonly time: number;
}

export interface AggregatedTranscript {
  /** Ascending by time; ties keep arrival order */
  readonly entries: readonly TranscriptEntry[];
  /** Display names in configured source order */
  readonly channelNames: ReadonlyMap<string, string>;
  /** Content-bearing, in-window messages */
  readonly totalMessages: number;
  /** Every in-window message, including ones without content */
  readonly fetchedMessages: number;
  readonly window: TimeWindow;
}

export type DeliveryFormat = 'plain' | 'quote';

export interface Digest {
  readonly header: string;
  readonly body: string;
  readonly footer: string | null;
  readonly text: string;
}
