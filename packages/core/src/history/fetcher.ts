import {
  DISCORD_API_BASE,
  HISTORY_PAGE_SIZE,
  HISTORY_PAGE_DELAY_MS,
  DEFAULT_MAX_PAGES,
  type AggregatedTranscript,
  type ChannelSource,
  type DiscordMessagePayload,
  type RawMessage,
  type TimeWindow,
  type TranscriptEntry,
} from '@digestor/protocol';
import type { DiscordCredential } from '../types.js';
import { DiscordApiError, logError, structuredLog } from '../error-utils.js';
import { discordHeaders, isChannelPayload, isMessagePayload } from '../discord-api.js';
import { sleep as defaultSleep, type Sleep } from '../utils/sleep.js';

const COMPONENT = 'fetcher';
const HOUR_MS = 3_600_000;
const ISO_TIMESTAMP = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})$/;

export interface FetchOptions {
  apiBase?: string;
  pageSize?: number;
  /** Courtesy delay between history pages */
  pageDelayMs?: number;
  /** Safety bound on pages requested per channel */
  maxPages?: number;
  now?: () => Date;
  sleep?: Sleep;
}

export function computeCutoff(hours: number, now: Date = new Date()): Date {
  if (!Number.isFinite(hours) || hours <= 0) {
    throw new RangeError(`hours must be positive (got ${hours})`);
  }
  return new Date(now.getTime() - hours * HOUR_MS);
}

/** Epoch ms for an ISO-8601 timestamp, or null when it cannot be used */
export function parseTimestamp(value: unknown): number | null {
  if (typeof value !== 'string' || !ISO_TIMESTAMP.test(value)) return null;
  const time = Date.parse(value);
  return Number.isNaN(time) ? null : time;
}

export function resolveAuthorName(payload: DiscordMessagePayload): string {
  return payload.author?.global_name || payload.author?.username || 'Unknown';
}

export function placeholderName(channelId: string): string {
  return `Unknown-${channelId}`;
}

function toRawMessage(payload: DiscordMessagePayload, channelId: string): RawMessage | null {
  const time = parseTimestamp(payload.timestamp);
  if (time === null || typeof payload.timestamp !== 'string') return null;
  return {
    id: payload.id,
    channelId,
    author: resolveAuthorName(payload),
    content: typeof payload.content === 'string' ? payload.content : null,
    timestamp: payload.timestamp,
    time,
  };
}

/**
 * Resolve a channel's display name. Never rejects: failures come back as
 * `Error-<id>`, a missing credential or name as `Unknown-<id>`.
 */
export async function fetchChannelInfo(
  channelId: string,
  credential: DiscordCredential | null,
  options: FetchOptions = {},
): Promise<string> {
  if (!credential) return placeholderName(channelId);

  const endpoint = `/channels/${channelId}`;
  try {
    const res = await fetch(`${options.apiBase ?? DISCORD_API_BASE}${endpoint}`, {
      headers: discordHeaders(credential),
    });
    if (!res.ok) {
      await res.body?.cancel();
      throw new DiscordApiError(res.status, endpoint);
    }
    const body: unknown = await res.json();
    if (isChannelPayload(body) && typeof body.name === 'string' && body.name) {
      return body.name;
    }
    return placeholderName(channelId);
  } catch (err) {
    logError('warn', COMPONENT, 'channel_info_failed', err, { channelId });
    return `Error-${channelId}`;
  }
}

/**
 * Page backwards through a channel's history until a page reaches the cutoff.
 * Returns only messages strictly newer than the cutoff, newest first.
 * Transport errors end pagination; whatever was gathered is kept.
 */
export async function fetchChannelHistory(
  channelId: string,
  cutoff: Date,
  credential: DiscordCredential | null,
  options: FetchOptions = {},
): Promise<RawMessage[]> {
  if (!credential) return [];

  const apiBase = options.apiBase ?? DISCORD_API_BASE;
  const pageSize = options.pageSize ?? HISTORY_PAGE_SIZE;
  const pageDelayMs = options.pageDelayMs ?? HISTORY_PAGE_DELAY_MS;
  const maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
  const wait = options.sleep ?? defaultSleep;
  const cutoffMs = cutoff.getTime();

  const collected: RawMessage[] = [];
  let skipped = 0;
  let before: string | null = null;

  for (let page = 1; page <= maxPages; page++) {
    const query = new URLSearchParams({ limit: String(pageSize) });
    if (before) query.set('before', before);
    const endpoint = `/channels/${channelId}/messages?${query.toString()}`;

    let payload: unknown;
    try {
      const res = await fetch(`${apiBase}${endpoint}`, { headers: discordHeaders(credential) });
      if (!res.ok) {
        await res.body?.cancel();
        throw new DiscordApiError(res.status, endpoint);
      }
      payload = await res.json();
    } catch (err) {
      logError('warn', COMPONENT, 'history_page_failed', err, { channelId, page, kept: collected.length });
      break;
    }

    if (!Array.isArray(payload)) {
      structuredLog('warn', COMPONENT, 'history_page_malformed', { channelId, page, kept: collected.length });
      break;
    }
    if (payload.length === 0) break;

    let reachedCutoff = false;
    for (const item of payload) {
      const message = isMessagePayload(item) ? toRawMessage(item, channelId) : null;
      if (!message) {
        skipped++;
        continue;
      }
      if (message.time > cutoffMs) {
        collected.push(message);
      } else {
        reachedCutoff = true;
      }
    }
    if (reachedCutoff) break;

    const oldest: unknown = payload[payload.length - 1];
    if (!isMessagePayload(oldest)) {
      structuredLog('warn', COMPONENT, 'history_cursor_missing', { channelId, page });
      break;
    }
    if (page === maxPages) {
      structuredLog('warn', COMPONENT, 'history_page_limit', { channelId, maxPages, kept: collected.length });
      break;
    }
    before = oldest.id;
    await wait(pageDelayMs);
  }

  if (skipped > 0) {
    structuredLog('info', COMPONENT, 'history_messages_skipped', { channelId, skipped });
  }

  return collected.filter(message => message.time > cutoffMs);
}

/**
 * Fetch every source concurrently and merge the results into one
 * chronologically ordered transcript.
 */
export async function fetchTranscript(
  sources: readonly ChannelSource[],
  hours: number,
  credential: DiscordCredential | null,
  options: FetchOptions = {},
): Promise<AggregatedTranscript> {
  const now = options.now ? options.now() : new Date();
  const window: TimeWindow = { hours, cutoff: computeCutoff(hours, now) };
  const unique = [...new Map(sources.map(source => [source.id, source])).values()];

  if (!credential) {
    structuredLog('warn', COMPONENT, 'no_credential', { channels: unique.length });
    return {
      entries: [],
      channelNames: new Map(unique.map(source => [source.id, placeholderName(source.id)])),
      totalMessages: 0,
      fetchedMessages: 0,
      window,
    };
  }

  structuredLog('info', COMPONENT, 'fetch_started', {
    channels: unique.length,
    hours,
    cutoff: window.cutoff.toISOString(),
  });

  const results = await Promise.all(unique.map(async (source) => {
    try {
      const [name, messages] = await Promise.all([
        fetchChannelInfo(source.id, credential, options),
        fetchChannelHistory(source.id, window.cutoff, credential, options),
      ]);
      return { source, name, messages };
    } catch (err) {
      logError('warn', COMPONENT, 'channel_failed', err, { channelId: source.id });
      return { source, name: `Error-${source.id}`, messages: [] };
    }
  }));

  const channelNames = new Map<string, string>();
  const merged: TranscriptEntry[] = [];
  let fetchedMessages = 0;

  for (const { source, name, messages } of results) {
    channelNames.set(source.id, name);
    fetchedMessages += messages.length;
    for (const message of messages) {
      if (message.time <= window.cutoff.getTime() || !message.content) continue;
      merged.push({
        channelId: source.id,
        channel: name,
        author: message.author,
        content: message.content,
        timestamp: message.timestamp,
        time: message.time,
      });
    }
  }

  // Array.prototype.sort is stable: ties keep arrival order
  const entries = merged.sort((a, b) => a.time - b.time);

  structuredLog('info', COMPONENT, 'fetch_completed', {
    channels: unique.length,
    fetched: fetchedMessages,
    retained: entries.length,
  });

  return { entries, channelNames, totalMessages: entries.length, fetchedMessages, window };
}

export function buildTranscriptText(entries: readonly TranscriptEntry[]): string {
  return entries.map(entry => `[${entry.channel}] ${entry.author}: ${entry.content}\n`).join('');
}
