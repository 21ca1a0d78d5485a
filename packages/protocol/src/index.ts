// Data model
export type {
  DiscordAuthorPayload,
  DiscordMessagePayload,
  DiscordChannelPayload,
  ChannelSource,
  RawMessage,
  TimeWindow,
  TranscriptEntry,
  AggregatedTranscript,
  DeliveryFormat,
  Digest,
} from './messages.js';

// Constants
export {
  DISCORD_API_BASE,
  DISCORD_MESSAGE_LIMIT,
  HISTORY_PAGE_SIZE,
  HISTORY_PAGE_DELAY_MS,
  DEFAULT_MAX_PAGES,
  SEND_PACING_MS,
  REST_SEND_TIMEOUT_MS,
  OPENROUTER_BASE_URL,
  DEFAULT_MODEL,
  SUMMARY_TIMEOUT_MS,
  SUMMARY_MAX_TOKENS,
  SUMMARY_TEMPERATURE,
  DEFAULT_HOURS,
  DEFAULT_LABEL,
  QUOTE_MARKER,
  QUOTE_PREFIX,
  DIGEST_FOOTER,
} from './constants.js';
