export const DISCORD_API_BASE = 'https://discord.com/api/v10';
export const DISCORD_MESSAGE_LIMIT = 2000;
export const HISTORY_PAGE_SIZE = 100;
export const HISTORY_PAGE_DELAY_MS = 500;
export const DEFAULT_MAX_PAGES = 50;
export const SEND_PACING_MS = 1000;
export const REST_SEND_TIMEOUT_MS = 10_000;

export const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';
export const DEFAULT_MODEL = 'google/gemini-2.0-flash-001';
export const SUMMARY_TIMEOUT_MS = 180_000;
export const SUMMARY_MAX_TOKENS = 8000;
export const SUMMARY_TEMPERATURE = 0.7;

export const DEFAULT_HOURS = 12;
export const DEFAULT_LABEL = 'default';

export const QUOTE_MARKER = '>';
export const QUOTE_PREFIX = '> ';

export const DIGEST_FOOTER = [
  '```',
  '* . ﹢ ˖ ✦ ¸ . ﹢ ° ¸. ° ˖ ･ ·̩ ｡ ☆ ﾟ ＊ ¸* . ﹢ ˖ ✦ ¸ . ﹢ ° ¸. ° ˖ ･ ·̩ ｡ ☆ ﾟ ＊',
  '```',
].join('\n');
