import { readFile, writeFile, mkdir } from 'fs/promises';
import { join } from 'path';
import { homedir } from 'os';
import { DEFAULT_HOURS, DEFAULT_MAX_PAGES, DEFAULT_MODEL, type DeliveryFormat } from '@digestor/protocol';
import type {
  DigestorConfig,
  Credentials,
  ProfileConfig,
  RunConfig,
  RunOverrides,
  TokenScheme,
} from './types.js';
import { ConfigError, MissingCredentialError } from './error-utils.js';
import { isRecord } from './utils/guards.js';

const DEFAULT_CONFIG_DIR = join(homedir(), '.digestor');
const LABEL_PATTERN = /^[a-z0-9][a-z0-9_-]*$/;
const SNOWFLAKE_PATTERN = /^\d+$/;

export const DEFAULT_CONFIG: DigestorConfig = {
  configDir: DEFAULT_CONFIG_DIR,
  model: DEFAULT_MODEL,
  hours: DEFAULT_HOURS,
  maxPages: DEFAULT_MAX_PAGES,
  promptDir: join(DEFAULT_CONFIG_DIR, 'prompts'),
  delivery: {
    format: 'plain',
    footer: true,
  },
  profiles: {},
};

export function resolveConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.DIGESTOR_CONFIG_DIR || DEFAULT_CONFIG_DIR;
}

export async function ensureConfigDir(configDir: string = DEFAULT_CONFIG_DIR): Promise<void> {
  await mkdir(configDir, { recursive: true });
}

async function readJsonRecord(path: string): Promise<Record<string, unknown>> {
  try {
    const parsed: unknown = JSON.parse(await readFile(path, 'utf-8'));
    return isRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function isDeliveryFormat(value: unknown): value is DeliveryFormat {
  return value === 'plain' || value === 'quote';
}

function isTokenScheme(value: unknown): value is TokenScheme {
  return value === 'Bot' || value === 'Bearer';
}

function readProfiles(value: unknown): Record<string, ProfileConfig> {
  if (!isRecord(value)) return {};
  const profiles: Record<string, ProfileConfig> = {};
  for (const [label, raw] of Object.entries(value)) {
    if (!isRecord(raw)) continue;
    const channelIds = Array.isArray(raw.channelIds)
      ? raw.channelIds.map(id => String(id))
      : undefined;
    const outputChannelId = raw.outputChannelId === undefined ? undefined : String(raw.outputChannelId);
    profiles[label] = { channelIds, outputChannelId };
  }
  return profiles;
}

export async function loadConfig(configDir: string = DEFAULT_CONFIG_DIR): Promise<DigestorConfig> {
  const user = await readJsonRecord(join(configDir, 'config.json'));
  const delivery = isRecord(user.delivery) ? user.delivery : {};

  return {
    configDir,
    model: optionalString(user.model) ?? DEFAULT_CONFIG.model,
    hours: optionalNumber(user.hours) ?? DEFAULT_CONFIG.hours,
    maxPages: optionalNumber(user.maxPages) ?? DEFAULT_CONFIG.maxPages,
    promptDir: optionalString(user.promptDir) ?? join(configDir, 'prompts'),
    delivery: {
      format: isDeliveryFormat(delivery.format) ? delivery.format : DEFAULT_CONFIG.delivery.format,
      footer: typeof delivery.footer === 'boolean' ? delivery.footer : DEFAULT_CONFIG.delivery.footer,
    },
    profiles: readProfiles(user.profiles),
  };
}

export async function loadCredentials(configDir: string = DEFAULT_CONFIG_DIR): Promise<Credentials> {
  const raw = await readJsonRecord(join(configDir, 'credentials.json'));
  return {
    readerToken: optionalString(raw.readerToken),
    botToken: optionalString(raw.botToken),
    openrouterApiKey: optionalString(raw.openrouterApiKey),
    tokenScheme: isTokenScheme(raw.tokenScheme) ? raw.tokenScheme : undefined,
  };
}

export async function saveCredentials(creds: Credentials, configDir: string = DEFAULT_CONFIG_DIR): Promise<void> {
  await ensureConfigDir(configDir);
  const credPath = join(configDir, 'credentials.json');
  await writeFile(credPath, JSON.stringify(creds, null, 2), { mode: 0o600 });
}

/** Environment variable prefix for a config label: `my-feed` → `MY_FEED` */
export function envPrefix(label: string): string {
  return label.toUpperCase().replace(/-/g, '_');
}

export function parseChannelIds(raw: string): string[] {
  return raw.split(',').map(id => id.trim()).filter(Boolean);
}

function parseEnvInteger(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  return Number(raw);
}

export interface ResolveOptions {
  config?: DigestorConfig;
  credentials?: Credentials;
  env?: NodeJS.ProcessEnv;
  overrides?: RunOverrides;
}

/**
 * Build the immutable configuration for one run.
 * Priority: overrides > env vars > config files > defaults.
 */
export function resolveRunConfig(label: string, options: ResolveOptions = {}): RunConfig {
  const config = options.config ?? DEFAULT_CONFIG;
  const creds = options.credentials ?? {};
  const env = options.env ?? process.env;
  const overrides = options.overrides ?? {};
  const problems: string[] = [];

  if (!LABEL_PATTERN.test(label)) {
    problems.push(`config label "${label}" must match ${LABEL_PATTERN.source}`);
  }

  const prefix = envPrefix(label);
  const profile = config.profiles[label] ?? {};
  const mode = overrides.mode ?? 'deliver';

  const envChannels = env[`${prefix}_CHANNEL_IDS`];
  const channelIds = envChannels !== undefined ? parseChannelIds(envChannels) : profile.channelIds ?? [];
  if (channelIds.length === 0) {
    problems.push(`${prefix}_CHANNEL_IDS is missing`);
  }
  const invalidIds = channelIds.filter(id => !SNOWFLAKE_PATTERN.test(id));
  if (invalidIds.length > 0) {
    problems.push(`${prefix}_CHANNEL_IDS contains invalid ids: ${invalidIds.join(', ')}`);
  }

  const outputChannelId = (env[`${prefix}_OUTPUT_CHANNEL_ID`] ?? profile.outputChannelId ?? '').trim();
  if (!outputChannelId || outputChannelId === '0') {
    problems.push(`${prefix}_OUTPUT_CHANNEL_ID is missing`);
  } else if (!SNOWFLAKE_PATTERN.test(outputChannelId)) {
    problems.push(`${prefix}_OUTPUT_CHANNEL_ID is not a channel id: ${outputChannelId}`);
  }

  const hours = overrides.hours ?? parseEnvInteger(env.DIGESTOR_HOURS) ?? config.hours;
  if (!Number.isInteger(hours) || hours <= 0) {
    problems.push(`hours must be a positive integer (got ${hours})`);
  }

  const maxPages = overrides.maxPages ?? config.maxPages;
  if (!Number.isInteger(maxPages) || maxPages <= 0) {
    problems.push(`max pages must be a positive integer (got ${maxPages})`);
  }

  const rawScheme = env.DISCORD_TOKEN_SCHEME ?? creds.tokenScheme ?? 'Bot';
  if (!isTokenScheme(rawScheme)) {
    problems.push(`DISCORD_TOKEN_SCHEME must be Bot or Bearer (got ${rawScheme})`);
  }

  if (problems.length > 0) {
    throw new ConfigError(problems);
  }

  const readerToken = env.DISCORD_TOKEN || creds.readerToken || null;
  const botToken = env.BOT_TOKEN || creds.botToken || null;
  const openrouterApiKey = env.OPENROUTER_API_KEY || creds.openrouterApiKey || null;

  if (mode !== 'debug' && !openrouterApiKey) {
    throw new MissingCredentialError('OPENROUTER_API_KEY', 'summarization');
  }
  if (mode === 'deliver' && !botToken && !readerToken) {
    throw new MissingCredentialError('BOT_TOKEN or DISCORD_TOKEN', 'delivery');
  }

  const reader = readerToken && isTokenScheme(rawScheme)
    ? Object.freeze({ token: readerToken, scheme: rawScheme })
    : null;

  return Object.freeze({
    label,
    mode,
    hours,
    maxPages,
    channelIds: Object.freeze([...channelIds]),
    outputChannelId,
    model: env.DIGESTOR_MODEL || config.model,
    promptDir: overrides.promptDir ?? (env.DIGESTOR_PROMPT_DIR || config.promptDir),
    format: overrides.format ?? config.delivery.format,
    footer: config.delivery.footer,
    reader,
    botToken,
    openrouterApiKey,
  });
}

/** Non-fatal gaps in a resolved configuration */
export function collectWarnings(config: RunConfig): string[] {
  const warnings: string[] = [];
  if (!config.reader) {
    warnings.push('DISCORD_TOKEN not set: channel history cannot be read and the REST fallback is disabled');
  }
  if (config.mode === 'deliver' && !config.botToken) {
    warnings.push('BOT_TOKEN not set: delivery uses the REST fallback only');
  }
  return warnings;
}

/** Load config files for `configDir` and resolve them against the environment */
export async function loadRunConfig(
  label: string,
  overrides: RunOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
  configDir: string = resolveConfigDir(env),
): Promise<RunConfig> {
  const [config, credentials] = await Promise.all([loadConfig(configDir), loadCredentials(configDir)]);
  return resolveRunConfig(label, { config, credentials, env, overrides });
}
