import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, statSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  DEFAULT_CONFIG,
  collectWarnings,
  envPrefix,
  loadConfig,
  loadRunConfig,
  parseChannelIds,
  resolveRunConfig,
  saveCredentials,
} from '../config.js';
import { ConfigError, MissingCredentialError } from '../error-utils.js';

const FULL_ENV = {
  NEWS_CHANNEL_IDS: '100, 200',
  NEWS_OUTPUT_CHANNEL_ID: '900',
  BOT_TOKEN: 'test-bot',
  DISCORD_TOKEN: 'test-reader',
  OPENROUTER_API_KEY: 'test-key',
};

function problemsOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigError) return err.problems;
    throw err;
  }
  throw new Error('expected a ConfigError');
}

describe('envPrefix / parseChannelIds', () => {
  it('maps a label to its variable prefix', () => {
    expect(envPrefix('news')).toBe('NEWS');
    expect(envPrefix('my-feed')).toBe('MY_FEED');
  });

  it('splits, trims and drops empty ids', () => {
    expect(parseChannelIds(' 100 ,200,, 300 ')).toEqual(['100', '200', '300']);
    expect(parseChannelIds('')).toEqual([]);
  });
});

describe('resolveRunConfig', () => {
  it('resolves a label from the environment with defaults', () => {
    const config = resolveRunConfig('news', { env: FULL_ENV });

    expect(config).toMatchObject({
      label: 'news',
      mode: 'deliver',
      hours: 12,
      maxPages: 50,
      channelIds: ['100', '200'],
      outputChannelId: '900',
      model: 'google/gemini-2.0-flash-001',
      format: 'plain',
      footer: true,
      reader: { token: 'test-reader', scheme: 'Bot' },
      botToken: 'test-bot',
      openrouterApiKey: 'test-key',
    });
    expect(config.promptDir).toBe(DEFAULT_CONFIG.promptDir);
  });

  it('returns a frozen configuration', () => {
    const config = resolveRunConfig('news', { env: FULL_ENV });

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.channelIds)).toBe(true);
    expect(Object.isFrozen(config.reader)).toBe(true);
  });

  it('reads dashed labels from underscored variables', () => {
    const config = resolveRunConfig('my-feed', {
      env: { ...FULL_ENV, MY_FEED_CHANNEL_IDS: '300', MY_FEED_OUTPUT_CHANNEL_ID: '901' },
    });

    expect(config.channelIds).toEqual(['300']);
    expect(config.outputChannelId).toBe('901');
  });

  it('prefers overrides, then the environment, then config files', () => {
    const fileConfig = { ...DEFAULT_CONFIG, hours: 48, maxPages: 5 };

    expect(resolveRunConfig('news', { config: fileConfig, env: FULL_ENV }).hours).toBe(48);
    expect(resolveRunConfig('news', { config: fileConfig, env: { ...FULL_ENV, DIGESTOR_HOURS: '24' } }).hours).toBe(24);
    expect(
      resolveRunConfig('news', {
        config: fileConfig,
        env: { ...FULL_ENV, DIGESTOR_HOURS: '24' },
        overrides: { hours: 6, maxPages: 2, format: 'quote', promptDir: '/srv/prompts' },
      }),
    ).toMatchObject({ hours: 6, maxPages: 2, format: 'quote', promptDir: '/srv/prompts' });
  });

  it('falls back to the stored profile when the environment has no channels', () => {
    const fileConfig = {
      ...DEFAULT_CONFIG,
      profiles: { news: { channelIds: ['400', '500'], outputChannelId: '902' } },
    };

    const config = resolveRunConfig('news', {
      config: fileConfig,
      env: { BOT_TOKEN: 'test-bot', OPENROUTER_API_KEY: 'test-key' },
    });

    expect(config.channelIds).toEqual(['400', '500']);
    expect(config.outputChannelId).toBe('902');
  });

  it('takes credentials from the credentials file when the environment has none', () => {
    const config = resolveRunConfig('news', {
      env: { NEWS_CHANNEL_IDS: '100', NEWS_OUTPUT_CHANNEL_ID: '900' },
      credentials: { readerToken: 'file-reader', openrouterApiKey: 'file-key', tokenScheme: 'Bearer' },
    });

    expect(config.reader).toEqual({ token: 'file-reader', scheme: 'Bearer' });
    expect(config.openrouterApiKey).toBe('file-key');
    expect(config.botToken).toBeNull();
  });

  it('collects every configuration problem before failing', () => {
    expect(problemsOf(() => resolveRunConfig('news', { env: { OPENROUTER_API_KEY: 'test-key' } }))).toEqual([
      'NEWS_CHANNEL_IDS is missing',
      'NEWS_OUTPUT_CHANNEL_ID is missing',
    ]);
  });

  it('rejects malformed ids, labels, windows and schemes', () => {
    expect(problemsOf(() => resolveRunConfig('News!', {
      env: {
        ...FULL_ENV,
        'NEWS!_CHANNEL_IDS': '100,abc',
        'NEWS!_OUTPUT_CHANNEL_ID': '0',
        DIGESTOR_HOURS: 'soon',
        DISCORD_TOKEN_SCHEME: 'User',
      },
    }))).toEqual([
      'config label "News!" must match ^[a-z0-9][a-z0-9_-]*$',
      'NEWS!_CHANNEL_IDS contains invalid ids: abc',
      'NEWS!_OUTPUT_CHANNEL_ID is missing',
      'hours must be a positive integer (got NaN)',
      'DISCORD_TOKEN_SCHEME must be Bot or Bearer (got User)',
    ]);
  });

  it('rejects an output channel that is not an id', () => {
    expect(problemsOf(() => resolveRunConfig('news', {
      env: { ...FULL_ENV, NEWS_OUTPUT_CHANNEL_ID: '#general' },
    }))).toEqual(['NEWS_OUTPUT_CHANNEL_ID is not a channel id: #general']);
  });

  it('requires the OpenRouter key unless debugging', () => {
    const env = { ...FULL_ENV, OPENROUTER_API_KEY: '' };

    expect(() => resolveRunConfig('news', { env })).toThrow(MissingCredentialError);
    expect(() => resolveRunConfig('news', { env, overrides: { mode: 'dry-run' } })).toThrow(MissingCredentialError);
    expect(resolveRunConfig('news', { env, overrides: { mode: 'debug' } }).openrouterApiKey).toBeNull();
  });

  it('requires at least one delivery credential only when delivering', () => {
    const env = { NEWS_CHANNEL_IDS: '100', NEWS_OUTPUT_CHANNEL_ID: '900', OPENROUTER_API_KEY: 'test-key' };

    try {
      resolveRunConfig('news', { env });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(MissingCredentialError);
      expect(err).toHaveProperty('credential', 'BOT_TOKEN or DISCORD_TOKEN');
    }
    expect(resolveRunConfig('news', { env, overrides: { mode: 'dry-run' } }).reader).toBeNull();
  });
});

describe('collectWarnings', () => {
  it('reports missing transport credentials', () => {
    const botOnly = resolveRunConfig('news', { env: { ...FULL_ENV, DISCORD_TOKEN: '' } });
    const readerOnly = resolveRunConfig('news', { env: { ...FULL_ENV, BOT_TOKEN: '' } });

    expect(collectWarnings(botOnly)).toEqual([
      'DISCORD_TOKEN not set: channel history cannot be read and the REST fallback is disabled',
    ]);
    expect(collectWarnings(readerOnly)).toEqual(['BOT_TOKEN not set: delivery uses the REST fallback only']);
    expect(collectWarnings(resolveRunConfig('news', { env: FULL_ENV }))).toEqual([]);
  });
});

describe('config files', () => {
  let configDir: string;

  beforeEach(() => {
    configDir = mkdtempSync(join(tmpdir(), 'digestor-config-'));
  });

  afterEach(() => {
    rmSync(configDir, { recursive: true, force: true });
  });

  it('uses defaults when no config file exists', async () => {
    const config = await loadConfig(configDir);

    expect(config).toEqual({
      ...DEFAULT_CONFIG,
      configDir,
      promptDir: join(configDir, 'prompts'),
    });
  });

  it('resolves a run from config.json and credentials.json', async () => {
    writeFileSync(join(configDir, 'config.json'), JSON.stringify({
      hours: 6,
      delivery: { format: 'quote', footer: false },
      profiles: { news: { channelIds: ['100'], outputChannelId: '900' } },
    }));
    writeFileSync(join(configDir, 'credentials.json'), JSON.stringify({
      readerToken: 'test-reader',
      tokenScheme: 'Bearer',
      openrouterApiKey: 'test-key',
    }));

    const config = await loadRunConfig('news', {}, {}, configDir);

    expect(config).toMatchObject({
      channelIds: ['100'],
      outputChannelId: '900',
      hours: 6,
      format: 'quote',
      footer: false,
      promptDir: join(configDir, 'prompts'),
      reader: { token: 'test-reader', scheme: 'Bearer' },
      botToken: null,
    });
  });

  it('ignores fields of the wrong type', async () => {
    writeFileSync(join(configDir, 'config.json'), JSON.stringify({ hours: '6', model: 42, delivery: { format: 'fancy' } }));

    const config = await loadConfig(configDir);

    expect(config.hours).toBe(12);
    expect(config.model).toBe('google/gemini-2.0-flash-001');
    expect(config.delivery.format).toBe('plain');
  });

  it('writes credentials readable only by the owner', async () => {
    await saveCredentials({ botToken: 'test-bot' }, configDir);

    expect(statSync(join(configDir, 'credentials.json')).mode & 0o777).toBe(0o600);
  });
});
