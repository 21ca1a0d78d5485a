import { describe, it, expect, vi, beforeEach } from 'vitest';
import { DiscordRestChannel } from '../channels/discord-rest.js';
import { DiscordGatewayChannel } from '../channels/discord-gateway.js';
import { DiscordApiError, MissingCredentialError } from '../error-utils.js';

const mockFetch = vi.fn();
vi.stubGlobal('fetch', mockFetch);

const gateway = vi.hoisted(() => {
  const intents: unknown[] = [];
  return {
    login: vi.fn(),
    destroy: vi.fn(),
    fetchChannel: vi.fn(),
    cached: new Map<string, unknown>(),
    intents,
  };
});

vi.mock('discord.js', async () => {
  const { EventEmitter } = await import('node:events');

  class Client extends EventEmitter {
    channels = { cache: gateway.cached, fetch: gateway.fetchChannel };
    user = { tag: 'digest-bot#0001' };

    constructor(options: { intents: unknown[] }) {
      super();
      gateway.intents.push(...options.intents);
    }

    async login(token: string): Promise<string> {
      const result: string = await gateway.login(token);
      this.emit('ready', this);
      return result;
    }

    async destroy(): Promise<void> {
      await gateway.destroy();
    }
  }

  return { Client, Events: { ClientReady: 'ready' }, GatewayIntentBits: { Guilds: 1 } };
});

describe('DiscordRestChannel', () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  it('should refuse to initialize without a token', async () => {
    const channel = new DiscordRestChannel({ credential: null });
    await expect(channel.initialize()).rejects.toThrow(MissingCredentialError);
  });

  it('should post a fragment to the channel messages endpoint', async () => {
    mockFetch.mockResolvedValueOnce({ ok: true, status: 200 });
    const channel = new DiscordRestChannel({ credential: { token: 'test-token', scheme: 'Bot' } });
    await channel.initialize();

    await channel.sendMessage('900', 'Hello digest');

    expect(mockFetch).toHaveBeenCalledWith(
      'https://discord.com/api/v10/channels/900/messages',
      expect.objectContaining({
        method: 'POST',
        headers: { Authorization: 'Bot test-token', 'Content-Type': 'application/json' },
      }),
    );
    const body = JSON.parse(mockFetch.mock.calls[0][1].body);
    expect(body).toEqual({ content: 'Hello digest' });
    expect(mockFetch.mock.calls[0][1].signal).toBeInstanceOf(AbortSignal);
  });

  it('should use the configured API base and scheme', async () => {
    mockFetch.mockResolvedValueOnce({ ok: true, status: 200 });
    const channel = new DiscordRestChannel({
      credential: { token: 'test-token', scheme: 'Bearer' },
      apiBase: 'http://127.0.0.1:9999/api',
    });

    await channel.sendMessage('900', 'Hi');

    expect(mockFetch.mock.calls[0][0]).toBe('http://127.0.0.1:9999/api/channels/900/messages');
    expect(mockFetch.mock.calls[0][1].headers.Authorization).toBe('Bearer test-token');
  });

  it('should reject a non-success response with its status', async () => {
    const cancel = vi.fn(async () => {});
    mockFetch.mockResolvedValueOnce({ ok: false, status: 403, body: { cancel } });
    const channel = new DiscordRestChannel({ credential: { token: 'test-token', scheme: 'Bot' } });

    const error = await channel.sendMessage('900', 'Hi').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(DiscordApiError);
    expect(error).toHaveProperty('status', 403);
    expect(cancel).toHaveBeenCalledTimes(1);
  });

  it('should reject fragments over the message limit without a request', async () => {
    const channel = new DiscordRestChannel({ credential: { token: 'test-token', scheme: 'Bot' } });

    await expect(channel.sendMessage('900', 'x'.repeat(2001))).rejects.toThrow(RangeError);
    expect(mockFetch).not.toHaveBeenCalled();
  });
});

describe('DiscordGatewayChannel', () => {
  beforeEach(() => {
    gateway.login.mockReset();
    gateway.destroy.mockReset();
    gateway.fetchChannel.mockReset();
    gateway.cached.clear();
    gateway.intents.length = 0;
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  it('should refuse to initialize without a bot token', async () => {
    const channel = new DiscordGatewayChannel({ token: null });
    await expect(channel.initialize()).rejects.toThrow(MissingCredentialError);
    expect(gateway.login).not.toHaveBeenCalled();
  });

  it('should log in with the guilds intent and wait for ready', async () => {
    gateway.login.mockResolvedValueOnce('test-bot');
    const channel = new DiscordGatewayChannel({ token: 'test-bot' });

    await channel.initialize();

    expect(gateway.login).toHaveBeenCalledWith('test-bot');
    expect(gateway.intents).toEqual([1]);
  });

  it('should close the session when login is rejected', async () => {
    gateway.login.mockRejectedValueOnce(new Error('An invalid token was provided.'));
    const channel = new DiscordGatewayChannel({ token: 'test-bot' });

    await expect(channel.initialize()).rejects.toThrow('An invalid token was provided.');
    expect(gateway.destroy).toHaveBeenCalledTimes(1);
    await expect(channel.sendMessage('900', 'Hi')).rejects.toThrow('Discord session is not initialized');
  });

  it('should send through a cached channel', async () => {
    gateway.login.mockResolvedValueOnce('test-bot');
    const send = vi.fn(async () => ({}));
    gateway.cached.set('900', { isSendable: () => true, send });
    const channel = new DiscordGatewayChannel({ token: 'test-bot' });
    await channel.initialize();

    await channel.sendMessage('900', 'Digest part 1');

    expect(send).toHaveBeenCalledWith('Digest part 1');
    expect(gateway.fetchChannel).not.toHaveBeenCalled();
  });

  it('should fetch a channel missing from the cache', async () => {
    gateway.login.mockResolvedValueOnce('test-bot');
    const send = vi.fn(async () => ({}));
    gateway.fetchChannel.mockResolvedValueOnce({ isSendable: () => true, send });
    const channel = new DiscordGatewayChannel({ token: 'test-bot' });
    await channel.initialize();

    await channel.sendMessage('901', 'Digest part 2');

    expect(gateway.fetchChannel).toHaveBeenCalledWith('901');
    expect(send).toHaveBeenCalledWith('Digest part 2');
  });

  it('should reject channels that do not accept messages', async () => {
    gateway.login.mockResolvedValueOnce('test-bot');
    gateway.cached.set('902', { isSendable: () => false, send: vi.fn() });
    gateway.fetchChannel.mockResolvedValueOnce(null);
    const channel = new DiscordGatewayChannel({ token: 'test-bot' });
    await channel.initialize();

    await expect(channel.sendMessage('902', 'Hi')).rejects.toThrow('Discord channel 902 does not accept messages');
    await expect(channel.sendMessage('903', 'Hi')).rejects.toThrow('Discord channel 903 not found');
  });

  it('should destroy the client once', async () => {
    gateway.login.mockResolvedValueOnce('test-bot');
    const channel = new DiscordGatewayChannel({ token: 'test-bot' });
    await channel.initialize();

    await channel.destroy();
    await channel.destroy();

    expect(gateway.destroy).toHaveBeenCalledTimes(1);
  });
});
