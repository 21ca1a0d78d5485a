import { Client, Events, GatewayIntentBits } from 'discord.js';
import type { ChannelPlugin } from './types.js';
import { MissingCredentialError, structuredLog } from '../error-utils.js';

const COMPONENT = 'discord-gateway';

export interface DiscordGatewayChannelConfig {
  /** Bot token for the gateway session */
  token: string | null;
  /** How long to wait for the ready event after login (default: 30000) */
  readyTimeoutMs?: number;
}

/**
 * Discord Gateway channel: stateful bot session via discord.js.
 *
 * initialize() logs in and waits for the ready event, so a rejected token
 * surfaces before anything is sent. destroy() closes the session.
 */
export class DiscordGatewayChannel implements ChannelPlugin {
  readonly name = 'discord-gateway';
  private config: DiscordGatewayChannelConfig;
  private client: Client | null = null;

  constructor(config: DiscordGatewayChannelConfig) {
    this.config = config;
  }

  async initialize(): Promise<void> {
    const token = this.config.token;
    if (!token) {
      throw new MissingCredentialError('BOT_TOKEN', 'bot session delivery');
    }

    const client = new Client({ intents: [GatewayIntentBits.Guilds] });
    this.client = client;

    const readyTimeoutMs = this.config.readyTimeoutMs ?? 30_000;
    let timer: NodeJS.Timeout | undefined;
    const ready = new Promise<void>((resolve, reject) => {
      timer = setTimeout(() => reject(new Error(`Discord session not ready: timed out after ${readyTimeoutMs}ms`)), readyTimeoutMs);
      client.once(Events.ClientReady, () => resolve());
    });

    try {
      await Promise.all([ready, client.login(token)]);
    } catch (err) {
      await this.destroy();
      throw err;
    } finally {
      clearTimeout(timer);
    }

    structuredLog('info', COMPONENT, 'session_ready', { user: client.user?.tag });
  }

  async sendMessage(channelId: string, content: string): Promise<void> {
    const client = this.client;
    if (!client) {
      throw new Error('Discord session is not initialized');
    }

    const channel = client.channels.cache.get(channelId) ?? await client.channels.fetch(channelId);
    if (!channel) {
      throw new Error(`Discord channel ${channelId} not found`);
    }
    if (!channel.isSendable()) {
      throw new Error(`Discord channel ${channelId} does not accept messages`);
    }
    await channel.send(content);
  }

  async destroy(): Promise<void> {
    const client = this.client;
    this.client = null;
    if (client) {
      await client.destroy();
    }
  }
}
