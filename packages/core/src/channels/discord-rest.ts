import { DISCORD_API_BASE, DISCORD_MESSAGE_LIMIT, REST_SEND_TIMEOUT_MS } from '@digestor/protocol';
import type { ChannelPlugin } from './types.js';
import type { DiscordCredential } from '../types.js';
import { DiscordApiError, MissingCredentialError } from '../error-utils.js';
import { discordHeaders } from '../discord-api.js';

export interface DiscordRestChannelConfig {
  credential: DiscordCredential | null;
  apiBase?: string;
  timeoutMs?: number;
}

/**
 * Discord REST channel: stateless delivery via the channel messages API.
 *
 * Each send is an independent authenticated POST (fetch-based, no SDK
 * dependency), so there is no session to open or tear down.
 */
export class DiscordRestChannel implements ChannelPlugin {
  readonly name = 'discord-rest';
  private config: DiscordRestChannelConfig;

  constructor(config: DiscordRestChannelConfig) {
    this.config = config;
  }

  async initialize(): Promise<void> {
    if (!this.config.credential?.token) {
      throw new MissingCredentialError('DISCORD_TOKEN', 'REST delivery');
    }
  }

  async sendMessage(channelId: string, content: string): Promise<void> {
    const credential = this.config.credential;
    if (!credential?.token) {
      throw new MissingCredentialError('DISCORD_TOKEN', 'REST delivery');
    }
    if (content.length > DISCORD_MESSAGE_LIMIT) {
      throw new RangeError(`Message exceeds ${DISCORD_MESSAGE_LIMIT} characters (${content.length})`);
    }

    const endpoint = `/channels/${channelId}/messages`;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.timeoutMs ?? REST_SEND_TIMEOUT_MS);

    try {
      const res = await fetch(`${this.config.apiBase ?? DISCORD_API_BASE}${endpoint}`, {
        method: 'POST',
        headers: discordHeaders(credential),
        body: JSON.stringify({ content }),
        signal: controller.signal,
      });

      if (!res.ok) {
        await res.body?.cancel();
        throw new DiscordApiError(res.status, endpoint);
      }
    } finally {
      clearTimeout(timeout);
    }
  }

  async destroy(): Promise<void> {
    // Stateless HTTP, nothing to clean up
  }
}
