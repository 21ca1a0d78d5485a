import type { DiscordChannelPayload, DiscordMessagePayload } from '@digestor/protocol';
import type { DiscordCredential } from './types.js';
import { isRecord } from './utils/guards.js';

export function formatAuthorization(credential: DiscordCredential): string {
  return `${credential.scheme} ${credential.token}`;
}

export function discordHeaders(credential: DiscordCredential): Record<string, string> {
  return {
    Authorization: formatAuthorization(credential),
    'Content-Type': 'application/json',
  };
}

export function isMessagePayload(value: unknown): value is DiscordMessagePayload {
  return isRecord(value) && typeof value.id === 'string';
}

export function isChannelPayload(value: unknown): value is DiscordChannelPayload {
  return isRecord(value);
}
