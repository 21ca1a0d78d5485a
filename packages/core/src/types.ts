import type { DeliveryFormat } from '@digestor/protocol';

export type TokenScheme = 'Bot' | 'Bearer';

export type RunMode = 'deliver' | 'debug' | 'dry-run';

/** Token plus the Authorization scheme it is sent with */
export interface DiscordCredential {
  token: string;
  scheme: TokenScheme;
}

/** Per-label channel setup stored in config.json */
export interface ProfileConfig {
  channelIds?: string[];
  outputChannelId?: string;
}

/** ~/.digestor/config.json */
export interface DigestorConfig {
  configDir: string;
  model: string;
  hours: number;
  maxPages: number;
  promptDir: string;
  delivery: {
    format: DeliveryFormat;
    footer: boolean;
  };
  profiles: Record<string, ProfileConfig>;
}

/** ~/.digestor/credentials.json */
export interface Credentials {
  /** Reads channel history; also authenticates the REST fallback */
  readerToken?: string;
  /** Bot session used by the primary transport */
  botToken?: string;
  openrouterApiKey?: string;
  tokenScheme?: TokenScheme;
}

/** Command-line overrides, highest precedence */
export interface RunOverrides {
  hours?: number;
  format?: DeliveryFormat;
  maxPages?: number;
  promptDir?: string;
  mode?: RunMode;
}

/** Fully resolved, frozen configuration for one run */
export interface RunConfig {
  readonly label: string;
  readonly mode: RunMode;
  readonly hours: number;
  readonly maxPages: number;
  readonly channelIds: readonly string[];
  readonly outputChannelId: string;
  readonly model: string;
  readonly promptDir: string;
  readonly format: DeliveryFormat;
  readonly footer: boolean;
  readonly reader: Readonly<DiscordCredential> | null;
  readonly botToken: string | null;
  readonly openrouterApiKey: string | null;
}
