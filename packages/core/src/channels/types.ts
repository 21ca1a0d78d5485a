/**
 * Channel Plugin Interface: abstracts a delivery transport to the
 * output channel (stateful bot session, stateless REST call, ...)
 */
export interface ChannelPlugin {
  /** Unique transport name */
  readonly name: string;

  /** Connect or verify credentials; throws when the transport is unusable */
  initialize(): Promise<void>;

  /** Send one fragment to a channel; throws on failure */
  sendMessage(channelId: string, content: string): Promise<void>;

  /** Destroy the transport (disconnect, cleanup) */
  destroy(): Promise<void>;
}
