// Types
export type {
  TokenScheme,
  RunMode,
  DiscordCredential,
  ProfileConfig,
  DigestorConfig,
  Credentials,
  RunOverrides,
  RunConfig,
} from './types.js';

// Config
export {
  DEFAULT_CONFIG,
  loadConfig,
  loadCredentials,
  saveCredentials,
  ensureConfigDir,
  resolveConfigDir,
  resolveRunConfig,
  loadRunConfig,
  collectWarnings,
  envPrefix,
  parseChannelIds,
  type ResolveOptions,
} from './config.js';

// Errors & logging
export {
  DigestorError,
  MissingCredentialError,
  ConfigError,
  DiscordApiError,
  classifyError,
  structuredLog,
  logError,
  type ErrorCategory,
  type ClassifiedError,
  type LogLevel,
} from './error-utils.js';

// Fetcher
export {
  computeCutoff,
  parseTimestamp,
  fetchChannelInfo,
  fetchChannelHistory,
  fetchTranscript,
  buildTranscriptText,
  type FetchOptions,
} from './history/fetcher.js';

// Summarizer
export { Summarizer, loadPrompt, suppressLinkPreviews, DEFAULT_PROMPT, type SummarizerConfig } from './summarizer.js';

// Chunker & digest
export { splitMessage, type SplitOptions } from './chunker.js';
export { composeDigest, formatHeader, toBlockQuote, type ComposeOptions } from './digest.js';

// Transports
export type { ChannelPlugin } from './channels/types.js';
export { DiscordGatewayChannel, type DiscordGatewayChannelConfig } from './channels/discord-gateway.js';
export { DiscordRestChannel, type DiscordRestChannelConfig } from './channels/discord-rest.js';

// Pipeline
export {
  runDigest,
  createPipelineDeps,
  formatDebugTranscript,
  type RunReport,
  type RunStage,
  type RunStatus,
  type FailureReason,
  type PipelineDeps,
  type DigestSummarizer,
  type TranscriptFetcher,
} from './pipeline.js';
