import { DISCORD_MESSAGE_LIMIT, SEND_PACING_MS, type AggregatedTranscript } from '@digestor/protocol';
import type { RunConfig } from './types.js';
import type { ChannelPlugin } from './channels/types.js';
import { DiscordGatewayChannel } from './channels/discord-gateway.js';
import { DiscordRestChannel } from './channels/discord-rest.js';
import { fetchTranscript, buildTranscriptText, type FetchOptions } from './history/fetcher.js';
import { Summarizer } from './summarizer.js';
import { composeDigest } from './digest.js';
import { splitMessage } from './chunker.js';
import { MissingCredentialError, logError, structuredLog } from './error-utils.js';
import { sleep as defaultSleep, type Sleep } from './utils/sleep.js';

const COMPONENT = 'pipeline';

export type RunStage =
  | 'START'
  | 'FETCH'
  | 'SUMMARIZE'
  | 'CHUNK'
  | 'SEND_PRIMARY'
  | 'SEND_FALLBACK'
  | 'SUCCESS'
  | 'FAILURE';

export type RunStatus = 'empty' | 'debug' | 'dry-run' | 'delivered' | 'failed';

export type FailureReason = 'no_transport' | 'partial';

export interface RunReport {
  status: RunStatus;
  transport?: 'primary' | 'fallback';
  reason?: FailureReason;
  /** Fragments produced for delivery */
  fragments: number;
  /** Fragments accepted by the last transport attempted */
  sent: number;
  failed: number;
  totalMessages: number;
  channelNames: string[];
}

export interface DigestSummarizer {
  summarize(transcriptText: string, label: string): Promise<string>;
}

export type TranscriptFetcher = typeof fetchTranscript;

export interface PipelineDeps {
  summarizer: DigestSummarizer | null;
  /** Stateful session transport, tried first */
  primary: ChannelPlugin | null;
  /** Stateless transport, used when the primary is unavailable or incomplete */
  fallback: ChannelPlugin | null;
  fetchTranscript?: TranscriptFetcher;
  fetchOptions?: FetchOptions;
  sleep?: Sleep;
  pacingMs?: number;
  maxLength?: number;
  /** Sink for debug and dry-run output */
  output?: (text: string) => void;
}

/** Wire the default transports and summarizer for a resolved configuration */
export function createPipelineDeps(config: RunConfig): PipelineDeps {
  const needsSummary = config.mode !== 'debug';
  return {
    summarizer: needsSummary
      ? new Summarizer({ apiKey: config.openrouterApiKey, model: config.model, promptDir: config.promptDir })
      : null,
    primary: config.botToken ? new DiscordGatewayChannel({ token: config.botToken }) : null,
    fallback: config.reader ? new DiscordRestChannel({ credential: config.reader }) : null,
  };
}

export function formatDebugTranscript(label: string, transcript: AggregatedTranscript, text: string): string {
  const rule = '='.repeat(50);
  return [
    rule,
    `AGGREGATED CONVERSATION (${label}) - ${transcript.totalMessages} messages`,
    [...transcript.channelNames.values()].join(', '),
    rule,
    text.trimEnd(),
    rule,
  ].join('\n');
}

async function initializeTransport(transport: ChannelPlugin | null, role: 'primary' | 'fallback'): Promise<boolean> {
  if (!transport) {
    structuredLog('warn', COMPONENT, 'transport_unconfigured', { role });
    return false;
  }
  try {
    await transport.initialize();
    return true;
  } catch (err) {
    logError('warn', COMPONENT, 'transport_unavailable', err, { role, transport: transport.name });
    return false;
  }
}

/**
 * Send every fragment in order with a pacing delay between sends.
 * A failed fragment is logged and the rest are still attempted.
 */
async function sendAll(
  transport: ChannelPlugin,
  channelId: string,
  fragments: readonly string[],
  wait: Sleep,
  pacingMs: number,
): Promise<number> {
  let sent = 0;
  for (const [index, fragment] of fragments.entries()) {
    if (index > 0) await wait(pacingMs);
    try {
      await transport.sendMessage(channelId, fragment);
      sent++;
    } catch (err) {
      logError('warn', COMPONENT, 'fragment_failed', err, {
        transport: transport.name,
        fragment: index + 1,
        of: fragments.length,
      });
    }
  }
  return sent;
}

/**
 * One digest run:
 * START → FETCH → SUMMARIZE → CHUNK → SEND_PRIMARY → (SUCCESS | SEND_FALLBACK → (SUCCESS | FAILURE))
 *
 * The primary session is opened first and closed when the run ends. Fallback
 * resends the whole fragment set, not only the fragments the primary lost.
 */
export async function runDigest(config: RunConfig, deps: PipelineDeps): Promise<RunReport> {
  const fetcher = deps.fetchTranscript ?? fetchTranscript;
  const wait = deps.sleep ?? defaultSleep;
  const pacingMs = deps.pacingMs ?? SEND_PACING_MS;
  const output = deps.output ?? ((text: string) => console.log(text));
  const opened: ChannelPlugin[] = [];

  const enter = (stage: RunStage, data: Record<string, unknown> = {}) => {
    structuredLog('info', COMPONENT, 'stage', { stage, label: config.label, ...data });
  };

  try {
    enter('START', { mode: config.mode });
    let primaryReady = false;
    if (config.mode === 'deliver') {
      primaryReady = await initializeTransport(deps.primary, 'primary');
      if (primaryReady && deps.primary) opened.push(deps.primary);
    }

    enter('FETCH', { channels: config.channelIds.length, hours: config.hours });
    const transcript = await fetcher(
      config.channelIds.map(id => ({ id })),
      config.hours,
      config.reader,
      { maxPages: config.maxPages, ...deps.fetchOptions },
    );
    const channelNames = [...transcript.channelNames.values()];
    const summary = { totalMessages: transcript.totalMessages, channelNames };

    if (transcript.entries.length === 0) {
      structuredLog('info', COMPONENT, 'no_messages', { label: config.label, fetched: transcript.fetchedMessages });
      return { status: 'empty', fragments: 0, sent: 0, failed: 0, ...summary };
    }

    const transcriptText = buildTranscriptText(transcript.entries);
    if (config.mode === 'debug') {
      output(formatDebugTranscript(config.label, transcript, transcriptText));
      return { status: 'debug', fragments: 0, sent: 0, failed: 0, ...summary };
    }

    if (!deps.summarizer) {
      throw new MissingCredentialError('OPENROUTER_API_KEY', 'summarization');
    }
    enter('SUMMARIZE', { messages: transcript.totalMessages });
    const generated = await deps.summarizer.summarize(transcriptText, config.label);

    const digest = composeDigest(generated, {
      label: config.label,
      channelNames,
      totalMessages: transcript.totalMessages,
      format: config.format,
      footer: config.footer,
    });
    const fragments = splitMessage(digest.text, deps.maxLength ?? DISCORD_MESSAGE_LIMIT, {
      preserveQuotes: config.format === 'quote',
    });
    enter('CHUNK', { fragments: fragments.length, chars: digest.text.length });

    if (config.mode === 'dry-run') {
      fragments.forEach((fragment, index) => {
        output(`--- fragment ${index + 1}/${fragments.length} (${fragment.length} chars) ---\n${fragment}`);
      });
      return { status: 'dry-run', fragments: fragments.length, sent: 0, failed: 0, ...summary };
    }

    let sent = 0;
    if (primaryReady && deps.primary) {
      enter('SEND_PRIMARY', { transport: deps.primary.name, fragments: fragments.length });
      sent = await sendAll(deps.primary, config.outputChannelId, fragments, wait, pacingMs);
      if (sent === fragments.length) {
        enter('SUCCESS', { transport: 'primary', sent });
        return { status: 'delivered', transport: 'primary', fragments: fragments.length, sent, failed: 0, ...summary };
      }
      structuredLog('warn', COMPONENT, 'primary_incomplete', { sent, fragments: fragments.length });
    }

    const fallbackReady = await initializeTransport(deps.fallback, 'fallback');
    if (!fallbackReady || !deps.fallback) {
      enter('FAILURE', { reason: 'no_transport' });
      return {
        status: 'failed',
        reason: 'no_transport',
        fragments: fragments.length,
        sent,
        failed: fragments.length - sent,
        ...summary,
      };
    }
    opened.push(deps.fallback);

    enter('SEND_FALLBACK', { transport: deps.fallback.name, fragments: fragments.length });
    sent = await sendAll(deps.fallback, config.outputChannelId, fragments, wait, pacingMs);
    if (sent === fragments.length) {
      enter('SUCCESS', { transport: 'fallback', sent });
      return { status: 'delivered', transport: 'fallback', fragments: fragments.length, sent, failed: 0, ...summary };
    }

    enter('FAILURE', { reason: 'partial', sent });
    return {
      status: 'failed',
      transport: 'fallback',
      reason: 'partial',
      fragments: fragments.length,
      sent,
      failed: fragments.length - sent,
      ...summary,
    };
  } finally {
    for (const transport of opened) {
      try {
        await transport.destroy();
      } catch (err) {
        logError('warn', COMPONENT, 'transport_destroy_failed', err, { transport: transport.name });
      }
    }
  }
}
