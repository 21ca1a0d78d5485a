import { DIGEST_FOOTER, QUOTE_PREFIX, type DeliveryFormat, type Digest } from '@digestor/protocol';

export interface ComposeOptions {
  label: string;
  channelNames: readonly string[];
  totalMessages: number;
  format: DeliveryFormat;
  footer: boolean;
}

export function formatHeader(label: string, channelNames: readonly string[], totalMessages: number): string {
  return `**Aggregated Summary (${label}) of ${channelNames.length} Channels (${totalMessages} msgs):**\n` +
    `${channelNames.join(', ')}\n\n`;
}

/** Prefix every non-blank line with the quote marker, dropping blank lines */
export function toBlockQuote(text: string): string {
  return text
    .split('\n')
    .filter(line => line.trim())
    .map(line => `${QUOTE_PREFIX}${line}`)
    .join('\n');
}

export function composeDigest(summary: string, options: ComposeOptions): Digest {
  const header = formatHeader(options.label, options.channelNames, options.totalMessages);
  const trimmed = summary.trim();
  const body = options.format === 'quote' ? toBlockQuote(trimmed) : trimmed;
  // A fenced footer cannot sit inside a quoted run
  const footer = options.footer && options.format === 'plain' ? DIGEST_FOOTER : null;
  const text = footer ? `${header}${body}\n\n\n${footer}` : `${header}${body}`;
  return { header, body, footer, text };
}
