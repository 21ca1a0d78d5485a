import { readFile } from 'fs/promises';
import { join } from 'path';
import {
  OPENROUTER_BASE_URL,
  DEFAULT_MODEL,
  SUMMARY_TIMEOUT_MS,
  SUMMARY_MAX_TOKENS,
  SUMMARY_TEMPERATURE,
} from '@digestor/protocol';
import { MissingCredentialError, logError, structuredLog } from './error-utils.js';

const COMPONENT = 'summarizer';

export const SYSTEM_PROMPT = 'You are a helpful assistant for text summarization.';

export const DEFAULT_PROMPT =
  'Summarize the following chat transcript as concise bullet points. ' +
  'Group related discussion, keep concrete facts, links and decisions, and skip small talk.';

export interface SummarizerConfig {
  apiKey: string | null;
  model?: string;
  baseURL?: string;
  timeoutMs?: number;
  promptDir: string;
}

type OpenAIClient = import('openai').default;

// [label](url), <url>, or a bare url
const LINK_PATTERN = /\[([^\]]*)\]\(\s*<?(https?:\/\/[^\s<>()]+)>?\s*\)|<(https?:\/\/[^\s<>]+)>|(https?:\/\/[^\s<>()[\]]+)/g;
const TRAILING_PUNCTUATION = /[.,;:!?'"]+$/;

/**
 * Wrap every link target in angle brackets so the chat client does not
 * expand a preview for it. Already-wrapped links are left as they are.
 */
export function suppressLinkPreviews(text: string): string {
  return text.replace(
    LINK_PATTERN,
    (match: string, label: string | undefined, linkUrl: string | undefined, _wrapped: string | undefined, bare: string | undefined) => {
      if (linkUrl !== undefined) return `[${label ?? ''}](<${linkUrl}>)`;
      if (bare === undefined) return match;
      const url = bare.replace(TRAILING_PUNCTUATION, '');
      return `<${url}>${bare.slice(url.length)}`;
    },
  );
}

/** Instruction text for a config label, or the built-in prompt */
export async function loadPrompt(label: string, promptDir: string): Promise<string> {
  const promptPath = join(promptDir, `${label}.txt`);
  try {
    const prompt = (await readFile(promptPath, 'utf-8')).trim();
    if (prompt) return prompt;
    structuredLog('warn', COMPONENT, 'prompt_empty', { label, path: promptPath });
  } catch (err) {
    logError('warn', COMPONENT, 'prompt_unavailable', err, { label, path: promptPath });
  }
  return DEFAULT_PROMPT;
}

function errorStatus(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return undefined;
}

/**
 * Single-shot summarization through an OpenAI-compatible endpoint.
 *
 * Never rejects: transport errors, timeouts and non-success responses are
 * returned as an `Error generating summary: ...` string so that the failure
 * is delivered where the digest would have been.
 */
export class Summarizer {
  private config: SummarizerConfig;
  private apiKey: string;
  private client: OpenAIClient | null = null;

  constructor(config: SummarizerConfig) {
    if (!config.apiKey) {
      throw new MissingCredentialError('OPENROUTER_API_KEY', 'summarization');
    }
    this.config = config;
    this.apiKey = config.apiKey;
  }

  get model(): string {
    return this.config.model ?? DEFAULT_MODEL;
  }

  /**
   * Lazy-initialize the OpenAI client on first use
   */
  private async getClient(): Promise<OpenAIClient> {
    if (this.client) return this.client;

    const { default: OpenAI } = await import('openai');
    this.client = new OpenAI({
      apiKey: this.apiKey,
      baseURL: this.config.baseURL ?? OPENROUTER_BASE_URL,
      timeout: this.config.timeoutMs ?? SUMMARY_TIMEOUT_MS,
      maxRetries: 0, // one attempt per run
      defaultHeaders: { 'X-Title': 'Digestor' },
    });
    return this.client;
  }

  async summarize(transcriptText: string, label: string): Promise<string> {
    const prompt = await loadPrompt(label, this.config.promptDir);
    const startedAt = Date.now();

    try {
      const client = await this.getClient();
      const response = await client.chat.completions.create({
        model: this.model,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: `${prompt}\n${transcriptText}` },
        ],
        max_tokens: SUMMARY_MAX_TOKENS,
        temperature: SUMMARY_TEMPERATURE,
      });

      const content = response.choices[0]?.message?.content;
      if (!content || !content.trim()) {
        structuredLog('error', COMPONENT, 'summary_empty', { model: this.model });
        return 'Error generating summary: empty response';
      }

      structuredLog('info', COMPONENT, 'summary_generated', {
        model: this.model,
        chars: content.length,
        durationMs: Date.now() - startedAt,
      });
      return suppressLinkPreviews(content);
    } catch (err) {
      logError('error', COMPONENT, 'summary_failed', err, { model: this.model, durationMs: Date.now() - startedAt });
      const status = errorStatus(err);
      if (status !== undefined) {
        return `Error generating summary: API returned ${status}`;
      }
      return `Error generating summary: ${err instanceof Error ? err.message : String(err)}`;
    }
  }
}
