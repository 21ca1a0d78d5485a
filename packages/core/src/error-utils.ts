// Error classification for structured logging
export type ErrorCategory = 'discord_api' | 'auth' | 'timeout' | 'network' | 'internal';

export interface ClassifiedError {
  category: ErrorCategory;
  code?: number;
  message: string;
  retryable: boolean;
}

export type LogLevel = 'info' | 'warn' | 'error';

export class DigestorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A credential required by the requested operation is not configured */
export class MissingCredentialError extends DigestorError {
  readonly credential: string;

  constructor(credential: string, purpose?: string) {
    super(`Missing credential ${credential}${purpose ? ` (required for ${purpose})` : ''}`);
    this.credential = credential;
  }
}

export class ConfigError extends DigestorError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.problems = problems;
  }
}

export class DiscordApiError extends DigestorError {
  readonly status: number;
  readonly endpoint: string;

  constructor(status: number, endpoint: string) {
    super(`Discord API error: ${status} (${endpoint})`);
    this.status = status;
    this.endpoint = endpoint;
  }
}

function readStatus(err: Error): number | undefined {
  if ('status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return undefined;
}

export function classifyError(err: unknown): ClassifiedError {
  const error = err instanceof Error ? err : new Error(String(err));
  const msg = error.message;

  if (error instanceof MissingCredentialError) {
    return { category: 'auth', message: msg, retryable: false };
  }

  // Discord API errors (REST responses and discord.js HTTP errors)
  const status = readStatus(error);
  if (status !== undefined) {
    if (status === 401 || status === 403) {
      return { category: 'auth', code: status, message: msg, retryable: false };
    }
    return {
      category: 'discord_api',
      code: status,
      message: msg,
      retryable: status === 429 || status >= 500,
    };
  }

  // discord.js login rejection
  if (msg.includes('TokenInvalid') || msg.includes('invalid token') || msg.includes('An invalid token was provided')) {
    return { category: 'auth', message: msg, retryable: false };
  }

  // Timeout errors
  if (msg.includes('timed out') || msg.includes('timeout') || msg.includes('TimeoutError') || error.name === 'AbortError') {
    return { category: 'timeout', message: msg, retryable: true };
  }

  // Network errors
  if (msg.includes('ECONNREFUSED') || msg.includes('ENOTFOUND') || msg.includes('fetch failed') || msg.includes('network')) {
    return { category: 'network', message: msg, retryable: true };
  }

  return { category: 'internal', message: msg, retryable: false };
}

export function structuredLog(level: LogLevel, component: string, event: string, data: Record<string, unknown> = {}): void {
  const entry = {
    ts: new Date().toISOString(),
    level,
    component,
    event,
    ...data,
  };
  if (level === 'error') {
    console.error(JSON.stringify(entry));
  } else if (level === 'warn') {
    console.warn(JSON.stringify(entry));
  } else {
    console.log(JSON.stringify(entry));
  }
}

/** Log a caught error with its classification */
export function logError(level: LogLevel, component: string, event: string, err: unknown, data: Record<string, unknown> = {}): ClassifiedError {
  const classified = classifyError(err);
  structuredLog(level, component, event, {
    ...data,
    category: classified.category,
    code: classified.code,
    message: classified.message,
    retryable: classified.retryable,
  });
  return classified;
}
