import { inspect } from 'node:util';

export class InvalidSessionQueryError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid session query: ${problems.join('; ')}`);
    this.name = 'InvalidSessionQueryError';
    this.problems = problems;
  }
}

export class SourceUnavailableError extends Error {
  readonly statusCode: number | null;

  constructor(message: string, statusCode: number | null = null) {
    super(message);
    this.name = 'SourceUnavailableError';
    this.statusCode = statusCode;
  }
}

export class RunAbortedError extends Error {
  constructor(message = 'Session fetch aborted') {
    super(message);
    this.name = 'RunAbortedError';
  }
}

export class ConfigError extends Error {
  readonly configPath: string | null;

  constructor(message: string, configPath: string | null = null) {
    super(message);
    this.name = 'ConfigError';
    this.configPath = configPath;
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

export function formatUnknownError(error: unknown): string {
  if (!error) return 'Unknown error';
  if (typeof error === 'string') return error;
  if (error instanceof Error) {
    const parts = [error.message || error.name || 'Error'];
    if (error instanceof SourceUnavailableError && error.statusCode !== null) {
      parts.push(`status ${error.statusCode}`);
    }
    if ('code' in error && typeof error.code === 'string') parts.push(`code ${error.code}`);
    return parts.join(' • ');
  }
  if (typeof error === 'object') {
    if ('message' in error && typeof error.message === 'string' && error.message.trim().length > 0) {
      return error.message;
    }
    return inspect(error, { depth: 3, breakLength: 120, maxArrayLength: 20 });
  }
  return String(error);
}
