import { z } from 'zod';
import { isAbortError, RunAbortedError, SourceUnavailableError } from './errors.js';
import type { SeasonIndex, SessionDetails } from './types.js';

const USER_AGENT = 'indystats/0.1.0';
export const DEFAULT_BASE_URL = 'https://www.indycar.com/Services/IndyStats.svc';
export const DEFAULT_TIMEOUT_MS = 10_000;
// Fixed id of the season drop-down the results pages are built from.
const SEASON_DROP_DOWN_ID = 'b856a4f1-e85c-4fac-8c36-fd58d962227a';

export type ApiOptions = {
  baseUrl?: string;
  timeoutMs?: number;
  signal?: AbortSignal;
};

export type FetchOutcome<T> =
  | { ok: true; value: T; statusCode: number; bytes: number }
  | { ok: false; error: string; statusCode?: number };

const idSchema = z.union([z.string().min(1), z.number()]);

const seasonIndexSchema = z.array(
  z.object({
    Year: z.union([z.string(), z.number()]),
    Events: z
      .array(
        z.object({
          EventID: idSchema,
          EventName: z.string(),
          Sessions: z
            .array(z.object({ EventsSessionID: idSchema, SessionName: z.string() }))
            .nullish()
            .transform((sessions) => sessions ?? []),
        }),
      )
      .nullish()
      .transform((events) => events ?? []),
  }),
);

const sessionDetailsSchema = z.object({
  EventName: z.string().nullish().transform((v) => v ?? null),
  SessionDate: z.string().nullish().transform((v) => v ?? null),
  SessionName: z.string().nullish().transform((v) => v ?? null),
  SessionType: z.string().nullish().transform((v) => v ?? null),
  TrackType: z.string().nullish().transform((v) => v ?? null),
  // null means no results were posted for the session
  records: z
    .array(z.record(z.unknown()))
    .nullable()
    .transform((r) => r ?? []),
});

export function seasonIndexUrl(baseUrl: string = DEFAULT_BASE_URL): string {
  return `${trimSlash(baseUrl)}/SeasonDropDown?id=${SEASON_DROP_DOWN_ID}`;
}

export function sessionDetailsUrl(
  sessionId: string,
  baseUrl: string = DEFAULT_BASE_URL,
): string {
  return `${trimSlash(baseUrl)}/EventsSessionDetails?id=${encodeURIComponent(sessionId)}`;
}

/** Fetch every season with its events and sessions. Throws when unavailable. */
export async function getSeasonIndex(opts: ApiOptions = {}): Promise<SeasonIndex> {
  const result = await fetchJson(seasonIndexUrl(opts.baseUrl), opts);
  if (!result.ok) {
    throw new SourceUnavailableError(
      `Failed to fetch season index: ${result.error}`,
      result.statusCode ?? null,
    );
  }
  const parsed = seasonIndexSchema.safeParse(result.value);
  if (!parsed.success) {
    throw new SourceUnavailableError(
      'Invalid season index payload: expected [{ Year; Events: [{ EventID; EventName; Sessions }] }]',
    );
  }
  return parsed.data;
}

/**
 * Fetch one session's results. Failures come back as `{ ok: false }` so the
 * caller can skip the session; only a caller abort throws.
 */
export async function getSessionDetails(
  sessionId: string,
  opts: ApiOptions = {},
): Promise<FetchOutcome<SessionDetails>> {
  const result = await fetchJson(sessionDetailsUrl(sessionId, opts.baseUrl), opts);
  if (!result.ok) return result;
  const parsed = sessionDetailsSchema.safeParse(result.value);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join('.') || '(root)');
    return {
      ok: false,
      error: `Invalid session payload for ${sessionId}: bad ${[...new Set(fields)].join(', ')}`,
      statusCode: result.statusCode,
    };
  }
  return { ...result, value: parsed.data };
}

async function fetchJson(url: string, opts: ApiOptions): Promise<FetchOutcome<unknown>> {
  const timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  if (opts.signal?.aborted) throw new RunAbortedError();
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  const onAbort = () => controller.abort();
  opts.signal?.addEventListener('abort', onAbort, { once: true });
  try {
    const res = await fetch(url, {
      headers: { 'User-Agent': USER_AGENT, Accept: 'application/json' },
      signal: controller.signal,
    });
    if (!res.ok) {
      return { ok: false, error: `HTTP ${res.status}`, statusCode: res.status };
    }
    const raw = await res.text();
    let value: unknown;
    try {
      value = JSON.parse(raw.replace(/^\uFEFF/, ''));
    } catch {
      return { ok: false, error: `Invalid JSON from ${url}`, statusCode: res.status };
    }
    return {
      ok: true,
      value,
      statusCode: res.status,
      bytes: Buffer.byteLength(raw, 'utf-8'),
    };
  } catch (error) {
    if (opts.signal?.aborted) throw new RunAbortedError();
    if (isAbortError(error)) {
      return { ok: false, error: `Timed out fetching ${url} after ${timeoutMs}ms` };
    }
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  } finally {
    clearTimeout(timeoutId);
    opts.signal?.removeEventListener('abort', onAbort);
  }
}

function trimSlash(url: string): string {
  return url.endsWith('/') ? url.slice(0, -1) : url;
}
