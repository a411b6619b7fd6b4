import { z } from 'zod';
import { InvalidSessionQueryError } from './errors.js';

export const SESSION_TYPES = ['R', 'P', 'Q', 'W', 'All'] as const;
export type SessionTypeFilter = (typeof SESSION_TYPES)[number];

export const DATA_FORMATS = ['table', 'csv'] as const;
export type DataFormat = (typeof DATA_FORMATS)[number];

export const EARLIEST_SEASON = 1996;

export const SESSION_TYPE_LABELS: Record<SessionTypeFilter, string> = {
  R: 'Race',
  P: 'Practice',
  Q: 'Qualifying',
  W: 'Warm-up',
  All: 'All sessions',
};

const SESSION_TYPE_ALIASES: Record<string, SessionTypeFilter> = {
  r: 'R',
  race: 'R',
  p: 'P',
  practice: 'P',
  q: 'Q',
  qualifying: 'Q',
  qualification: 'Q',
  qualifications: 'Q',
  w: 'W',
  warmup: 'W',
  'warm-up': 'W',
  all: 'All',
};

export function normalizeSessionType(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  return SESSION_TYPE_ALIASES[value.trim().toLowerCase()] ?? value;
}

const yearSchema = (field: string) =>
  z
    .number({ invalid_type_error: `${field} must be a number` })
    .int(`${field} must be a whole year`)
    .min(EARLIEST_SEASON, `${field} must be ${EARLIEST_SEASON} or later`);

const sessionQuerySchema = z
  .object({
    fromYear: yearSchema('fromYear').default(EARLIEST_SEASON),
    toYear: yearSchema('toYear').default(() => new Date().getFullYear()),
    sessionType: z
      .preprocess(
        normalizeSessionType,
        z.enum(SESSION_TYPES, {
          errorMap: () => ({ message: 'sessionType must be one of R, P, Q, W, All' }),
        }),
      )
      .default('R'),
    dataFormat: z
      .enum(DATA_FORMATS, {
        errorMap: () => ({ message: "dataFormat must be 'table' or 'csv'" }),
      })
      .default('table'),
  })
  .refine((query) => query.fromYear <= query.toYear, {
    message: 'fromYear must be less than or equal to toYear',
    path: ['fromYear'],
  });

export type SessionQuery = z.output<typeof sessionQuerySchema>;

export type SessionQueryInput = {
  fromYear?: number;
  toYear?: number;
  sessionType?: string;
  dataFormat?: string;
};

export function parseSessionQuery(input: SessionQueryInput = {}): SessionQuery {
  const result = sessionQuerySchema.safeParse(input);
  if (!result.success) {
    throw new InvalidSessionQueryError(result.error.issues.map((issue) => issue.message));
  }
  return result.data;
}
