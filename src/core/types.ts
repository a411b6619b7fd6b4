export type SeasonIndex = SeasonIndexEntry[];

export type SeasonIndexEntry = {
  Year: string | number;
  Events: SeasonEvent[];
};

export type SeasonEvent = {
  EventID: string | number;
  EventName: string;
  Sessions: SeasonSession[];
};

export type SeasonSession = {
  EventsSessionID: string | number;
  SessionName: string;
};

export type SessionDetails = {
  EventName: string | null;
  SessionDate: string | null;
  SessionName: string | null;
  SessionType: string | null;
  TrackType: string | null;
  records: Array<Record<string, unknown>>;
};

export type SessionRef = {
  year: number;
  eventId: string;
  eventName: string;
  sessionId: string;
  sessionName: string;
};

// One entrant row as served by IndyStats, plus the session context the fetcher attaches.
export type RawSessionRecord = Record<string, unknown> & {
  EventName: string;
  EventDate: string | null;
  EventType: string | null;
  SessionType: string | null;
  TrackType: string | null;
  EventID: string;
  EventsSessionsID: unknown;
  Season: number;
};

export type SkippedSession = {
  sessionId: string;
  eventName: string;
  sessionName: string;
  reason: string;
  statusCode?: number;
};
