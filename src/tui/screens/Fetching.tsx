import React, { useEffect, useRef, useState } from 'react';
import { Box, Text } from 'ink';
import { formatUnknownError } from '../../core/errors.js';
import { SESSION_TYPE_LABELS, type SessionQuery } from '../../core/query.js';
import type { FetchProgress } from '../../core/sessions.js';
import { Panel } from '../components/Panel.js';
import { describeProgress, renderProgressBar } from '../progress.js';
import type { RunSummary } from '../run-summary.js';
import { theme } from '../theme.js';

export type FetchRunner = (deps: {
  signal: AbortSignal;
  onProgress: (progress: FetchProgress) => void;
}) => Promise<RunSummary>;

export function Fetching({
  query,
  onStart,
  onComplete,
}: {
  query: SessionQuery;
  onStart: FetchRunner;
  onComplete: (summary: RunSummary) => void;
}): React.JSX.Element {
  const [progress, setProgress] = useState<FetchProgress | null>(null);
  const [error, setError] = useState<string | null>(null);
  const onStartRef = useRef(onStart);
  const onCompleteRef = useRef(onComplete);
  const runKey = `${query.fromYear}:${query.toYear}:${query.sessionType}:${query.dataFormat}`;

  useEffect(() => {
    onStartRef.current = onStart;
    onCompleteRef.current = onComplete;
  }, [onStart, onComplete]);

  useEffect(() => {
    let mounted = true;
    const controller = new AbortController();
    setProgress(null);
    setError(null);

    void onStartRef
      .current({
        signal: controller.signal,
        onProgress: (next) => {
          if (mounted) setProgress(next);
        },
      })
      .then(
        (summary) => {
          if (mounted) onCompleteRef.current(summary);
        },
        (err: unknown) => {
          if (mounted) setError(formatUnknownError(err));
        },
      );

    return () => {
      mounted = false;
      controller.abort();
    };
  }, [runKey]);

  const current = progress?.current;
  const range =
    query.fromYear === query.toYear ? `${query.fromYear}` : `${query.fromYear}-${query.toYear}`;

  if (error !== null) {
    return (
      <Panel title="Fetch failed" tone="error">
        <Text>{error}</Text>
        <Text color={theme.muted}>Press b to change the query.</Text>
      </Panel>
    );
  }

  return (
    <Box flexDirection="column" gap={1}>
      <Text>
        Fetching {SESSION_TYPE_LABELS[query.sessionType]} sessions for {range}
      </Text>
      <Text color={theme.progress}>
        {renderProgressBar(progress?.completed ?? 0, progress?.total ?? 0)} {describeProgress(progress)}
      </Text>
      {current ? (
        <Text color={theme.muted}>
          {current.year} {current.eventName} - {current.sessionName}
        </Text>
      ) : null}
    </Box>
  );
}
