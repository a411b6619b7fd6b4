import React from 'react';
import { Box, Text } from 'ink';
import type { RunSummary } from '../run-summary.js';
import { Panel } from '../components/Panel.js';
import { theme } from '../theme.js';

const SKIPPED_SHOWN = 5;

export function Summary({ summary }: { summary: RunSummary }): React.JSX.Element {
  const hidden = summary.skipped.length - SKIPPED_SHOWN;

  return (
    <Box flexDirection="column" gap={1}>
      <Text color={theme.status.ok}>Fetch complete</Text>
      <Panel title="Results" tone="accent">
        <Text>Rows: {summary.rowCount}</Text>
        <Text>Skipped sessions: {summary.skipped.length}</Text>
        {summary.path !== null ? (
          <>
            <Text color={theme.muted}>CSV written to</Text>
            <Text>{summary.path}</Text>
          </>
        ) : null}
      </Panel>
      {summary.preview !== null ? (
        <Panel title="Preview">
          <Text>{summary.preview}</Text>
        </Panel>
      ) : null}
      {summary.skipped.length > 0 ? (
        <Panel title="Skipped">
          {summary.skipped.slice(0, SKIPPED_SHOWN).map((entry) => (
            <Text key={entry.sessionId} color={theme.status.warn}>
              {entry.eventName} - {entry.sessionName}: {entry.reason}
            </Text>
          ))}
          {hidden > 0 ? <Text color={theme.muted}>...and {hidden} more</Text> : null}
        </Panel>
      ) : null}
    </Box>
  );
}
