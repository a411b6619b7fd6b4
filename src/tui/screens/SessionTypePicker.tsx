import React, { useState } from 'react';
import { Box, Text } from 'ink';
import { SESSION_TYPE_LABELS, SESSION_TYPES, type SessionTypeFilter } from '../../core/query.js';
import { SelectList } from '../components/SelectList.js';
import { Panel } from '../components/Panel.js';
import { theme } from '../theme.js';

const DESCRIPTIONS: Record<SessionTypeFilter, string> = {
  R: 'Race results with start and finish positions, laps led and points.',
  P: 'Practice sessions with best laps and speeds.',
  Q: 'Qualifying sessions, including individual qualifying laps.',
  W: 'Warm-up sessions held before a race.',
  All: 'Every session of every event in range.',
};

export function SessionTypePicker({
  onSelect,
}: {
  onSelect: (sessionType: SessionTypeFilter) => void;
}): React.JSX.Element {
  const [highlighted, setHighlighted] = useState<SessionTypeFilter>('R');

  return (
    <Box flexDirection="row" gap={2}>
      <Box flexDirection="column" flexGrow={1}>
        <Text>Select a session type</Text>
        <SelectList
          items={SESSION_TYPES.map((type) => ({
            label: `${SESSION_TYPE_LABELS[type]} (${type})`,
            value: type,
          }))}
          onSelect={onSelect}
          onHighlight={setHighlighted}
        />
      </Box>
      <Panel title="Session type" width={38}>
        <Text>{SESSION_TYPE_LABELS[highlighted]}</Text>
        <Text color={theme.muted}>{DESCRIPTIONS[highlighted]}</Text>
      </Panel>
    </Box>
  );
}
