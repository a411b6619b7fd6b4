import React, { useMemo, useState } from 'react';
import { Box, Text } from 'ink';
import { EARLIEST_SEASON } from '../../core/query.js';
import { SelectList } from '../components/SelectList.js';
import { Panel } from '../components/Panel.js';
import { getSeasonOptions } from '../season-utils.js';
import { theme } from '../theme.js';

export function SeasonPicker({
  title,
  minYear = EARLIEST_SEASON,
  currentYear = new Date().getFullYear(),
  onSelect,
}: {
  title: string;
  minYear?: number;
  currentYear?: number;
  onSelect: (year: number) => void;
}): React.JSX.Element {
  const seasons = useMemo(() => getSeasonOptions(currentYear, minYear), [currentYear, minYear]);
  const [highlighted, setHighlighted] = useState<number | null>(seasons[0] ?? null);

  return (
    <Box flexDirection="row" gap={2}>
      <Box flexDirection="column" flexGrow={1}>
        <Text>{title}</Text>
        <SelectList
          items={seasons.map((year) => ({ label: String(year), value: year }))}
          limit={10}
          onSelect={onSelect}
          onHighlight={setHighlighted}
        />
      </Box>
      <Panel title="Season" width={38}>
        {highlighted !== null ? (
          <>
            <Text>Year: {highlighted}</Text>
            <Text color={theme.muted}>
              Seasons {minYear}-{currentYear} are available.
            </Text>
          </>
        ) : (
          <Text color={theme.muted}>No seasons to pick from.</Text>
        )}
      </Panel>
    </Box>
  );
}
