import React, { useState } from 'react';
import { Box, Text } from 'ink';
import type { DataFormat } from '../../core/query.js';
import { SelectList } from '../components/SelectList.js';
import { Panel } from '../components/Panel.js';
import { theme } from '../theme.js';

export function FormatPicker({
  outputDir,
  onSelect,
}: {
  outputDir: string;
  onSelect: (format: DataFormat) => void;
}): React.JSX.Element {
  const [highlighted, setHighlighted] = useState<DataFormat>('table');

  return (
    <Box flexDirection="row" gap={2}>
      <Box flexDirection="column" flexGrow={1}>
        <Text>Select an output format</Text>
        <SelectList<DataFormat>
          items={[
            { label: 'Table preview', value: 'table' },
            { label: 'CSV file', value: 'csv' },
          ]}
          onSelect={onSelect}
          onHighlight={setHighlighted}
        />
      </Box>
      <Panel title="Output" width={38}>
        {highlighted === 'csv' ? (
          <>
            <Text>Writes a CSV file to</Text>
            <Text color={theme.accent}>{outputDir}</Text>
          </>
        ) : (
          <Text color={theme.muted}>Shows the first rows once fetching finishes.</Text>
        )}
      </Panel>
    </Box>
  );
}
