import React from 'react';
import { Box } from 'ink';
import SelectInput from 'ink-select-input';
import { theme } from '../theme.js';

export type SelectListItem<V> = {
  key?: string;
  label: string;
  value: V;
};

type SelectListProps<V> = {
  items: Array<SelectListItem<V>>;
  onSelect: (value: V) => void;
  onHighlight?: (value: V) => void;
  limit?: number;
};

export function SelectList<V>({
  items,
  onSelect,
  onHighlight,
  limit,
}: SelectListProps<V>): React.JSX.Element {
  return (
    <Box borderStyle="round" borderColor={theme.border} paddingX={1} flexGrow={1}>
      <SelectInput<V>
        items={items}
        limit={limit}
        onSelect={(item) => onSelect(item.value)}
        onHighlight={onHighlight ? (item) => onHighlight(item.value) : undefined}
      />
    </Box>
  );
}
