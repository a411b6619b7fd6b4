import React from 'react';
import { Box, Text } from 'ink';
import { theme } from '../theme.js';

type HeaderProps = {
  breadcrumb?: string[];
  title?: string;
  subtitle?: string;
  compact?: boolean;
};

export function Header({
  breadcrumb = [],
  title = 'IndyStats',
  subtitle = 'IndyCar session results',
  compact = false,
}: HeaderProps): React.JSX.Element {
  return (
    <Box flexDirection="column" marginBottom={compact ? 0 : 1}>
      <Box borderStyle="round" borderColor={theme.border} paddingX={1} gap={1}>
        <Text color={theme.brand} bold>
          {title}
        </Text>
        {compact ? null : <Text color={theme.muted}>{subtitle}</Text>}
      </Box>
      {breadcrumb.length > 0 && (
        <Box marginTop={compact ? 0 : 1} flexWrap="wrap">
          {breadcrumb.map((part, index) => {
            const last = index === breadcrumb.length - 1;
            return (
              <Text key={`${part}-${index}`} color={last ? theme.accent : theme.muted}>
                {part}
                {last ? '' : ' / '}
              </Text>
            );
          })}
        </Box>
      )}
    </Box>
  );
}
