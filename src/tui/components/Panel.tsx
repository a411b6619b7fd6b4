import React from 'react';
import { Box, Text } from 'ink';
import { theme } from '../theme.js';

type PanelTone = 'neutral' | 'accent' | 'error';

type PanelProps = {
  title: string;
  children: React.ReactNode;
  tone?: PanelTone;
  width?: number;
};

const BORDER: Record<PanelTone, string> = {
  neutral: theme.border,
  accent: theme.accent,
  error: theme.status.error,
};

export function Panel({ title, children, tone = 'neutral', width }: PanelProps): React.JSX.Element {
  return (
    <Box flexDirection="column" borderStyle="round" borderColor={BORDER[tone]} paddingX={1} width={width}>
      <Text color={tone === 'neutral' ? theme.panelTitle : BORDER[tone]}>{title}</Text>
      <Box flexDirection="column" marginTop={1}>
        {children}
      </Box>
    </Box>
  );
}
