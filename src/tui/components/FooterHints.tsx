import React from 'react';
import { Text } from 'ink';
import type { ScreenName } from '../navigation.js';
import { theme } from '../theme.js';

export function getFooterHint(screen: ScreenName): string {
  if (screen === 'fetching') return 'esc cancel · q quit';
  if (screen === 'summary') return 'b/backspace/esc back · q quit';
  if (screen === 'from') return 'enter select · q quit';
  return 'enter select · b/backspace/esc back · q quit';
}

export function FooterHints({ screen }: { screen: ScreenName }): React.JSX.Element {
  return <Text color={theme.muted}>{getFooterHint(screen)}</Text>;
}
