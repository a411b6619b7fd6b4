export const theme = {
  brand: 'yellow',
  accent: 'cyan',
  muted: 'gray',
  border: 'gray',
  panelTitle: 'gray',
  progress: 'yellow',
  status: {
    error: 'red',
    warn: 'yellow',
    ok: 'green',
  },
} as const;
