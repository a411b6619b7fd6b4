import React, { useCallback, useMemo, useState } from 'react';
import { Box, useApp, useInput, useStdout } from 'ink';
import type { ResolvedConfig } from './core/config.js';
import type { RunLogger } from './core/logger.js';
import { parseSessionQuery } from './core/query.js';
import { getSessionsRecords } from './core/sessions.js';
import type { TrackLookup } from './core/track-lookup.js';
import { FooterHints } from './tui/components/FooterHints.js';
import { Header } from './tui/components/Header.js';
import { getBackScreen, getBreadcrumb, type Screen } from './tui/navigation.js';
import { summarizeRun } from './tui/run-summary.js';
import { Fetching, type FetchRunner } from './tui/screens/Fetching.js';
import { FormatPicker } from './tui/screens/FormatPicker.js';
import { SeasonPicker } from './tui/screens/SeasonPicker.js';
import { SessionTypePicker } from './tui/screens/SessionTypePicker.js';
import { Summary } from './tui/screens/Summary.js';

type AppProps = {
  config: ResolvedConfig;
  logger: RunLogger;
  lookup?: TrackLookup;
  initialScreen?: Screen;
};

export function App({
  config,
  logger,
  lookup,
  initialScreen = { name: 'from' },
}: AppProps): React.JSX.Element {
  const { exit } = useApp();
  const { stdout } = useStdout();
  const terminalRows = stdout.rows ?? 40;
  const isShort = terminalRows < 32;
  const [screen, setScreen] = useState<Screen>(initialScreen);

  const breadcrumb = useMemo(() => getBreadcrumb(screen), [screen]);

  const runFetch = useCallback<FetchRunner>(
    async ({ signal, onProgress }) => {
      if (screen.name !== 'fetching') {
        throw new Error('No query to fetch');
      }
      const result = await getSessionsRecords(screen.query, {
        logger,
        lookup,
        signal,
        onProgress,
        baseUrl: config.baseUrl,
        timeoutMs: config.timeoutMs,
        requestDelayMs: config.requestDelayMs,
        outputDir: config.outputDir,
      });
      return summarizeRun(result);
    },
    [screen, logger, lookup, config],
  );

  useInput((input, key) => {
    if (input === 'q') {
      exit();
      return;
    }
    if (input === 'b' || key.backspace || key.escape) {
      const next = getBackScreen(screen);
      if (next) setScreen(next);
    }
  });

  return (
    <Box flexDirection="column" height={terminalRows}>
      <Header breadcrumb={breadcrumb} compact={isShort} />
      <Box flexGrow={1} flexDirection="column" marginLeft={1}>
        {screen.name === 'from' && (
          <SeasonPicker
            title="Select the first season"
            onSelect={(fromYear) => setScreen({ name: 'to', fromYear })}
          />
        )}
        {screen.name === 'to' && (
          <SeasonPicker
            title={`Select the last season (from ${screen.fromYear})`}
            minYear={screen.fromYear}
            onSelect={(toYear) =>
              setScreen({ name: 'sessionType', fromYear: screen.fromYear, toYear })
            }
          />
        )}
        {screen.name === 'sessionType' && (
          <SessionTypePicker
            onSelect={(sessionType) =>
              setScreen({
                name: 'format',
                fromYear: screen.fromYear,
                toYear: screen.toYear,
                sessionType,
              })
            }
          />
        )}
        {screen.name === 'format' && (
          <FormatPicker
            outputDir={config.outputDir}
            onSelect={(dataFormat) =>
              setScreen({
                name: 'fetching',
                query: parseSessionQuery({
                  fromYear: screen.fromYear,
                  toYear: screen.toYear,
                  sessionType: screen.sessionType,
                  dataFormat,
                }),
              })
            }
          />
        )}
        {screen.name === 'fetching' && (
          <Fetching
            query={screen.query}
            onStart={runFetch}
            onComplete={(summary) =>
              setScreen({ name: 'summary', query: screen.query, summary })
            }
          />
        )}
        {screen.name === 'summary' && <Summary summary={screen.summary} />}
      </Box>
      <FooterHints screen={screen.name} />
    </Box>
  );
}
