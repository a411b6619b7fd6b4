import { describe, expect, it } from 'vitest';
import React from 'react';
import { render } from 'ink-testing-library';
import { Summary } from './Summary.js';

describe('Summary', () => {
  it('shows the CSV path and skipped sessions', () => {
    const { lastFrame } = render(
      <Summary
        summary={{
          rowCount: 42,
          skipped: [
            { sessionId: '9', eventName: 'Grand Prix', sessionName: 'Race', reason: 'HTTP 404', statusCode: 404 },
          ],
          path: '/tmp/sessions_2020.csv',
          preview: null,
        }}
      />,
    );

    const frame = lastFrame() ?? '';
    expect(frame).toContain('Rows: 42');
    expect(frame).toContain('Skipped sessions: 1');
    expect(frame).toContain('/tmp/sessions_2020.csv');
    expect(frame).toContain('Grand Prix - Race: HTTP 404');
  });

  it('shows a table preview', () => {
    const { lastFrame } = render(
      <Summary summary={{ rowCount: 1, skipped: [], path: null, preview: 'season\n------\n  2020' }} />,
    );

    const frame = lastFrame() ?? '';
    expect(frame).toContain('Preview');
    expect(frame).not.toContain('CSV written to');
    expect(frame).toContain('Rows: 1');
  });
});
