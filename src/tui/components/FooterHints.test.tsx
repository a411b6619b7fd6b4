import { describe, expect, it } from 'vitest';
import React from 'react';
import { render } from 'ink-testing-library';
import { FooterHints } from './FooterHints.js';

describe('FooterHints', () => {
  it('offers back on pickers after the first', () => {
    const { lastFrame } = render(<FooterHints screen="format" />);
    expect(lastFrame()).toBe('enter select · b/backspace/esc back · q quit');
  });

  it('has no back hint on the first picker', () => {
    const { lastFrame } = render(<FooterHints screen="from" />);
    expect(lastFrame()).toBe('enter select · q quit');
  });

  it('offers cancel while fetching', () => {
    const { lastFrame } = render(<FooterHints screen="fetching" />);
    expect(lastFrame()).toBe('esc cancel · q quit');
  });
});
