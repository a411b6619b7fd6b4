import { describe, expect, it, vi } from 'vitest';
import React from 'react';
import { render } from 'ink-testing-library';
import { SeasonPicker } from './SeasonPicker.js';

describe('SeasonPicker', () => {
  it('lists seasons from the current year down to the minimum', () => {
    const { lastFrame } = render(
      <SeasonPicker title="Select the last season" minYear={2022} currentYear={2024} onSelect={vi.fn()} />,
    );

    const frame = lastFrame() ?? '';
    expect(frame).toContain('Select the last season');
    expect(frame).toContain('2023');
    expect(frame).toContain('Seasons 2022-2024 are available.');
    expect(frame).not.toContain('2021');
  });

  it('selects the highlighted season on enter', async () => {
    const onSelect = vi.fn();
    const { stdin } = render(
      <SeasonPicker title="Select the first season" minYear={2022} currentYear={2024} onSelect={onSelect} />,
    );

    await vi.waitFor(() => {
      stdin.write('\r');
      expect(onSelect).toHaveBeenCalledWith(2024);
    });
  });
});
