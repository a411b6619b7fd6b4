import type { FetchProgress } from '../core/sessions.js';

export function renderProgressBar(completed: number, total: number, width = 30): string {
  const ratio = total > 0 ? Math.min(completed / total, 1) : 0;
  const filled = Math.round(ratio * width);
  return `[${'#'.repeat(filled)}${'-'.repeat(width - filled)}]`;
}

export function describeProgress(progress: FetchProgress | null): string {
  if (progress === null) return 'Loading season index...';
  const base = `${progress.completed}/${progress.total} sessions`;
  return progress.skipped > 0 ? `${base} (${progress.skipped} skipped)` : base;
}
