import { SESSION_TYPE_LABELS, type SessionQuery, type SessionTypeFilter } from '../core/query.js';
import type { RunSummary } from './run-summary.js';

export type Screen =
  | { name: 'from' }
  | { name: 'to'; fromYear: number }
  | { name: 'sessionType'; fromYear: number; toYear: number }
  | { name: 'format'; fromYear: number; toYear: number; sessionType: SessionTypeFilter }
  | { name: 'fetching'; query: SessionQuery }
  | { name: 'summary'; query: SessionQuery; summary: RunSummary };

export type ScreenName = Screen['name'];

export function getBackScreen(screen: Screen): Screen | null {
  switch (screen.name) {
    case 'from':
      return null;
    case 'to':
      return { name: 'from' };
    case 'sessionType':
      return { name: 'to', fromYear: screen.fromYear };
    case 'format':
      return { name: 'sessionType', fromYear: screen.fromYear, toYear: screen.toYear };
    case 'fetching':
    case 'summary':
      return {
        name: 'format',
        fromYear: screen.query.fromYear,
        toYear: screen.query.toYear,
        sessionType: screen.query.sessionType,
      };
  }
}

function seasonLabel(fromYear: number, toYear: number): string {
  return fromYear === toYear ? `${fromYear}` : `${fromYear}-${toYear}`;
}

export function getBreadcrumb(screen: Screen): string[] {
  switch (screen.name) {
    case 'from':
      return ['From season'];
    case 'to':
      return [`${screen.fromYear}`, 'To season'];
    case 'sessionType':
      return [seasonLabel(screen.fromYear, screen.toYear), 'Session type'];
    case 'format':
      return [
        seasonLabel(screen.fromYear, screen.toYear),
        SESSION_TYPE_LABELS[screen.sessionType],
        'Format',
      ];
    case 'fetching':
    case 'summary':
      return [
        seasonLabel(screen.query.fromYear, screen.query.toYear),
        SESSION_TYPE_LABELS[screen.query.sessionType],
        screen.name === 'fetching' ? 'Fetching' : 'Summary',
      ];
  }
}
