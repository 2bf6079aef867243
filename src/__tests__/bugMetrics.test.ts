import { describe, it, expect } from '@jest/globals';
import {
  computeBurndown,
  isClosedBy,
  isOpenAt,
  listHighSeverity,
  summarizeBurndown,
  summarizeBySeverity,
  summarizeByState,
} from '../bugMetrics.js';
import type { Bug } from '../workItemApi.js';

const bugs: Bug[] = [
  {
    id: 1,
    title: 'A',
    state: 'Closed',
    severity: '2 - High',
    tags: ['Exploratory'],
    createdDate: '2024-01-01T09:00:00Z',
    closedDate: '2024-01-02T12:00:00Z',
  },
  {
    id: 2,
    title: 'B',
    state: 'Active',
    severity: '3 - Medium',
    tags: ['Test Case Update needed'],
    createdDate: '2024-01-01T10:00:00Z',
  },
  {
    id: 3,
    title: 'C',
    state: 'Resolved',
    severity: '3 - Medium',
    tags: [],
    createdDate: '2024-01-02T08:00:00Z',
    closedDate: '2024-01-03T00:00:00Z',
  },
  { id: 4, title: 'D', state: 'Triaged', tags: [] },
  { id: 5, title: 'E', state: 'Blocked', tags: [] },
];

describe('isOpenAt', () => {
  it('should count a bug from creation until it closes', () => {
    expect(isOpenAt(bugs[0], new Date('2024-01-01T09:00:00Z'))).toBe(true);
    expect(isOpenAt(bugs[0], new Date('2024-01-02T12:00:00Z'))).toBe(false);
    expect(isOpenAt(bugs[0], new Date('2024-01-01T08:59:59Z'))).toBe(false);
  });

  it('should never count bugs without a creation date', () => {
    expect(isOpenAt(bugs[3], new Date('2024-06-01T00:00:00Z'))).toBe(false);
  });
});

describe('isClosedBy', () => {
  it('should count a bug as closed from its close time on', () => {
    expect(isClosedBy(bugs[0], new Date('2024-01-02T11:59:59Z'))).toBe(false);
    expect(isClosedBy(bugs[0], new Date('2024-01-02T12:00:00Z'))).toBe(true);
    expect(isClosedBy(bugs[1], new Date('2024-06-01T00:00:00Z'))).toBe(false);
  });
});

describe('computeBurndown', () => {
  it('should count open bugs at each UTC midnight in the window', () => {
    const burndown = computeBurndown(bugs, {
      start: new Date('2024-01-01T15:00:00Z'),
      end: new Date('2024-01-03T06:00:00Z'),
    });

    expect(burndown).toEqual([
      { date: '2024-01-01', open: 0, closed: 0, byCategory: { exploratory: 0, testCaseUpdate: 0 } },
      { date: '2024-01-02', open: 2, closed: 0, byCategory: { exploratory: 1, testCaseUpdate: 1 } },
      { date: '2024-01-03', open: 1, closed: 2, byCategory: { exploratory: 0, testCaseUpdate: 1 } },
    ]);
  });

  it('should use the given categories', () => {
    const burndown = computeBurndown(bugs, {
      start: new Date('2024-01-02T00:00:00Z'),
      end: new Date('2024-01-02T00:00:00Z'),
      categories: { needsUpdate: 'UPDATE' },
    });

    expect(burndown).toEqual([{ date: '2024-01-02', open: 2, closed: 0, byCategory: { needsUpdate: 1 } }]);
  });

  it('should be empty when the window ends before it starts', () => {
    expect(
      computeBurndown(bugs, { start: new Date('2024-01-03T00:00:00Z'), end: new Date('2024-01-01T00:00:00Z') })
    ).toEqual([]);
  });
});

describe('summarizeBurndown', () => {
  it('should report last-day totals and the change since the day before', () => {
    const burndown = computeBurndown(bugs, {
      start: new Date('2024-01-01T00:00:00Z'),
      end: new Date('2024-01-03T00:00:00Z'),
    });

    expect(summarizeBurndown(burndown)).toEqual({
      date: '2024-01-03',
      open: 1,
      openDelta: -1,
      closed: 2,
      closedDelta: 2,
    });
  });

  it('should report no change for a single day', () => {
    const burndown = computeBurndown(bugs, {
      start: new Date('2024-01-02T00:00:00Z'),
      end: new Date('2024-01-02T00:00:00Z'),
    });

    expect(summarizeBurndown(burndown)).toEqual({
      date: '2024-01-02',
      open: 2,
      openDelta: 0,
      closed: 0,
      closedDelta: 0,
    });
    expect(summarizeBurndown([])).toBeUndefined();
  });
});

describe('summarizeByState', () => {
  it('should list well-known states first, then the rest by count and name', () => {
    expect(summarizeByState(bugs)).toEqual([
      { label: 'Closed', count: 1, percent: 20 },
      { label: 'Resolved', count: 1, percent: 20 },
      { label: 'Active', count: 1, percent: 20 },
      { label: 'Blocked', count: 1, percent: 20 },
      { label: 'Triaged', count: 1, percent: 20 },
    ]);
  });

  it('should be empty without bugs', () => {
    expect(summarizeByState([])).toEqual([]);
  });
});

describe('summarizeBySeverity', () => {
  it('should count bugs without a severity as Unspecified', () => {
    expect(summarizeBySeverity(bugs)).toEqual([
      { label: '2 - High', count: 1, percent: 20 },
      { label: '3 - Medium', count: 2, percent: 40 },
      { label: 'Unspecified', count: 2, percent: 40 },
    ]);
  });

  it('should order labels by their leading number and put unnumbered labels last', () => {
    const labelled: Bug[] = ['10 - Trivial', 'Custom', '2 - High', '10 - Trivial'].map((severity, index) => ({
      id: index + 1,
      title: `Bug ${index + 1}`,
      severity,
      tags: [],
    }));

    expect(summarizeBySeverity(labelled)).toEqual([
      { label: '2 - High', count: 1, percent: 25 },
      { label: '10 - Trivial', count: 2, percent: 50 },
      { label: 'Custom', count: 1, percent: 25 },
    ]);
  });

  it('should round shares to one decimal', () => {
    expect(summarizeBySeverity(bugs.slice(0, 3))).toEqual([
      { label: '2 - High', count: 1, percent: 33.3 },
      { label: '3 - Medium', count: 2, percent: 66.7 },
    ]);
  });
});

describe('listHighSeverity', () => {
  it('should list severity 4 and 5 bugs, most severe first, then by id', () => {
    const mixed: Bug[] = [
      { id: 9, title: 'Slow search', state: 'Active', severity: '4 - High', tags: [] },
      { id: 3, title: 'Data loss', state: 'New', severity: '5 - Critical', tags: [] },
      { id: 2, title: 'Broken login', severity: '4 - High', tags: [] },
      { id: 1, title: 'Typo', severity: '3 - Medium', tags: [] },
      { id: 4, title: 'Untriaged', tags: [] },
    ];

    expect(listHighSeverity(mixed)).toEqual([
      { id: 3, title: 'Data loss', state: 'New', severity: '5 - Critical', severityNumber: 5 },
      { id: 2, title: 'Broken login', severity: '4 - High', severityNumber: 4 },
      { id: 9, title: 'Slow search', state: 'Active', severity: '4 - High', severityNumber: 4 },
    ]);
  });
});
