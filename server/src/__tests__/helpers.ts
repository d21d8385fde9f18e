import { calculateReviewDates, type LearningEntry } from '@recall-curve/shared';
import { MemoryEntryStore } from '../db/store';
import type { Analyzer } from '../services/analysis';
import type { Env } from '../types';

/** 2026-10-19, midday local time */
export const FIXED_NOW = new Date(2026, 9, 19, 12, 0, 0);
export const TODAY = '2026-10-19';

export function createTestEntry(
  date: string,
  items: string[] = ['Irregular verbs'],
  completed: number[] = []
): LearningEntry {
  return {
    date,
    items,
    reviews: calculateReviewDates(date).map((review, i) => ({
      ...review,
      completed: completed.includes(i),
    })),
  };
}

export function createTestEnv(
  entries: LearningEntry[] = [],
  analyzer: Analyzer | null = null
): Env & { STORE: MemoryEntryStore } {
  return {
    STORE: new MemoryEntryStore(entries),
    ANALYZER: analyzer,
    CLOCK: () => FIXED_NOW,
  };
}
