/**
 * Tests for fixed-interval review scheduling.
 *
 * Every function under test is pure, so "today" is always passed explicitly.
 */

import { describe, it, expect } from 'vitest';
import {
  REVIEW_INTERVALS,
  InvalidDateError,
  type LearningEntry,
  addDays,
  buildProgress,
  calculateReviewDates,
  completeReview,
  daysInMonth,
  formatDate,
  getExistingDates,
  getItemsForDate,
  getReviewsDueToday,
  isDateKey,
  markReviewCompleted,
  normalizeItems,
  parseDateKey,
  progressTier,
  removeEntry,
  reviewStatus,
  todayKey,
  upsertEntry,
} from './review-schedule';

// Test helpers
const createEntry = (
  date: string,
  items: string[] = ['Irregular verbs'],
  completed: number[] = []
): LearningEntry => ({
  date,
  items,
  reviews: calculateReviewDates(date).map((review, i) => ({
    ...review,
    completed: completed.includes(i),
  })),
});

const TODAY = '2026-10-19';

describe('daysInMonth', () => {
  it('handles leap years', () => {
    expect(daysInMonth(2024, 2)).toBe(29);
    expect(daysInMonth(2023, 2)).toBe(28);
    expect(daysInMonth(1900, 2)).toBe(28);
    expect(daysInMonth(2000, 2)).toBe(29);
  });

  it('returns 30 and 31 day months', () => {
    expect(daysInMonth(2026, 4)).toBe(30);
    expect(daysInMonth(2026, 12)).toBe(31);
  });
});

describe('formatDate', () => {
  it('zero-pads components', () => {
    expect(formatDate(2026, 3, 7)).toBe('2026-03-07');
  });

  it('accepts numeric strings from select inputs', () => {
    expect(formatDate('2026', '10', '19')).toBe('2026-10-19');
  });

  it('accepts Feb 29 in a leap year', () => {
    expect(formatDate(2024, 2, 29)).toBe('2024-02-29');
  });

  it('rejects days that do not exist', () => {
    expect(() => formatDate(2023, 2, 29)).toThrow(InvalidDateError);
    expect(() => formatDate(2023, 2, 29)).toThrow('Invalid date: 2023-2-29');
  });

  it('rejects out-of-range months and non-numeric input', () => {
    expect(() => formatDate(2024, 13, 1)).toThrow(InvalidDateError);
    expect(() => formatDate('abc', 1, 1)).toThrow(InvalidDateError);
    expect(() => formatDate(2024, '', 1)).toThrow(InvalidDateError);
    expect(() => formatDate(2024, 1.5, 1)).toThrow(InvalidDateError);
  });

  it('accepts years 1 through 9999 only', () => {
    expect(formatDate(1, 1, 1)).toBe('0001-01-01');
    expect(formatDate(9999, 12, 31)).toBe('9999-12-31');
    expect(() => formatDate(0, 1, 1)).toThrow('Invalid date: 0-1-1');
    expect(() => formatDate(10000, 1, 1)).toThrow('Invalid date: 10000-1-1');
  });

  it('takes only plain decimal integers from strings', () => {
    expect(formatDate(' 2026 ', '+3', '07')).toBe('2026-03-07');
    expect(() => formatDate(2026, '0x10', 1)).toThrow('Invalid date: 2026-0x10-1');
    expect(() => formatDate(2026, 1, '1e1')).toThrow('Invalid date: 2026-1-1e1');
    expect(() => formatDate('2026.0', 1, 1)).toThrow(InvalidDateError);
  });
});

describe('parseDateKey', () => {
  it('splits a valid key', () => {
    expect(parseDateKey('2026-10-19')).toEqual({ year: 2026, month: 10, day: 19 });
  });

  it('rejects malformed and impossible keys', () => {
    expect(() => parseDateKey('2026-2-3')).toThrow(InvalidDateError);
    expect(() => parseDateKey('2026-02-30')).toThrow(InvalidDateError);
    expect(isDateKey('2026-02-28')).toBe(true);
    expect(isDateKey('not-a-date')).toBe(false);
  });
});

describe('addDays', () => {
  it('crosses month and year boundaries', () => {
    expect(addDays('2025-12-31', 1)).toBe('2026-01-01');
    expect(addDays('2024-02-28', 1)).toBe('2024-02-29');
    expect(addDays('2023-02-28', 1)).toBe('2023-03-01');
  });

  it('supports negative offsets', () => {
    expect(addDays('2026-03-01', -1)).toBe('2026-02-28');
  });

  it('refuses to leave years 1-9999', () => {
    expect(addDays('9999-12-30', 1)).toBe('9999-12-31');
    expect(() => addDays('9999-12-31', 1)).toThrow(
      'Invalid date: 9999-12-31 plus 1 days is outside years 1-9999'
    );
    expect(() => addDays('0001-01-01', -1)).toThrow(InvalidDateError);
  });
});

describe('todayKey', () => {
  it('uses local calendar fields', () => {
    expect(todayKey(new Date(2026, 9, 19, 23, 30))).toBe('2026-10-19');
    expect(todayKey(new Date(2026, 0, 5, 0, 0))).toBe('2026-01-05');
  });
});

describe('calculateReviewDates', () => {
  it('creates one pending review per interval', () => {
    const reviews = calculateReviewDates('2024-01-15');
    expect(reviews).toHaveLength(REVIEW_INTERVALS.length);
    expect(reviews.map((r) => r.dueDate)).toEqual([
      '2024-01-16',
      '2024-01-17',
      '2024-01-19',
      '2024-01-22',
      '2024-01-29',
      '2024-02-05',
      '2024-02-14',
    ]);
    expect(reviews.every((r) => r.completed === false)).toBe(true);
  });

  it('schedules the last reviews of year 9999', () => {
    expect(calculateReviewDates('9999-12-01')[6].dueDate).toBe('9999-12-31');
  });

  it('rejects a study date whose reviews run past year 9999', () => {
    expect(() => calculateReviewDates('9999-12-25')).toThrow(
      'Invalid date: 9999-12-25 plus 7 days is outside years 1-9999'
    );
  });

  it('accounts for leap days', () => {
    const reviews = calculateReviewDates('2024-02-20');
    expect(reviews[3].dueDate).toBe('2024-02-27');
    expect(reviews[4].dueDate).toBe('2024-03-05');
    expect(reviews[6].dueDate).toBe('2024-03-21');
  });

  it('rejects an invalid study date', () => {
    expect(() => calculateReviewDates('2024-02-31')).toThrow(InvalidDateError);
  });
});

describe('normalizeItems', () => {
  it('drops blank items and keeps the rest verbatim', () => {
    expect(normalizeItems(['Verbs', '   ', '', ' Past tense '])).toEqual(['Verbs', ' Past tense ']);
  });
});

describe('entry lookups', () => {
  const entries = [createEntry('2026-10-01'), createEntry('2026-10-15', ['Kanji']), createEntry('2026-09-20')];

  it('lists dates newest first', () => {
    expect(getExistingDates(entries)).toEqual(['2026-10-15', '2026-10-01', '2026-09-20']);
  });

  it('returns items for a date or an empty list', () => {
    expect(getItemsForDate(entries, '2026-10-15')).toEqual(['Kanji']);
    expect(getItemsForDate(entries, '2026-10-16')).toEqual([]);
  });
});

describe('upsertEntry', () => {
  it('appends a new entry with a fresh schedule', () => {
    const result = upsertEntry([], '2026-10-19', ['Verbs', 'Nouns']);
    expect(result.created).toBe(true);
    expect(result.entries).toHaveLength(1);
    expect(result.entry).toEqual({
      date: '2026-10-19',
      items: ['Verbs', 'Nouns'],
      reviews: calculateReviewDates('2026-10-19'),
    });
  });

  it('replaces items of an existing entry and keeps its reviews', () => {
    const existing = createEntry('2026-10-10', ['Old item'], [0, 1]);
    const result = upsertEntry([existing], '2026-10-10', ['New item']);

    expect(result.created).toBe(false);
    expect(result.entries).toHaveLength(1);
    expect(result.entry.items).toEqual(['New item']);
    expect(result.entry.reviews).toEqual(existing.reviews);
    // Input untouched
    expect(existing.items).toEqual(['Old item']);
  });
});

describe('removeEntry', () => {
  it('removes the matching entry', () => {
    const result = removeEntry([createEntry('2026-10-01'), createEntry('2026-10-02')], '2026-10-01');
    expect(result.removed).toBe(true);
    expect(result.entries.map((e) => e.date)).toEqual(['2026-10-02']);
  });

  it('reports when nothing matched', () => {
    const result = removeEntry([createEntry('2026-10-01')], '2026-09-01');
    expect(result.removed).toBe(false);
    expect(result.entries).toHaveLength(1);
  });
});

describe('getReviewsDueToday', () => {
  // 2026-10-18 + 1 day and 2026-10-12 + 7 days both land on TODAY
  const yesterday = createEntry('2026-10-18', ['Yesterday item']);
  const lastWeek = createEntry('2026-10-12', ['Last week item']);
  // 2026-10-17 + 2 days lands on TODAY but is already done
  const done = createEntry('2026-10-17', ['Done item'], [1]);
  // Studied today with a hand-made review also due today
  const studiedToday: LearningEntry = {
    date: TODAY,
    items: ['Fresh item'],
    reviews: [{ dueDate: TODAY, completed: false }],
  };

  it('returns pending reviews due today, oldest study date first', () => {
    const due = getReviewsDueToday([yesterday, lastWeek, done, studiedToday], TODAY);
    expect(due).toEqual([
      { entry_date: '2026-10-12', items: ['Last week item'], review_index: 3, due_date: TODAY },
      { entry_date: '2026-10-18', items: ['Yesterday item'], review_index: 0, due_date: TODAY },
    ]);
  });

  it('leaves out overdue reviews', () => {
    expect(getReviewsDueToday([yesterday], '2026-10-20')).toEqual([
      { entry_date: '2026-10-18', items: ['Yesterday item'], review_index: 1, due_date: '2026-10-20' },
    ]);
    expect(getReviewsDueToday([yesterday], '2026-10-21')).toEqual([]);
  });
});

describe('markReviewCompleted', () => {
  const entries = [createEntry('2026-10-18'), createEntry('2026-10-12')];

  it('completes the review at the given position of the due list', () => {
    const result = markReviewCompleted(entries, 1, TODAY);

    expect(result.completed?.entry_date).toBe('2026-10-18');
    expect(result.entries[0].reviews[0].completed).toBe(true);
    expect(result.entries[1].reviews[3].completed).toBe(false);
    expect(getReviewsDueToday(result.entries, TODAY)).toHaveLength(1);
    // Input untouched
    expect(entries[0].reviews[0].completed).toBe(false);
  });

  it('ignores positions outside the due list', () => {
    expect(markReviewCompleted(entries, 2, TODAY).completed).toBeNull();
    expect(markReviewCompleted(entries, -1, TODAY).completed).toBeNull();
    expect(markReviewCompleted(entries, 0.5, TODAY).entries).toEqual(entries);
  });
});

describe('completeReview', () => {
  it('marks a review by entry date and index', () => {
    const result = completeReview([createEntry('2026-10-01')], '2026-10-01', 6);
    expect(result.completed).toEqual({ dueDate: '2026-10-31', completed: true });
    expect(result.entries[0].reviews[6].completed).toBe(true);
  });

  it('returns null for unknown entries or indexes', () => {
    const entries = [createEntry('2026-10-01')];
    expect(completeReview(entries, '2026-10-02', 0).completed).toBeNull();
    expect(completeReview(entries, '2026-10-01', 7).completed).toBeNull();
  });
});

describe('reviewStatus', () => {
  it('classifies completed, overdue and pending reviews', () => {
    expect(reviewStatus({ dueDate: '2026-10-01', completed: true }, TODAY)).toBe('completed');
    expect(reviewStatus({ dueDate: '2026-10-18', completed: false }, TODAY)).toBe('overdue');
    expect(reviewStatus({ dueDate: TODAY, completed: false }, TODAY)).toBe('pending');
    expect(reviewStatus({ dueDate: '2026-11-01', completed: false }, TODAY)).toBe('pending');
  });
});

describe('progressTier', () => {
  it('maps completion counts to tiers', () => {
    expect(progressTier(7)).toBe('complete');
    expect(progressTier(4)).toBe('advanced');
    expect(progressTier(3)).toBe('early');
    expect(progressTier(0)).toBe('early');
  });
});

describe('buildProgress', () => {
  it('summarises entries in chronological order', () => {
    const cards = buildProgress(
      [createEntry('2026-10-15', ['B'], [0]), createEntry('2026-09-01', ['A'], [0, 1, 2, 3, 4, 5, 6])],
      TODAY
    );

    expect(cards.map((c) => c.date)).toEqual(['2026-09-01', '2026-10-15']);
    expect(cards[0].completed_count).toBe(7);
    expect(cards[0].tier).toBe('complete');
    expect(cards[1].completed_count).toBe(1);
    expect(cards[1].tier).toBe('early');
    expect(cards[1].reviews.map((r) => r.status)).toEqual([
      'completed', // 10-16
      'overdue', // 10-17
      'pending', // 10-19
      'pending',
      'pending',
      'pending',
      'pending',
    ]);
    expect(cards[1].reviews[0]).toEqual({ stage: 1, due_date: '2026-10-16', completed: true, status: 'completed' });
  });
});
