/**
 * Fixed-Interval Review Scheduling
 *
 * Every study entry gets seven reviews at fixed offsets after the study date,
 * following the Ebbinghaus forgetting curve. All functions here are pure: they
 * take the full entry list (and "today" as a date key) and return new values,
 * so the same inputs always produce the same schedule.
 *
 * Used by both the server (persistence + API) and the frontend (date pickers).
 */

// ============ Types ============

/** Calendar date in `YYYY-MM-DD` form. */
export type DateKey = string;

export interface ReviewRecord {
  dueDate: DateKey;
  completed: boolean;
}

export interface LearningEntry {
  date: DateKey;
  items: string[];
  reviews: ReviewRecord[];
}

export interface DueReview {
  entry_date: DateKey;
  items: string[];
  review_index: number; // zero-based; stage shown to users is index + 1
  due_date: DateKey;
}

export type ReviewStatus = 'completed' | 'overdue' | 'pending';

export type ProgressTier = 'complete' | 'advanced' | 'early';

export interface ProgressReview {
  stage: number;
  due_date: DateKey;
  completed: boolean;
  status: ReviewStatus;
}

export interface ProgressCard {
  date: DateKey;
  items: string[];
  completed_count: number;
  total: number;
  tier: ProgressTier;
  reviews: ProgressReview[];
}

// ============ Constants ============

/** Days after the study date on which each review falls. */
export const REVIEW_INTERVALS: readonly number[] = [1, 2, 4, 7, 14, 21, 30];

export const REVIEW_COUNT = REVIEW_INTERVALS.length;

/** Entries hold at most this many study items. */
export const MAX_ITEMS = 3;

const DATE_KEY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

const MIN_YEAR = 1;
const MAX_YEAR = 9999;

export class InvalidDateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidDateError';
  }
}

// ============ Date helpers ============

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

const MONTH_DAYS = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

/**
 * Number of days in a month (1-12) of a given year.
 */
export function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) {
    return 29;
  }
  return MONTH_DAYS[month - 1] ?? 0;
}

const INTEGER_PATTERN = /^\s*[+-]?\d+\s*$/;

function toInteger(value: number | string): number | null {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? value : null;
  }
  return INTEGER_PATTERN.test(value) ? Number(value) : null;
}

function pad(n: number, width: number): string {
  return String(n).padStart(width, '0');
}

/**
 * Format date components into a `YYYY-MM-DD` key, rejecting dates that
 * do not exist on the calendar.
 */
export function formatDate(
  year: number | string,
  month: number | string,
  day: number | string
): DateKey {
  const y = toInteger(year);
  const m = toInteger(month);
  const d = toInteger(day);

  if (
    y === null || m === null || d === null ||
    y < MIN_YEAR || y > MAX_YEAR ||
    m < 1 || m > 12 ||
    d < 1 || d > daysInMonth(y, m)
  ) {
    throw new InvalidDateError(`Invalid date: ${year}-${month}-${day}`);
  }

  return `${pad(y, 4)}-${pad(m, 2)}-${pad(d, 2)}`;
}

/**
 * Split a date key into its components. Throws for malformed keys and for
 * well-formed keys naming a day that does not exist.
 */
export function parseDateKey(key: string): { year: number; month: number; day: number } {
  const match = DATE_KEY_PATTERN.exec(key);
  if (!match) {
    throw new InvalidDateError(`Invalid date: ${key}`);
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  // Round-trip through formatDate for the calendar check
  formatDate(year, month, day);
  return { year, month, day };
}

export function isDateKey(key: string): boolean {
  try {
    parseDateKey(key);
    return true;
  } catch {
    return false;
  }
}

function toUtcDate(key: DateKey): Date {
  const { year, month, day } = parseDateKey(key);
  const date = new Date(0);
  // setUTCFullYear keeps years below 100 literal (Date.UTC would map them to 19xx)
  date.setUTCFullYear(year, month - 1, day);
  return date;
}

/**
 * Calendar arithmetic on date keys. Works in UTC so DST shifts never move a day.
 * Throws when the result falls outside years 1-9999.
 */
export function addDays(key: DateKey, days: number): DateKey {
  const date = toUtcDate(key);
  date.setUTCDate(date.getUTCDate() + days);
  const year = date.getUTCFullYear();
  if (year < MIN_YEAR || year > MAX_YEAR) {
    throw new InvalidDateError(`Invalid date: ${key} plus ${days} days is outside years ${MIN_YEAR}-${MAX_YEAR}`);
  }
  return `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1, 2)}-${pad(date.getUTCDate(), 2)}`;
}

/**
 * Local-time date key for a moment (defaults to now).
 */
export function todayKey(now: Date = new Date()): DateKey {
  return `${pad(now.getFullYear(), 4)}-${pad(now.getMonth() + 1, 2)}-${pad(now.getDate(), 2)}`;
}

// ============ Scheduling ============

/**
 * Review records for an entry studied on `date`, one per interval, none completed.
 */
export function calculateReviewDates(date: DateKey): ReviewRecord[] {
  return REVIEW_INTERVALS.map((interval) => ({
    dueDate: addDays(date, interval),
    completed: false,
  }));
}

/**
 * Drop blank items. Non-blank items are kept exactly as typed.
 */
export function normalizeItems(items: readonly string[]): string[] {
  return items.filter((item) => item.trim() !== '');
}

export function getExistingDates(entries: readonly LearningEntry[]): DateKey[] {
  return entries
    .map((entry) => entry.date)
    .sort((a, b) => b.localeCompare(a));
}

export function getItemsForDate(entries: readonly LearningEntry[], date: DateKey): string[] {
  const entry = entries.find((e) => e.date === date);
  return entry ? [...entry.items] : [];
}

/**
 * Add a new entry, or replace the items of the entry already studied on that
 * date. An existing entry keeps its review schedule and completion flags.
 */
export function upsertEntry(
  entries: readonly LearningEntry[],
  date: DateKey,
  items: readonly string[]
): { entries: LearningEntry[]; entry: LearningEntry; created: boolean } {
  const index = entries.findIndex((e) => e.date === date);

  if (index >= 0) {
    const entry: LearningEntry = { ...entries[index], items: [...items] };
    const next = [...entries];
    next[index] = entry;
    return { entries: next, entry, created: false };
  }

  const entry: LearningEntry = {
    date,
    items: [...items],
    reviews: calculateReviewDates(date),
  };
  return { entries: [...entries, entry], entry, created: true };
}

export function removeEntry(
  entries: readonly LearningEntry[],
  date: DateKey
): { entries: LearningEntry[]; removed: boolean } {
  const next = entries.filter((entry) => entry.date !== date);
  return { entries: next, removed: next.length !== entries.length };
}

/**
 * Pending reviews due exactly today, oldest study date first. Entries
 * studied today are left out.
 */
export function getReviewsDueToday(entries: readonly LearningEntry[], today: DateKey): DueReview[] {
  const due: DueReview[] = [];

  for (const entry of entries) {
    if (entry.date === today) continue;
    entry.reviews.forEach((review, i) => {
      if (review.dueDate === today && !review.completed) {
        due.push({
          entry_date: entry.date,
          items: [...entry.items],
          review_index: i,
          due_date: review.dueDate,
        });
      }
    });
  }

  return due.sort((a, b) => a.entry_date.localeCompare(b.entry_date));
}

/**
 * Mark one review of one entry as completed. Returns `completed: null` (and
 * the input list untouched) when the entry or review index does not exist.
 */
export function completeReview(
  entries: readonly LearningEntry[],
  date: DateKey,
  reviewIndex: number
): { entries: LearningEntry[]; completed: ReviewRecord | null } {
  const entryIndex = entries.findIndex((e) => e.date === date);
  const entry = entryIndex >= 0 ? entries[entryIndex] : undefined;
  const review = entry?.reviews[reviewIndex];

  if (!entry || !review || !Number.isInteger(reviewIndex)) {
    return { entries: [...entries], completed: null };
  }

  const completed: ReviewRecord = { ...review, completed: true };
  const reviews = entry.reviews.map((r, i) => (i === reviewIndex ? completed : r));
  const next = [...entries];
  next[entryIndex] = { ...entry, reviews };
  return { entries: next, completed };
}

/**
 * Mark the `dueIndex`-th entry of today's due list (as returned by
 * getReviewsDueToday) as completed.
 */
export function markReviewCompleted(
  entries: readonly LearningEntry[],
  dueIndex: number,
  today: DateKey
): { entries: LearningEntry[]; completed: DueReview | null } {
  const due = getReviewsDueToday(entries, today);
  const target = Number.isInteger(dueIndex) ? due[dueIndex] : undefined;

  if (!target) {
    return { entries: [...entries], completed: null };
  }

  const result = completeReview(entries, target.entry_date, target.review_index);
  return { entries: result.entries, completed: target };
}

// ============ Progress ============

export function reviewStatus(review: ReviewRecord, today: DateKey): ReviewStatus {
  if (review.completed) return 'completed';
  return review.dueDate < today ? 'overdue' : 'pending';
}

export function progressTier(completedCount: number): ProgressTier {
  if (completedCount >= REVIEW_COUNT) return 'complete';
  if (completedCount > 3) return 'advanced';
  return 'early';
}

/**
 * One progress card per entry, oldest study date first.
 */
export function buildProgress(entries: readonly LearningEntry[], today: DateKey): ProgressCard[] {
  return [...entries]
    .sort((a, b) => a.date.localeCompare(b.date))
    .map((entry) => {
      const completedCount = entry.reviews.filter((r) => r.completed).length;
      return {
        date: entry.date,
        items: [...entry.items],
        completed_count: completedCount,
        total: REVIEW_COUNT,
        tier: progressTier(completedCount),
        reviews: entry.reviews.map((review, i) => ({
          stage: i + 1,
          due_date: review.dueDate,
          completed: review.completed,
          status: reviewStatus(review, today),
        })),
      };
    });
}
