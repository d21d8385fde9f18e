import {
  buildProgress,
  completeReview,
  getExistingDates as existingDates,
  getItemsForDate as itemsForDate,
  getReviewsDueToday,
  markReviewCompleted,
  removeEntry,
  upsertEntry,
  type DateKey,
  type DueReview,
  type LearningEntry,
  type ProgressCard,
  type ReviewRecord,
} from '@recall-curve/shared';
import type { EntryStore } from './store';

// ============ Reads ============

/**
 * All entries, oldest study date first.
 */
export async function listEntries(store: EntryStore): Promise<LearningEntry[]> {
  const entries = await store.load();
  return entries.sort((a, b) => a.date.localeCompare(b.date));
}

export async function getExistingDates(store: EntryStore): Promise<DateKey[]> {
  return existingDates(await store.load());
}

/**
 * Items for a study date, or null when no entry exists for it.
 */
export async function getItemsForDate(store: EntryStore, date: DateKey): Promise<string[] | null> {
  const entries = await store.load();
  if (!entries.some((e) => e.date === date)) {
    return null;
  }
  return itemsForDate(entries, date);
}

export async function getDueReviews(store: EntryStore, today: DateKey): Promise<DueReview[]> {
  return getReviewsDueToday(await store.load(), today);
}

export async function getProgress(store: EntryStore, today: DateKey): Promise<ProgressCard[]> {
  return buildProgress(await store.load(), today);
}

// ============ Writes ============

export async function addLearningEntry(
  store: EntryStore,
  date: DateKey,
  items: string[]
): Promise<{ entry: LearningEntry; created: boolean }> {
  const result = upsertEntry(await store.load(), date, items);
  await store.save(result.entries);
  return { entry: result.entry, created: result.created };
}

export async function deleteEntry(store: EntryStore, date: DateKey): Promise<boolean> {
  const result = removeEntry(await store.load(), date);
  if (result.removed) {
    await store.save(result.entries);
  }
  return result.removed;
}

/**
 * Complete the review at `dueIndex` in today's due list.
 */
export async function markDueReviewCompleted(
  store: EntryStore,
  dueIndex: number,
  today: DateKey
): Promise<DueReview | null> {
  const result = markReviewCompleted(await store.load(), dueIndex, today);
  if (result.completed) {
    await store.save(result.entries);
  }
  return result.completed;
}

export async function completeEntryReview(
  store: EntryStore,
  date: DateKey,
  reviewIndex: number
): Promise<ReviewRecord | null> {
  const result = completeReview(await store.load(), date, reviewIndex);
  if (result.completed) {
    await store.save(result.entries);
  }
  return result.completed;
}
