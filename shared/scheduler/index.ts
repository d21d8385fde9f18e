/**
 * Shared Scheduler Module - Fixed Ebbinghaus Intervals
 *
 * Review-date computation, due-review filtering, completion marking and
 * progress summaries. Used by both the frontend and the server.
 */

export {
  // Types
  type DateKey,
  type ReviewRecord,
  type LearningEntry,
  type DueReview,
  type ReviewStatus,
  type ProgressTier,
  type ProgressReview,
  type ProgressCard,

  // Constants
  REVIEW_INTERVALS,
  REVIEW_COUNT,
  MAX_ITEMS,
  InvalidDateError,

  // Dates
  daysInMonth,
  formatDate,
  parseDateKey,
  isDateKey,
  addDays,
  todayKey,

  // Core functions
  calculateReviewDates,
  normalizeItems,
  getExistingDates,
  getItemsForDate,
  upsertEntry,
  removeEntry,
  getReviewsDueToday,
  completeReview,
  markReviewCompleted,

  // Progress
  reviewStatus,
  progressTier,
  buildProgress,
} from './review-schedule';

export {
  NO_REVIEWS_MESSAGE,
  NO_ENTRIES_MESSAGE,
  escapeMarkdown,
  renderTodayReviews,
  renderProgress,
  statusLabel,
} from './report';
