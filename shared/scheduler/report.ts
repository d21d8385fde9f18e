/**
 * Markdown renderings of the review queue and progress, used for the
 * report view, the markdown endpoints and the analysis prompt.
 */

import {
  REVIEW_COUNT,
  type DueReview,
  type ProgressCard,
  type ReviewStatus,
} from './review-schedule';

export const NO_REVIEWS_MESSAGE = 'No reviews due today.';
export const NO_ENTRIES_MESSAGE = 'No study entries yet.';

const STATUS_LABELS: Record<ReviewStatus, string> = {
  completed: 'Completed',
  overdue: 'Overdue',
  pending: 'Pending',
};

/**
 * Backslash-escape characters Markdown would otherwise interpret.
 */
export function escapeMarkdown(text: string): string {
  return text.replace(/[\\`*_{}[\]()#+\-.!|<>~]/g, '\\$&');
}

function renderItems(items: readonly string[]): string {
  return items.map((item) => `- ${escapeMarkdown(item)}`).join('\n');
}

export function renderTodayReviews(reviews: readonly DueReview[]): string {
  if (reviews.length === 0) {
    return NO_REVIEWS_MESSAGE;
  }

  const blocks = reviews.map((review) =>
    [
      `### Studied ${review.entry_date}`,
      '',
      `Review stage: ${review.review_index + 1}/${REVIEW_COUNT}`,
      '',
      renderItems(review.items),
    ].join('\n')
  );

  return `## Today's Reviews\n\n${blocks.join('\n\n')}\n`;
}

export function renderProgress(cards: readonly ProgressCard[]): string {
  if (cards.length === 0) {
    return NO_ENTRIES_MESSAGE;
  }

  const blocks = cards.map((card) => {
    const schedule = card.reviews.map(
      (r) => `- Review ${r.stage}: ${r.due_date} (${STATUS_LABELS[r.status]})`
    );
    return [
      `### Studied ${card.date}`,
      '',
      `Reviews completed: ${card.completed_count}/${card.total}`,
      '',
      '**Items**',
      '',
      renderItems(card.items),
      '',
      '**Schedule**',
      '',
      ...schedule,
    ].join('\n');
  });

  return `## Study Progress\n\n${blocks.join('\n\n')}\n`;
}

export function statusLabel(status: ReviewStatus): string {
  return STATUS_LABELS[status];
}
