import { useMutation, useQuery, useQueryClient } from '@tanstack/react-query';
import { REVIEW_COUNT } from '@recall-curve/shared';
import { completeReview, getTodayReviews } from '../api/client';
import { queryKeys } from '../api/queries';
import { Loading, ErrorMessage, EmptyState } from '../components/Loading';
import { ItemList } from '../components/ItemList';
import type { DueReview } from '../types';

function ReviewCard({
  review,
  onComplete,
  isCompleting,
}: {
  review: DueReview;
  onComplete: () => void;
  isCompleting: boolean;
}) {
  return (
    <div className="learning-card">
      <div className="status-bar">
        <div className="status-date">
          <span className="section-title">Studied</span> {review.entry_date}
        </div>
        <div className="progress-indicator tier-pending">
          Review stage {review.review_index + 1}/{REVIEW_COUNT}
        </div>
      </div>
      <ItemList items={review.items} />
      <button className="btn btn-primary" onClick={onComplete} disabled={isCompleting}>
        {isCompleting ? 'Saving...' : 'Complete review'}
      </button>
    </div>
  );
}

export function TodayReviewsPage() {
  const queryClient = useQueryClient();

  const reviewsQuery = useQuery({
    queryKey: queryKeys.reviewsToday,
    queryFn: getTodayReviews,
  });

  const completeMutation = useMutation({
    mutationFn: (review: DueReview) => completeReview(review.entry_date, review.review_index),
    onSuccess: (remaining) => {
      queryClient.setQueryData(queryKeys.reviewsToday, remaining);
      queryClient.invalidateQueries({ queryKey: queryKeys.progress });
      queryClient.invalidateQueries({ queryKey: queryKeys.progressMarkdown });
    },
  });

  if (reviewsQuery.isLoading) {
    return <Loading />;
  }

  if (reviewsQuery.error) {
    return <ErrorMessage message="Failed to load today's reviews" />;
  }

  const reviews = reviewsQuery.data || [];
  const completing = completeMutation.isPending ? completeMutation.variables : undefined;

  return (
    <div className="page">
      <div className="container">
        <h2>Today's reviews</h2>
        {completeMutation.error && (
          <ErrorMessage
            message={completeMutation.error instanceof Error ? completeMutation.error.message : 'Failed to save review'}
          />
        )}
        {reviews.length === 0 ? (
          <EmptyState icon="✅" title="Nothing to review today" description="Come back tomorrow." />
        ) : (
          reviews.map((review) => (
            <ReviewCard
              key={`${review.entry_date}-${review.review_index}`}
              review={review}
              onComplete={() => completeMutation.mutate(review)}
              isCompleting={
                completing?.entry_date === review.entry_date &&
                completing.review_index === review.review_index
              }
            />
          ))
        )}
      </div>
    </div>
  );
}
