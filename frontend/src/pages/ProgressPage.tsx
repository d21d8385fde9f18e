import { useState } from 'react';
import { useMutation, useQuery, useQueryClient } from '@tanstack/react-query';
import { statusLabel } from '@recall-curve/shared';
import { deleteEntry, getExistingDates, getProgress, getProgressMarkdown } from '../api/client';
import { invalidateEntryQueries, queryKeys } from '../api/queries';
import { Loading, ErrorMessage, EmptyState } from '../components/Loading';
import { ItemList } from '../components/ItemList';
import { ProgressReport } from '../components/ProgressReport';
import type { ProgressCard } from '../types';

function ProgressEntryCard({ card }: { card: ProgressCard }) {
  return (
    <div className="learning-card">
      <div className="status-bar">
        <div className="status-date">
          <span className="section-title">Studied</span> {card.date}
        </div>
        <div className={`progress-indicator tier-${card.tier}`}>
          Reviews completed {card.completed_count}/{card.total}
        </div>
      </div>
      <ItemList items={card.items} />
      <span className="section-title">Review schedule</span>
      <div className="review-dates">
        {card.reviews.map((review) => (
          <div key={review.stage} className={`review-date review-${review.status}`}>
            #{review.stage}: {review.due_date} ({statusLabel(review.status)})
          </div>
        ))}
      </div>
    </div>
  );
}

function DeleteEntryControl() {
  const queryClient = useQueryClient();
  const [selectedDate, setSelectedDate] = useState('');
  const [message, setMessage] = useState<string | null>(null);

  const datesQuery = useQuery({
    queryKey: queryKeys.dates,
    queryFn: getExistingDates,
  });

  const deleteMutation = useMutation({
    mutationFn: (date: string) => deleteEntry(date),
    onSuccess: (result) => {
      setMessage(result.message);
      setSelectedDate('');
      invalidateEntryQueries(queryClient);
    },
  });

  const handleDelete = () => {
    if (!selectedDate) {
      setMessage('Choose a date first');
      return;
    }
    if (!window.confirm(`Delete the study entry for ${selectedDate}? This cannot be undone.`)) {
      return;
    }
    deleteMutation.mutate(selectedDate);
  };

  const dates = datesQuery.data || [];

  return (
    <div className="card mb-4">
      <div className="form-row">
        <select value={selectedDate} onChange={(e) => setSelectedDate(e.target.value)}>
          <option value="">Choose a date to delete</option>
          {dates.map((date) => (
            <option key={date} value={date}>{date}</option>
          ))}
        </select>
        <button className="btn btn-danger" onClick={handleDelete} disabled={deleteMutation.isPending}>
          {deleteMutation.isPending ? 'Deleting...' : 'Delete entry'}
        </button>
      </div>
      {message && <p className="text-light mt-2">{message}</p>}
      {deleteMutation.error && (
        <p className="text-error mt-2">
          {deleteMutation.error instanceof Error ? deleteMutation.error.message : 'Failed to delete entry'}
        </p>
      )}
    </div>
  );
}

export function ProgressPage() {
  const [showReport, setShowReport] = useState(false);

  const progressQuery = useQuery({
    queryKey: queryKeys.progress,
    queryFn: getProgress,
  });

  const reportQuery = useQuery({
    queryKey: queryKeys.progressMarkdown,
    queryFn: getProgressMarkdown,
    enabled: showReport,
  });

  if (progressQuery.isLoading) {
    return <Loading />;
  }

  if (progressQuery.error) {
    const msg = progressQuery.error instanceof Error ? progressQuery.error.message : 'Failed to load progress';
    return <ErrorMessage message={msg} />;
  }

  const cards = progressQuery.data || [];

  return (
    <div className="page">
      <div className="container">
        <DeleteEntryControl />

        <div className="flex justify-between items-center mb-2">
          <h2>Study progress</h2>
          <button className="btn btn-secondary" onClick={() => setShowReport((v) => !v)}>
            {showReport ? 'Show cards' : 'Show report'}
          </button>
        </div>

        {showReport ? (
          <ProgressReport
            markdown={reportQuery.data}
            isLoading={reportQuery.isLoading}
            error={reportQuery.error}
          />
        ) : cards.length === 0 ? (
          <EmptyState
            icon="📅"
            title="No study entries yet"
            description="Add what you studied today and the reviews will be scheduled for you"
          />
        ) : (
          cards.map((card) => <ProgressEntryCard key={card.date} card={card} />)
        )}
      </div>
    </div>
  );
}
