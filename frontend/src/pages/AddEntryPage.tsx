import { useEffect, useState } from 'react';
import { useMutation, useQuery, useQueryClient } from '@tanstack/react-query';
import { MAX_ITEMS, parseDateKey } from '@recall-curve/shared';
import { getEntryItems, getExistingDates, saveEntry } from '../api/client';
import { invalidateEntryQueries, queryKeys } from '../api/queries';
import { clampDay, dayOptions, monthOptions, yearOptions } from '../utils/date-options';

const ITEM_PLACEHOLDERS = ['e.g. French vocabulary', 'e.g. Quadratic formula', "e.g. Newton's laws"];

// How long the result message stays on screen
const MESSAGE_TIMEOUT_MS = 3000;

function emptyItems(): string[] {
  return Array.from({ length: MAX_ITEMS }, () => '');
}

export function AddEntryPage() {
  const queryClient = useQueryClient();
  const now = new Date();
  const currentYear = now.getFullYear();

  const [year, setYear] = useState(String(currentYear));
  const [month, setMonth] = useState(String(now.getMonth() + 1));
  const [day, setDay] = useState(String(now.getDate()));
  const [items, setItems] = useState<string[]>(emptyItems);
  const [selectedDate, setSelectedDate] = useState('');
  const [message, setMessage] = useState<{ text: string; isError: boolean } | null>(null);
  const [isLoadingItems, setIsLoadingItems] = useState(false);

  const datesQuery = useQuery({
    queryKey: queryKeys.dates,
    queryFn: getExistingDates,
  });

  useEffect(() => {
    if (!message) return;
    const timer = setTimeout(() => setMessage(null), MESSAGE_TIMEOUT_MS);
    return () => clearTimeout(timer);
  }, [message]);

  const saveMutation = useMutation({
    mutationFn: () => saveEntry({ year, month, day, items }),
    onSuccess: (result) => {
      setMessage({ text: result.message, isError: false });
      invalidateEntryQueries(queryClient);
    },
    onError: (err) => {
      setMessage({ text: err instanceof Error ? err.message : 'Failed to save entry', isError: true });
    },
  });

  const handleYearChange = (value: string) => {
    setYear(value);
    setDay((d) => clampDay(d, value, month));
  };

  const handleMonthChange = (value: string) => {
    setMonth(value);
    setDay((d) => clampDay(d, year, value));
  };

  const handleItemChange = (index: number, value: string) => {
    setItems((prev) => prev.map((item, i) => (i === index ? value : item)));
  };

  const handleLoadExisting = async () => {
    if (!selectedDate) return;

    setIsLoadingItems(true);
    try {
      const { date, items: loaded } = await getEntryItems(selectedDate);
      const parts = parseDateKey(date);
      setYear(String(parts.year));
      setMonth(String(parts.month));
      setDay(String(parts.day));
      setItems(emptyItems().map((_, i) => loaded[i] ?? ''));
    } catch (err) {
      console.error('Failed to load entry:', err);
      setMessage({ text: err instanceof Error ? err.message : 'Failed to load entry', isError: true });
    } finally {
      setIsLoadingItems(false);
    }
  };

  const handleSubmit = (e: React.FormEvent) => {
    e.preventDefault();
    saveMutation.mutate();
  };

  const dates = datesQuery.data || [];

  return (
    <div className="page">
      <div className="container">
        <form className="card" onSubmit={handleSubmit}>
          <h2>Study date</h2>
          <div className="form-row">
            <label className="form-field">
              <span>Year</span>
              <select value={year} onChange={(e) => handleYearChange(e.target.value)}>
                {yearOptions(currentYear, year).map((y) => (
                  <option key={y} value={y}>{y}</option>
                ))}
              </select>
            </label>
            <label className="form-field">
              <span>Month</span>
              <select value={month} onChange={(e) => handleMonthChange(e.target.value)}>
                {monthOptions().map((m) => (
                  <option key={m} value={m}>{m}</option>
                ))}
              </select>
            </label>
            <label className="form-field">
              <span>Day</span>
              <select value={day} onChange={(e) => setDay(e.target.value)}>
                {dayOptions(year, month).map((d) => (
                  <option key={d} value={d}>{d}</option>
                ))}
              </select>
            </label>
          </div>

          <h3 className="mt-3">Or pick an existing study date</h3>
          <div className="form-row">
            <select
              value={selectedDate}
              onChange={(e) => setSelectedDate(e.target.value)}
              disabled={dates.length === 0}
            >
              <option value="">{dates.length === 0 ? 'No entries yet' : 'Choose a date'}</option>
              {dates.map((date) => (
                <option key={date} value={date}>{date}</option>
              ))}
            </select>
            <button
              type="button"
              className="btn btn-secondary"
              onClick={handleLoadExisting}
              disabled={!selectedDate || isLoadingItems}
            >
              {isLoadingItems ? 'Loading...' : 'Load items'}
            </button>
          </div>

          <h2 className="mt-3">Study items</h2>
          <div className="form-row">
            {items.map((item, i) => (
              <label key={i} className="form-field">
                <span>Item {i + 1}{i > 0 ? ' (optional)' : ''}</span>
                <input
                  type="text"
                  value={item}
                  placeholder={ITEM_PLACEHOLDERS[i]}
                  onChange={(e) => handleItemChange(i, e.target.value)}
                />
              </label>
            ))}
          </div>

          <button type="submit" className="btn btn-primary mt-3" disabled={saveMutation.isPending}>
            {saveMutation.isPending ? 'Saving...' : 'Add / update entry'}
          </button>

          {message && (
            <p className={message.isError ? 'text-error mt-2' : 'text-success mt-2'}>{message.text}</p>
          )}
        </form>
      </div>
    </div>
  );
}
