import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  completeReview,
  deleteEntry,
  getEntryItems,
  getProgressMarkdown,
  getTodayReviews,
  saveEntry,
} from './client';

// Mock fetch globally
const mockFetch = vi.fn<typeof fetch>();
global.fetch = mockFetch;

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('api client', () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  it('fetches today\'s reviews', async () => {
    const reviews = [{ entry_date: '2026-10-18', items: ['Verbs'], review_index: 0, due_date: '2026-10-19' }];
    mockFetch.mockResolvedValue(jsonResponse(reviews));

    expect(await getTodayReviews()).toEqual(reviews);
    expect(mockFetch).toHaveBeenCalledWith('/api/reviews/today', {
      headers: { 'Content-Type': 'application/json' },
    });
  });

  it('posts a new entry as JSON', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ message: 'Study entry added', created: true, entry: {} }, 201));

    const result = await saveEntry({ year: '2026', month: '10', day: '19', items: ['Verbs', '', ''] });

    expect(result.message).toBe('Study entry added');
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('/api/entries');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe('{"year":"2026","month":"10","day":"19","items":["Verbs","",""]}');
  });

  it('completes a review by entry date and index', async () => {
    mockFetch.mockResolvedValue(jsonResponse([]));

    await completeReview('2026-10-12', 3);

    expect(mockFetch.mock.calls[0][0]).toBe('/api/entries/2026-10-12/reviews/3/complete');
    expect(mockFetch.mock.calls[0][1]?.method).toBe('POST');
  });

  it('deletes an entry', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ message: 'Deleted study entry for 2026-10-12', deleted: true }));

    expect(await deleteEntry('2026-10-12')).toEqual({ message: 'Deleted study entry for 2026-10-12', deleted: true });
    expect(mockFetch.mock.calls[0][1]?.method).toBe('DELETE');
  });

  it('returns markdown as text', async () => {
    mockFetch.mockResolvedValue(new Response('## Study Progress\n', { status: 200 }));

    expect(await getProgressMarkdown()).toBe('## Study Progress\n');
  });

  it('surfaces the server error message', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ error: 'No study entry for 2026-10-13' }, 404));

    await expect(getEntryItems('2026-10-13')).rejects.toThrow('No study entry for 2026-10-13');
  });

  it('falls back to the status code when the error body is not JSON', async () => {
    mockFetch.mockResolvedValue(new Response('Bad gateway', { status: 502 }));

    await expect(getTodayReviews()).rejects.toThrow('HTTP 502');
  });
});
