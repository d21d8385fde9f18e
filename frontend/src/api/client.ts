import type {
  AnalysisResult,
  DeleteEntryResult,
  DueReview,
  EntryItems,
  EntryMutationResult,
  Health,
  NewEntryInput,
  ProgressCard,
} from '../types';

export const API_BASE = import.meta.env.VITE_API_URL
  ? import.meta.env.VITE_API_URL
  : '';

const API_PATH = `${API_BASE}/api`;

function errorMessage(body: unknown, status: number): string {
  if (typeof body === 'object' && body !== null && 'error' in body && typeof body.error === 'string') {
    return body.error;
  }
  return `HTTP ${status}`;
}

type RequestOptions = Omit<RequestInit, 'headers'>;

async function request(url: string, options?: RequestOptions): Promise<Response> {
  const response = await fetch(`${API_PATH}${url}`, {
    ...options,
    headers: { 'Content-Type': 'application/json' },
  });

  if (!response.ok) {
    const body: unknown = await response.json().catch(() => null);
    throw new Error(errorMessage(body, response.status));
  }

  return response;
}

async function fetchJSON<T>(url: string, options?: RequestOptions): Promise<T> {
  const response = await request(url, options);
  return response.json();
}

async function fetchText(url: string): Promise<string> {
  const response = await request(url);
  return response.text();
}

// ============ Health ============

export async function getHealth(): Promise<Health> {
  return fetchJSON<Health>('/health');
}

// ============ Entries ============

export async function getExistingDates(): Promise<string[]> {
  return fetchJSON<string[]>('/entries/dates');
}

export async function getEntryItems(date: string): Promise<EntryItems> {
  return fetchJSON<EntryItems>(`/entries/${encodeURIComponent(date)}`);
}

export async function saveEntry(input: NewEntryInput): Promise<EntryMutationResult> {
  return fetchJSON<EntryMutationResult>('/entries', {
    method: 'POST',
    body: JSON.stringify(input),
  });
}

export async function deleteEntry(date: string): Promise<DeleteEntryResult> {
  return fetchJSON<DeleteEntryResult>(`/entries/${encodeURIComponent(date)}`, {
    method: 'DELETE',
  });
}

// ============ Reviews ============

export async function getTodayReviews(): Promise<DueReview[]> {
  return fetchJSON<DueReview[]>('/reviews/today');
}

/**
 * Complete a review by its entry date and review index. Returns the
 * refreshed list of reviews still due today.
 */
export async function completeReview(entryDate: string, reviewIndex: number): Promise<DueReview[]> {
  return fetchJSON<DueReview[]>(
    `/entries/${encodeURIComponent(entryDate)}/reviews/${reviewIndex}/complete`,
    { method: 'POST' }
  );
}

// ============ Progress ============

export async function getProgress(): Promise<ProgressCard[]> {
  return fetchJSON<ProgressCard[]>('/progress');
}

export async function getProgressMarkdown(): Promise<string> {
  return fetchText('/progress/markdown');
}

// ============ Analysis ============

export async function requestAnalysis(): Promise<AnalysisResult> {
  return fetchJSON<AnalysisResult>('/analysis', { method: 'POST' });
}
