import type { LearningEntry } from '@recall-curve/shared';
import type { EntryStore } from './db/store';
import type { Analyzer } from './services/analysis';

// Per-request bindings, passed as the second argument to app.fetch / app.request
export interface Env {
  STORE: EntryStore;
  ANALYZER: Analyzer | null;
  // Source of "now"; today's date key is derived from it in local time
  CLOCK: () => Date;
  CORS_ORIGIN?: string;
}

export type {
  DateKey,
  LearningEntry,
  ReviewRecord,
  DueReview,
  ProgressCard,
} from '@recall-curve/shared';

// API request bodies
export interface AddEntryRequest {
  year: number | string;
  month: number | string;
  day: number | string;
  items: string[];
}

// API responses
export interface HealthResponse {
  status: 'ok';
  analysis_enabled: boolean;
}

export interface EntryMutationResponse {
  message: string;
  created: boolean;
  entry: LearningEntry;
}

export interface DeleteEntryResponse {
  message: string;
  deleted: boolean;
}

export interface AnalysisResponse {
  analysis: string;
}
