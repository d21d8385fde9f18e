export type {
  DateKey,
  LearningEntry,
  ReviewRecord,
  DueReview,
  ReviewStatus,
  ProgressTier,
  ProgressReview,
  ProgressCard,
} from '@recall-curve/shared';

import type { LearningEntry } from '@recall-curve/shared';

// ============ API ============

export interface Health {
  status: 'ok';
  analysis_enabled: boolean;
}

export interface NewEntryInput {
  year: string;
  month: string;
  day: string;
  items: string[];
}

export interface EntryMutationResult {
  message: string;
  created: boolean;
  entry: LearningEntry;
}

export interface DeleteEntryResult {
  message: string;
  deleted: boolean;
}

export interface EntryItems {
  date: string;
  items: string[];
}

export interface AnalysisResult {
  analysis: string;
}
