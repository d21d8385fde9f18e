import type { QueryClient } from '@tanstack/react-query';

export const queryKeys = {
  health: ['health'],
  dates: ['dates'],
  reviewsToday: ['reviewsToday'],
  progress: ['progress'],
  progressMarkdown: ['progressMarkdown'],
} as const;

/**
 * Refetch everything derived from the entry list after a mutation.
 */
export function invalidateEntryQueries(queryClient: QueryClient): Promise<void> {
  return Promise.all([
    queryClient.invalidateQueries({ queryKey: queryKeys.dates }),
    queryClient.invalidateQueries({ queryKey: queryKeys.reviewsToday }),
    queryClient.invalidateQueries({ queryKey: queryKeys.progress }),
    queryClient.invalidateQueries({ queryKey: queryKeys.progressMarkdown }),
  ]).then(() => undefined);
}
