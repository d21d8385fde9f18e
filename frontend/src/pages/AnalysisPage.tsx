import { useMutation, useQuery } from '@tanstack/react-query';
import ReactMarkdown from 'react-markdown';
import { getHealth, requestAnalysis } from '../api/client';
import { queryKeys } from '../api/queries';
import { Loading, ErrorMessage, EmptyState } from '../components/Loading';

export function AnalysisPage() {
  const healthQuery = useQuery({
    queryKey: queryKeys.health,
    queryFn: getHealth,
    staleTime: Infinity,
  });

  const analysisMutation = useMutation({
    mutationFn: requestAnalysis,
  });

  if (healthQuery.isLoading) {
    return <Loading />;
  }

  if (!healthQuery.data?.analysis_enabled) {
    return (
      <div className="page">
        <div className="container">
          <EmptyState
            icon="🔌"
            title="Analysis is turned off"
            description="Set ANTHROPIC_API_KEY on the server to send your progress for analysis."
          />
        </div>
      </div>
    );
  }

  return (
    <div className="page">
      <div className="container">
        <h2>Progress analysis</h2>
        <p className="text-light mb-2">
          Sends your progress report (dates, items and review status) to the analysis service.
        </p>
        <button
          className="btn btn-primary"
          onClick={() => analysisMutation.mutate()}
          disabled={analysisMutation.isPending}
        >
          {analysisMutation.isPending ? 'Analysing...' : 'Analyse my progress'}
        </button>

        {analysisMutation.error && (
          <div className="mt-3">
            <ErrorMessage
              message={analysisMutation.error instanceof Error ? analysisMutation.error.message : 'Analysis failed'}
            />
          </div>
        )}

        {analysisMutation.data && (
          <div className="card markdown mt-3">
            <ReactMarkdown>{analysisMutation.data.analysis}</ReactMarkdown>
          </div>
        )}
      </div>
    </div>
  );
}
