import ReactMarkdown from 'react-markdown';
import { Loading, ErrorMessage } from './Loading';

/**
 * The Markdown progress report, or the state of the request for it.
 */
export function ProgressReport({
  markdown,
  isLoading,
  error,
}: {
  markdown: string | undefined;
  isLoading: boolean;
  error: unknown;
}) {
  if (isLoading) {
    return <Loading message="Building report..." />;
  }
  if (error) {
    return <ErrorMessage message={error instanceof Error ? error.message : 'Failed to load report'} />;
  }
  return (
    <div className="card markdown">
      <ReactMarkdown>{markdown ?? ''}</ReactMarkdown>
    </div>
  );
}
