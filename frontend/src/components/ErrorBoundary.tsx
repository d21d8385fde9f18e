import React from 'react';

interface ErrorBoundaryProps {
  children: React.ReactNode;
  fallbackTitle?: string;
}

interface ErrorBoundaryState {
  error: Error | null;
}

/**
 * Keeps a crash in one tab from blanking the whole app.
 */
export class ErrorBoundary extends React.Component<ErrorBoundaryProps, ErrorBoundaryState> {
  constructor(props: ErrorBoundaryProps) {
    super(props);
    this.state = { error: null };
  }

  static getDerivedStateFromError(error: Error): ErrorBoundaryState {
    return { error };
  }

  componentDidCatch(error: Error, errorInfo: React.ErrorInfo) {
    console.error('[ErrorBoundary]', error, errorInfo.componentStack);
  }

  handleReset = () => {
    this.setState({ error: null });
  };

  render() {
    const { error } = this.state;
    if (!error) {
      return this.props.children;
    }

    return (
      <div className="card error-boundary">
        <h2>{this.props.fallbackTitle || 'Something went wrong'}</h2>
        <p className="text-light">Your study entries are saved on the server and were not affected.</p>
        <details className="mt-2">
          <summary>Error details</summary>
          <pre>{error.message}</pre>
        </details>
        <button className="btn btn-primary mt-3" onClick={this.handleReset}>
          Try Again
        </button>
      </div>
    );
  }
}
