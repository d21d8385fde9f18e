import { BrowserRouter, Routes, Route, Navigate } from 'react-router-dom';
import { QueryClient, QueryClientProvider } from '@tanstack/react-query';
import { Header } from './components/Header';
import { ErrorBoundary } from './components/ErrorBoundary';
import { AddEntryPage } from './pages/AddEntryPage';
import { TodayReviewsPage } from './pages/TodayReviewsPage';
import { ProgressPage } from './pages/ProgressPage';
import { AnalysisPage } from './pages/AnalysisPage';

const queryClient = new QueryClient({
  defaultOptions: {
    queries: {
      // Every tab shows fresh data when opened
      staleTime: 0,
      refetchOnMount: 'always',
      retry: 1,
    },
  },
});

function AppRoutes() {
  return (
    <Routes>
      <Route
        path="/"
        element={
          <ErrorBoundary fallbackTitle="Couldn't load the entry form">
            <AddEntryPage />
          </ErrorBoundary>
        }
      />
      <Route
        path="/today"
        element={
          <ErrorBoundary fallbackTitle="Couldn't load today's reviews">
            <TodayReviewsPage />
          </ErrorBoundary>
        }
      />
      <Route
        path="/progress"
        element={
          <ErrorBoundary fallbackTitle="Couldn't load progress">
            <ProgressPage />
          </ErrorBoundary>
        }
      />
      <Route
        path="/analysis"
        element={
          <ErrorBoundary fallbackTitle="Couldn't load analysis">
            <AnalysisPage />
          </ErrorBoundary>
        }
      />
      <Route path="*" element={<Navigate to="/" replace />} />
    </Routes>
  );
}

export default function App() {
  return (
    <QueryClientProvider client={queryClient}>
      <BrowserRouter>
        <Header />
        <AppRoutes />
      </BrowserRouter>
    </QueryClientProvider>
  );
}
