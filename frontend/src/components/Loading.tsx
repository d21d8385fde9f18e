export function Loading({ message = 'Loading...' }: { message?: string }) {
  return (
    <div className="loading" role="status">
      <div className="spinner" />
      <p className="text-light">{message}</p>
    </div>
  );
}

/** Inline failure notice for a query or mutation that did not succeed. */
export function ErrorMessage({ message }: { message: string }) {
  return (
    <div className="card error-card" role="alert">
      <p className="text-error">{message}</p>
    </div>
  );
}

export function EmptyState({
  icon,
  title,
  description,
}: {
  icon: string;
  title: string;
  description?: string;
}) {
  return (
    <div className="empty-state">
      <div className="empty-state-icon">{icon}</div>
      <h3>{title}</h3>
      {description && <p className="text-light mt-1">{description}</p>}
    </div>
  );
}
