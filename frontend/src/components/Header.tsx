import { NavLink } from 'react-router-dom';
import { useQuery } from '@tanstack/react-query';
import { getHealth } from '../api/client';
import { queryKeys } from '../api/queries';

const TABS = [
  { to: '/', label: 'Add', end: true },
  { to: '/today', label: 'Today', end: false },
  { to: '/progress', label: 'Progress', end: false },
];

export function Header() {
  const healthQuery = useQuery({
    queryKey: queryKeys.health,
    queryFn: getHealth,
    staleTime: Infinity,
  });
  const analysisEnabled = healthQuery.data?.analysis_enabled ?? false;

  const tabs = analysisEnabled
    ? [...TABS, { to: '/analysis', label: 'Analysis', end: false }]
    : TABS;

  return (
    <header className="header">
      <div className="container">
        <h1 className="header-title">Recall Curve</h1>
        <p className="text-light">Review what you study on day 1, 2, 4, 7, 14, 21 and 30.</p>
        <nav className="tabs">
          {tabs.map((tab) => (
            <NavLink
              key={tab.to}
              to={tab.to}
              end={tab.end}
              className={({ isActive }) => (isActive ? 'tab tab-active' : 'tab')}
            >
              {tab.label}
            </NavLink>
          ))}
        </nav>
      </div>
    </header>
  );
}
