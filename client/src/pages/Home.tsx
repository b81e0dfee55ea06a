import { useState } from 'react';
import { AboutCard } from '@/components/AboutCard';
import { FeedbackCard } from '@/components/FeedbackCard';
import { Header } from '@/components/Header';
import { ObservationChart } from '@/components/ObservationChart';
import { ObservationTable } from '@/components/ObservationTable';
import { ParameterPanel } from '@/components/ParameterPanel';
import { DEFAULT_DATE_RANGE, DEFAULT_STATION, DEFAULT_VARIABLES } from '@/config/constants';
import { useDashboard } from '@/hooks/useDashboard';
import { getFeedbackEndpoint, getSynopticConfig } from '@/lib/config';
import { FeedbackSubmitter } from '@/lib/feedback/feedbackSubmitter';
import { createProxyIssueClient } from '@/lib/feedback/issueClient';
import { DashboardPipeline, ParameterStore } from '@/lib/pipeline';

export default function Home() {
  const [store] = useState(
    () =>
      new ParameterStore({
        station: DEFAULT_STATION,
        variables: DEFAULT_VARIABLES,
        range: DEFAULT_DATE_RANGE
      })
  );
  const [pipeline] = useState(() => new DashboardPipeline(store, { config: getSynopticConfig() }));
  const [submitter] = useState(() => new FeedbackSubmitter(createProxyIssueClient(getFeedbackEndpoint())));

  const { parameters, view, isLoading, refresh, setStation, setVariables, setDateRange } = useDashboard(
    store,
    pipeline
  );

  return (
    <div className="min-h-screen bg-slate-100 text-slate-900">
      <Header isLoading={isLoading} onRefresh={refresh} />
      <main className="mx-auto max-w-7xl space-y-6 px-4 py-6">
        <div className="grid gap-6 lg:grid-cols-[16rem_1fr]">
          <ParameterPanel
            parameters={parameters}
            onStationChange={setStation}
            onVariablesChange={setVariables}
            onDateRangeChange={setDateRange}
          />
          <div className="grid gap-6 xl:grid-cols-2">
            <section className="rounded-lg border border-slate-200 bg-white p-4">
              <ObservationChart view={view} />
            </section>
            <section className="rounded-lg border border-slate-200 bg-white p-4">
              <ObservationTable view={view} isLoading={isLoading} />
            </section>
          </div>
        </div>
        <div className="grid gap-6 md:grid-cols-2">
          <FeedbackCard submitter={submitter} />
          <AboutCard />
        </div>
      </main>
    </div>
  );
}
