/**
 * useDashboard Hook
 * Subscribes to the parameter store and pulls a fresh view from the pipeline
 * whenever the parameters change. A view that resolves after a newer
 * evaluation started is discarded.
 */

import { useCallback, useEffect, useRef, useState, useSyncExternalStore } from 'react';
import {
  describePipelineError,
  type DashboardPipeline,
  type DashboardView,
  type NetworkError,
  type ParameterStore
} from '@/lib/pipeline';

function unexpectedFailure(error: unknown): DashboardView {
  const pipelineError: NetworkError = {
    kind: 'NetworkError',
    message: error instanceof Error ? error.message : String(error)
  };
  return { status: 'error', error: pipelineError, message: describePipelineError(pipelineError) };
}

export function useDashboard(store: ParameterStore, pipeline: DashboardPipeline) {
  const requestIdRef = useRef(0);
  const parameters = useSyncExternalStore(store.subscribe, store.getSnapshot);
  const [view, setView] = useState<DashboardView | null>(null);
  const [isLoading, setIsLoading] = useState(true);
  const [refreshCount, setRefreshCount] = useState(0);

  useEffect(() => {
    const requestId = ++requestIdRef.current;
    setIsLoading(true);

    pipeline
      .evaluate()
      .then((next) => {
        if (requestIdRef.current !== requestId) return;
        setView(next);
        setIsLoading(false);
      })
      .catch((error: unknown) => {
        console.error('[pipeline] Evaluation failed:', error);
        if (requestIdRef.current !== requestId) return;
        setView(unexpectedFailure(error));
        setIsLoading(false);
      });
  }, [pipeline, parameters, refreshCount]);

  // Same parameters, new fetch
  const refresh = useCallback(() => {
    pipeline.refresh();
    setRefreshCount((count) => count + 1);
  }, [pipeline]);

  return {
    parameters,
    view,
    isLoading,
    refresh,
    setStation: store.setStation,
    setVariables: store.setVariables,
    setDateRange: store.setDateRange
  };
}
