import { memo } from 'react';
import { Activity, RefreshCw } from 'lucide-react';
import { cn } from '@/lib/utils';

interface HeaderProps {
  isLoading: boolean;
  onRefresh: () => void;
}

const Header = memo(({ isLoading, onRefresh }: HeaderProps) => {
  return (
    <header className="border-b border-slate-200 bg-white/80 backdrop-blur-sm">
      <div className="mx-auto flex h-16 max-w-7xl items-center justify-between px-4">
        <div className="flex items-baseline gap-3">
          <Activity className="h-6 w-6 text-blue-600" />
          <div>
            <h1 className="text-lg font-semibold tracking-tight">Observation Dashboard</h1>
            <p className="-mt-1 hidden text-xs text-slate-500 sm:block">Roaring Fork Observation Network</p>
          </div>
        </div>
        <button
          type="button"
          onClick={onRefresh}
          disabled={isLoading}
          aria-label="Refresh observations"
          className="inline-flex h-9 w-9 items-center justify-center rounded-md border border-slate-200 hover:bg-slate-50 disabled:opacity-50"
        >
          <RefreshCw className={cn('h-4 w-4', isLoading && 'animate-spin')} />
        </button>
      </div>
    </header>
  );
});

Header.displayName = 'Header';

export { Header };
