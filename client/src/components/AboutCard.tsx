import { STATION_IDS } from '@shared/synoptic';

export function AboutCard() {
  return (
    <section className="space-y-2 rounded-lg border border-slate-200 bg-white p-4">
      <h2 className="text-sm font-semibold">About this app</h2>
      <p className="text-sm text-slate-600">
        This app uses data from the Roaring Fork Observation Network in the Roaring Fork Valley
        Watershed, served by the Synoptic Data API. Pick a station, one or more variables and a date
        range; the first two variables are charted and every selected variable is listed in the table.
      </p>
      <p className="text-xs text-slate-500">Stations: {STATION_IDS.join(', ')}</p>
    </section>
  );
}
