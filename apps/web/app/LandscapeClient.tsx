"use client";

import { useMemo, useState, useTransition } from "react";
import { useRouter } from "next/navigation";
import type { TrialTable } from "@trialscope/registry";
import {
  applyFilters,
  deriveLandscapeRows,
  distinctValues,
  enrollmentHistogram,
  statusCounts,
  summarize,
  topSponsors,
} from "@trialscope/landscape";
import {
  BarList,
  Histogram,
  MetricCard,
  MultiSelect,
  SearchInput,
  TrialsTable,
  type OptionValue,
} from "@trialscope/ui";

export interface LandscapeClientProps {
  condition: string;
  trials: TrialTable;
}

export function LandscapeClient({ condition, trials }: LandscapeClientProps) {
  const router = useRouter();
  const [isPending, startTransition] = useTransition();
  const rows = useMemo(() => deriveLandscapeRows(trials), [trials]);
  const statusOptions = useMemo(() => distinctValues(rows, "Status"), [rows]);
  const sponsorOptions = useMemo(() => distinctValues(rows, "Sponsor"), [rows]);

  const [statuses, setStatuses] = useState<OptionValue[]>(statusOptions);
  const [sponsors, setSponsors] = useState<OptionValue[]>(sponsorOptions);

  const filtered = useMemo(
    () => applyFilters(rows, { statuses, sponsors }),
    [rows, statuses, sponsors]
  );
  const summary = useMemo(() => summarize(filtered), [filtered]);

  const handleSearch = (query: string) => {
    if (!query || query === condition) return;
    startTransition(() => {
      router.push(`/?condition=${encodeURIComponent(query)}`);
    });
  };

  return (
    <div className="mt-6 grid gap-6 lg:grid-cols-[16rem_1fr]">
      <aside className="space-y-4">
        <SearchInput defaultValue={condition} busy={isPending} onSearch={handleSearch} />
        <MultiSelect
          label="Status"
          options={statusOptions}
          selected={statuses}
          onChange={setStatuses}
          humanize
        />
        <MultiSelect label="Sponsor" options={sponsorOptions} selected={sponsors} onChange={setSponsors} />
      </aside>

      <div className="space-y-6">
        <div className="grid gap-4 sm:grid-cols-2 xl:grid-cols-4">
          <MetricCard label="Total Trials" value={summary.totalTrials} />
          <MetricCard label="Active Sponsors" value={summary.activeSponsors} />
          <MetricCard label="Median Enrollment" value={summary.medianEnrollment} />
          <MetricCard label="Median Duration (months)" value={summary.medianDurationMonths} fractionDigits={1} />
        </div>

        <div className="grid gap-4 lg:grid-cols-3">
          <BarList title="Trials by Status" data={statusCounts(filtered)} humanize />
          <BarList title="Top Sponsors" data={topSponsors(filtered, 5)} emptyLabel="No sponsors." />
          <Histogram title="Enrollment Distribution" bins={enrollmentHistogram(filtered, 10)} />
        </div>

        <section>
          <h2 className="mb-2 text-lg font-semibold text-gray-900">Filtered Trials</h2>
          <TrialsTable rows={filtered} />
        </section>
      </div>
    </div>
  );
}
