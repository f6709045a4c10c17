"use client";

import { useState } from "react";
import { TRIAL_COLUMNS, type TrialColumn, type TrialRecord } from "@trialscope/registry";
import { formatValue, humanizeEnum } from "./format";

export interface TrialsTableProps {
  rows: readonly TrialRecord[];
  /** Rows per page; every row stays reachable through the pager. */
  pageSize?: number;
}

const HEADERS: Record<TrialColumn, string> = {
  NCT_ID: "NCT ID",
  Title: "Title",
  Status: "Status",
  Phase: "Phase",
  Sponsor: "Sponsor",
  Enrollment: "Enrollment",
  StartDate: "Start",
  CompletionDate: "Completion",
};

function Cell({ row, column }: { row: TrialRecord; column: TrialColumn }) {
  if (column === "NCT_ID" && row.NCT_ID) {
    return (
      <a
        href={`https://clinicaltrials.gov/study/${row.NCT_ID}`}
        className="text-blue-600 hover:underline"
        rel="noreferrer"
        target="_blank"
      >
        {row.NCT_ID}
      </a>
    );
  }
  if (column === "Status" || column === "Phase") return <>{humanizeEnum(row[column])}</>;
  return <>{formatValue(row[column])}</>;
}

export function TrialsTable({ rows, pageSize = 100 }: TrialsTableProps) {
  const [page, setPage] = useState(0);
  const pageCount = Math.max(1, Math.ceil(rows.length / pageSize));
  // Filters can shrink the table under the current page.
  const current = Math.min(page, pageCount - 1);
  const first = current * pageSize;
  const shown = rows.slice(first, first + pageSize);

  return (
    <div className="overflow-x-auto rounded-lg border border-gray-200 bg-white">
      <table className="min-w-full divide-y divide-gray-200 text-left text-sm">
        <caption className="px-3 py-2 text-left text-xs text-gray-500">
          {pageCount > 1
            ? `Showing ${first + 1}–${first + shown.length} of ${rows.length} trials`
            : `${rows.length} trials`}
        </caption>
        <thead className="bg-gray-50">
          <tr>
            {TRIAL_COLUMNS.map((c) => (
              <th key={c} scope="col" className="px-3 py-2 font-medium text-gray-700">
                {HEADERS[c]}
              </th>
            ))}
          </tr>
        </thead>
        <tbody className="divide-y divide-gray-100">
          {shown.map((row, i) => (
            <tr key={row.NCT_ID ?? `row-${i}`}>
              {TRIAL_COLUMNS.map((c) => (
                <td key={c} className="px-3 py-2 text-gray-800">
                  <Cell row={row} column={c} />
                </td>
              ))}
            </tr>
          ))}
        </tbody>
      </table>
      {pageCount > 1 && (
        <div className="flex items-center justify-end gap-3 px-3 py-2 text-sm text-gray-700">
          <button
            type="button"
            className="rounded border border-gray-300 px-2 py-1 disabled:opacity-50"
            disabled={current === 0}
            onClick={() => setPage(current - 1)}
          >
            Previous
          </button>
          <span className="tabular-nums">
            Page {current + 1} of {pageCount}
          </span>
          <button
            type="button"
            className="rounded border border-gray-300 px-2 py-1 disabled:opacity-50"
            disabled={current === pageCount - 1}
            onClick={() => setPage(current + 1)}
          >
            Next
          </button>
        </div>
      )}
    </div>
  );
}
