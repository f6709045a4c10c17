import { humanizeEnum } from "./format";

export interface BarDatum {
  label: string;
  count: number;
}

export interface BarListProps {
  title: string;
  data: readonly BarDatum[];
  /** Registry enum values are shown as words. */
  humanize?: boolean;
  emptyLabel?: string;
}

/**
 * Horizontal bars scaled to the largest count.
 */
export function BarList({ title, data, humanize = false, emptyLabel = "No data." }: BarListProps) {
  const max = data.reduce((m, d) => Math.max(m, d.count), 0);
  return (
    <section className="rounded-lg border border-gray-200 bg-white p-4">
      <h2 className="text-sm font-semibold text-gray-800">{title}</h2>
      {data.length === 0 ? (
        <p className="mt-2 text-sm italic text-gray-500">{emptyLabel}</p>
      ) : (
        <ul className="mt-3 space-y-2">
          {data.map((d) => (
            <li key={d.label} className="text-sm">
              <div className="flex justify-between gap-2 text-gray-700">
                <span className="truncate">{humanize ? humanizeEnum(d.label) : d.label}</span>
                <span className="shrink-0 tabular-nums text-gray-500">{d.count}</span>
              </div>
              <div className="mt-1 h-2 rounded bg-gray-100">
                <div
                  className="h-2 rounded bg-blue-500"
                  style={{ width: `${max > 0 ? (d.count / max) * 100 : 0}%` }}
                />
              </div>
            </li>
          ))}
        </ul>
      )}
    </section>
  );
}
