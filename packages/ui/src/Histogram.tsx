export interface HistogramDatum {
  start: number;
  end: number;
  count: number;
}

export interface HistogramProps {
  title: string;
  bins: readonly HistogramDatum[];
}

export function binLabel(bin: HistogramDatum): string {
  const lo = Math.round(bin.start);
  const hi = Math.round(bin.end);
  return lo === hi ? String(lo) : `${lo}–${hi}`;
}

export function Histogram({ title, bins }: HistogramProps) {
  const max = bins.reduce((m, b) => Math.max(m, b.count), 0);
  return (
    <section className="rounded-lg border border-gray-200 bg-white p-4">
      <h2 className="text-sm font-semibold text-gray-800">{title}</h2>
      {bins.length === 0 ? (
        <p className="mt-2 text-sm italic text-gray-500">No enrollment data.</p>
      ) : (
        <div className="mt-3 flex h-40 items-end gap-1" role="list">
          {bins.map((b) => (
            <div
              key={`${b.start}-${b.end}`}
              role="listitem"
              aria-label={`${binLabel(b)}: ${b.count}`}
              title={`${binLabel(b)}: ${b.count}`}
              className="flex-1 rounded-t bg-blue-500"
              style={{ height: `${max > 0 ? (b.count / max) * 100 : 0}%` }}
            />
          ))}
        </div>
      )}
    </section>
  );
}
