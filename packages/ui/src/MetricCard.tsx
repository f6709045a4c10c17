import { formatValue } from "./format";

export interface MetricCardProps {
  label: string;
  value: string | number | null;
  fractionDigits?: number;
}

export function MetricCard({ label, value, fractionDigits = 0 }: MetricCardProps) {
  return (
    <div className="rounded-lg border border-gray-200 bg-white p-4 shadow-sm">
      <p className="text-xs font-medium uppercase tracking-wide text-gray-500">{label}</p>
      <p className="mt-1 text-2xl font-semibold text-gray-900">{formatValue(value, fractionDigits)}</p>
    </div>
  );
}
