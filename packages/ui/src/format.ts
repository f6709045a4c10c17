export const EMPTY_CELL = "-";

export function formatValue(value: string | number | null | undefined, fractionDigits = 0): string {
  if (value == null) return EMPTY_CELL;
  if (typeof value === "number") {
    if (!Number.isFinite(value)) return EMPTY_CELL;
    return value.toLocaleString("en-US", {
      minimumFractionDigits: fractionDigits,
      maximumFractionDigits: fractionDigits,
    });
  }
  return value;
}

/** Registry enums such as ACTIVE_NOT_RECRUITING read better as words. */
export function humanizeEnum(value: string | null): string {
  if (value == null) return EMPTY_CELL;
  if (!/^[A-Z0-9_]+$/.test(value)) return value;
  const words = value.toLowerCase().replace(/_/g, " ");
  return words.charAt(0).toUpperCase() + words.slice(1);
}
