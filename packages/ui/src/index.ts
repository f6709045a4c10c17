export { Nav, type NavLinkProps, type NavProps } from "./Nav";
export { SearchInput, type SearchInputProps } from "./SearchInput";
export { MetricCard, type MetricCardProps } from "./MetricCard";
export { BarList, type BarDatum, type BarListProps } from "./BarList";
export { Histogram, binLabel, type HistogramDatum, type HistogramProps } from "./Histogram";
export { MultiSelect, type MultiSelectProps, type OptionValue } from "./MultiSelect";
export { TrialsTable, type TrialsTableProps } from "./TrialsTable";
export { LoadError, type LoadErrorProps } from "./LoadError";
export { EMPTY_CELL, formatValue, humanizeEnum } from "./format";
