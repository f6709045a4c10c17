"use client";

import { useCallback, useState } from "react";

export interface SearchInputProps {
  label?: string;
  placeholder?: string;
  defaultValue?: string;
  /** Disables the form while a new condition is loading. */
  busy?: boolean;
  onSearch?: (condition: string) => void;
  className?: string;
}

/**
 * Condition search for the landscape sidebar. Blank input is never submitted.
 */
export function SearchInput({
  label = "Disease name",
  placeholder = "e.g. ALS, cystic fibrosis",
  defaultValue = "",
  busy = false,
  onSearch,
  className = "",
}: SearchInputProps) {
  const [condition, setCondition] = useState(defaultValue);
  const trimmed = condition.trim();

  const handleSubmit = useCallback(
    (e: React.FormEvent) => {
      e.preventDefault();
      if (!trimmed || busy) return;
      onSearch?.(trimmed);
    },
    [trimmed, busy, onSearch]
  );

  return (
    <form onSubmit={handleSubmit} className={`space-y-2 ${className}`} aria-busy={busy}>
      <label className="block text-sm font-semibold text-gray-800">
        {label}
        <input
          type="search"
          value={condition}
          onChange={(e) => setCondition(e.target.value)}
          placeholder={placeholder}
          disabled={busy}
          className="mt-1 w-full rounded-lg border border-gray-300 px-3 py-2 font-normal text-gray-900 placeholder-gray-500 focus:border-blue-500 focus:outline-none focus:ring-1 focus:ring-blue-500 disabled:bg-gray-100"
        />
      </label>
      <button
        type="submit"
        disabled={busy || !trimmed}
        className="w-full rounded-lg bg-blue-600 px-3 py-2 text-sm font-medium text-white hover:bg-blue-700 disabled:cursor-not-allowed disabled:bg-gray-300"
      >
        {busy ? "Fetching trials…" : "Fetch trials"}
      </button>
    </form>
  );
}
