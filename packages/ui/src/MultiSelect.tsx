"use client";

import { EMPTY_CELL, humanizeEnum } from "./format";

export type OptionValue = string | null;

export interface MultiSelectProps {
  label: string;
  options: readonly OptionValue[];
  selected: readonly OptionValue[];
  onChange: (next: OptionValue[]) => void;
  humanize?: boolean;
}

/** Checkbox list; null is a selectable value shown as "-". */
export function MultiSelect({ label, options, selected, onChange, humanize = false }: MultiSelectProps) {
  const chosen = new Set(selected);

  const toggle = (value: OptionValue) => {
    // Keep the option order stable regardless of click order.
    onChange(options.filter((o) => (o === value ? !chosen.has(o) : chosen.has(o))));
  };

  return (
    <fieldset className="rounded-lg border border-gray-200 bg-white p-3">
      <legend className="px-1 text-sm font-semibold text-gray-800">{label}</legend>
      <div className="mb-2 flex gap-3 text-xs">
        <button type="button" className="text-blue-600 hover:underline" onClick={() => onChange([...options])}>
          All
        </button>
        <button type="button" className="text-blue-600 hover:underline" onClick={() => onChange([])}>
          None
        </button>
      </div>
      <ul className="max-h-56 space-y-1 overflow-y-auto text-sm">
        {options.map((o) => {
          const text = o === null ? EMPTY_CELL : humanize ? humanizeEnum(o) : o;
          return (
            <li key={o ?? "\u0000null"}>
              <label className="flex items-center gap-2 text-gray-700">
                <input type="checkbox" checked={chosen.has(o)} onChange={() => toggle(o)} />
                <span className="truncate">{text}</span>
              </label>
            </li>
          );
        })}
      </ul>
    </fieldset>
  );
}
