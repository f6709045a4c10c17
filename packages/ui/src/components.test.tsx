// @vitest-environment jsdom
import { cleanup, fireEvent, render, screen } from "@testing-library/react";
import { afterEach, describe, expect, it, vi } from "vitest";
import type { TrialRecord } from "@trialscope/registry";
import { BarList } from "./BarList";
import { Histogram, binLabel } from "./Histogram";
import { MetricCard } from "./MetricCard";
import { MultiSelect } from "./MultiSelect";
import { SearchInput } from "./SearchInput";
import { TrialsTable } from "./TrialsTable";
import { humanizeEnum } from "./format";

afterEach(cleanup);

const trial: TrialRecord = {
  NCT_ID: "NCT01234567",
  Title: "Edaravone in ALS",
  Status: "ACTIVE_NOT_RECRUITING",
  Phase: null,
  Sponsor: "Example Pharma",
  Enrollment: 1200,
  StartDate: "2019-03",
  CompletionDate: null,
};

describe("humanizeEnum", () => {
  it("turns registry enums into words and leaves other text alone", () => {
    expect(humanizeEnum("ACTIVE_NOT_RECRUITING")).toBe("Active not recruiting");
    expect(humanizeEnum("Example Pharma")).toBe("Example Pharma");
    expect(humanizeEnum(null)).toBe("-");
  });
});

describe("MetricCard", () => {
  it("shows a dash for a missing value", () => {
    render(<MetricCard label="Median Enrollment" value={null} />);

    expect(screen.getByText("Median Enrollment")).toBeInTheDocument();
    expect(screen.getByText("-")).toBeInTheDocument();
  });

  it("formats numbers with the requested precision", () => {
    render(<MetricCard label="Median Duration (months)" value={23.456} fractionDigits={1} />);

    expect(screen.getByText("23.5")).toBeInTheDocument();
  });
});

describe("SearchInput", () => {
  it("submits the trimmed condition", () => {
    const onSearch = vi.fn();
    render(<SearchInput defaultValue="ALS" onSearch={onSearch} />);

    fireEvent.change(screen.getByLabelText("Disease name"), { target: { value: "  cystic fibrosis " } });
    fireEvent.click(screen.getByRole("button", { name: "Fetch trials" }));

    expect(onSearch).toHaveBeenCalledWith("cystic fibrosis");
  });

  it("does not submit a blank condition", () => {
    const onSearch = vi.fn();
    render(<SearchInput onSearch={onSearch} />);
    const input = screen.getByLabelText("Disease name");

    fireEvent.change(input, { target: { value: "   " } });
    const form = input.closest("form");
    if (!form) throw new Error("search form not rendered");
    fireEvent.submit(form);

    expect(onSearch).not.toHaveBeenCalled();
    expect(screen.getByRole("button", { name: "Fetch trials" })).toBeDisabled();
  });

  it("locks the form while busy", () => {
    const onSearch = vi.fn();
    render(<SearchInput defaultValue="ALS" busy onSearch={onSearch} />);

    expect(screen.getByLabelText("Disease name")).toBeDisabled();
    expect(screen.getByRole("button", { name: "Fetching trials…" })).toBeDisabled();
  });
});

describe("MultiSelect", () => {
  const options = ["RECRUITING", "COMPLETED", null];

  it("unchecks a selected option and keeps option order", () => {
    const onChange = vi.fn();
    render(<MultiSelect label="Status" options={options} selected={options} onChange={onChange} humanize />);

    fireEvent.click(screen.getByLabelText("Recruiting"));

    expect(onChange).toHaveBeenCalledWith(["COMPLETED", null]);
  });

  it("checks a cleared option back in place", () => {
    const onChange = vi.fn();
    render(<MultiSelect label="Status" options={options} selected={[null]} onChange={onChange} />);

    fireEvent.click(screen.getByLabelText("COMPLETED"));

    expect(onChange).toHaveBeenCalledWith(["COMPLETED", null]);
  });

  it("selects all and none", () => {
    const onChange = vi.fn();
    render(<MultiSelect label="Status" options={options} selected={[]} onChange={onChange} />);

    fireEvent.click(screen.getByRole("button", { name: "All" }));
    fireEvent.click(screen.getByRole("button", { name: "None" }));

    expect(onChange.mock.calls).toEqual([[options], [[]]]);
  });
});

describe("BarList", () => {
  it("lists each label with its count", () => {
    render(
      <BarList
        title="Trials by Status"
        humanize
        data={[
          { label: "RECRUITING", count: 4 },
          { label: "COMPLETED", count: 2 },
        ]}
      />
    );

    const items = screen.getAllByRole("listitem");
    expect(items).toHaveLength(2);
    expect(items[0]).toHaveTextContent("Recruiting4");
    expect(items[1]).toHaveTextContent("Completed2");
  });

  it("shows the empty label without data", () => {
    render(<BarList title="Top Sponsors" data={[]} emptyLabel="No sponsors." />);

    expect(screen.getByText("No sponsors.")).toBeInTheDocument();
  });
});

describe("Histogram", () => {
  it("labels bins by their rounded edges", () => {
    expect(binLabel({ start: 0, end: 12.5, count: 1 })).toBe("0–13");
    expect(binLabel({ start: 5, end: 5, count: 2 })).toBe("5");
  });

  it("renders one bar per bin", () => {
    render(
      <Histogram
        title="Enrollment Distribution"
        bins={[
          { start: 0, end: 50, count: 3 },
          { start: 50, end: 100, count: 1 },
        ]}
      />
    );

    expect(screen.getByLabelText("0–50: 3")).toBeInTheDocument();
    expect(screen.getByLabelText("50–100: 1")).toBeInTheDocument();
  });
});

describe("TrialsTable", () => {
  it("links the NCT ID and renders nulls as dashes", () => {
    render(<TrialsTable rows={[trial]} />);

    expect(screen.getByRole("link", { name: "NCT01234567" })).toHaveAttribute(
      "href",
      "https://clinicaltrials.gov/study/NCT01234567"
    );
    const cells = screen.getAllByRole("cell").map((c) => c.textContent);
    expect(cells).toEqual([
      "NCT01234567",
      "Edaravone in ALS",
      "Active not recruiting",
      "-",
      "Example Pharma",
      "1,200",
      "2019-03",
      "-",
    ]);
  });

  it("pages through every row", () => {
    const rows = Array.from({ length: 5 }, (_, i) => ({ ...trial, NCT_ID: `NCT0000000${i}` }));

    render(<TrialsTable rows={rows} pageSize={2} />);

    expect(screen.getByText("Showing 1–2 of 5 trials")).toBeInTheDocument();
    expect(screen.getByRole("button", { name: "Previous" })).toBeDisabled();

    fireEvent.click(screen.getByRole("button", { name: "Next" }));
    fireEvent.click(screen.getByRole("button", { name: "Next" }));

    expect(screen.getByText("Showing 5–5 of 5 trials")).toBeInTheDocument();
    expect(screen.getByText("Page 3 of 3")).toBeInTheDocument();
    expect(screen.getByRole("link", { name: "NCT00000004" })).toBeInTheDocument();
    expect(screen.queryByRole("link", { name: "NCT00000000" })).toBeNull();
    expect(screen.getByRole("button", { name: "Next" })).toBeDisabled();
  });

  it("shows a single page without a pager", () => {
    render(<TrialsTable rows={[trial]} />);

    expect(screen.getByText("1 trials")).toBeInTheDocument();
    expect(screen.queryByRole("button", { name: "Next" })).toBeNull();
  });

});
