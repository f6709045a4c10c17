// @vitest-environment jsdom
import { cleanup, fireEvent, render, screen, within } from "@testing-library/react";
import { afterEach, describe, expect, it, vi } from "vitest";
import type { TrialRecord } from "@trialscope/registry";
import { LandscapeClient } from "./LandscapeClient";

const { push } = vi.hoisted(() => ({ push: vi.fn() }));

vi.mock("next/navigation", () => ({
  useRouter: () => ({ push }),
}));

afterEach(() => {
  cleanup();
  push.mockReset();
});

function trial(partial: Partial<TrialRecord>): TrialRecord {
  return {
    NCT_ID: null,
    Title: null,
    Status: null,
    Phase: null,
    Sponsor: null,
    Enrollment: null,
    StartDate: null,
    CompletionDate: null,
    ...partial,
  };
}

const trials: TrialRecord[] = [
  trial({
    NCT_ID: "NCT00000001",
    Status: "RECRUITING",
    Sponsor: "Alpha",
    Enrollment: 10,
    StartDate: "2020-01-01",
    CompletionDate: "2021-01-01",
  }),
  trial({ NCT_ID: "NCT00000002", Status: "COMPLETED", Sponsor: "Beta", Enrollment: 30 }),
  trial({ NCT_ID: "NCT00000003", Status: "RECRUITING", Sponsor: "Beta", Enrollment: 50 }),
];

function metric(label: string): string | null {
  const card = screen.getByText(label).parentElement;
  if (!card) throw new Error(`metric ${label} not rendered`);
  return card.lastElementChild?.textContent ?? null;
}

describe("LandscapeClient", () => {
  it("summarizes every trial before any filter is changed", () => {
    render(<LandscapeClient condition="ALS" trials={trials} />);

    expect(metric("Total Trials")).toBe("3");
    expect(metric("Active Sponsors")).toBe("2");
    expect(metric("Median Enrollment")).toBe("30");
    expect(metric("Median Duration (months)")).toBe("12.0");
    expect(screen.getByText("3 trials")).toBeInTheDocument();
  });

  it("recomputes metrics and the table when a status is deselected", () => {
    render(<LandscapeClient condition="ALS" trials={trials} />);
    const statusFilter = screen.getByRole("group", { name: "Status" });

    fireEvent.click(within(statusFilter).getByLabelText("Recruiting"));

    expect(metric("Total Trials")).toBe("1");
    expect(metric("Median Enrollment")).toBe("30");
    expect(metric("Median Duration (months)")).toBe("-");
    expect(screen.getByRole("link", { name: "NCT00000002" })).toBeInTheDocument();
    expect(screen.queryByRole("link", { name: "NCT00000001" })).toBeNull();
  });

  it("navigates to a new condition on search", () => {
    render(<LandscapeClient condition="ALS" trials={trials} />);
    const input = screen.getByLabelText("Disease name");

    fireEvent.change(input, { target: { value: "cystic fibrosis" } });
    const form = input.closest("form");
    if (!form) throw new Error("search form not rendered");
    fireEvent.submit(form);

    expect(push).toHaveBeenCalledWith("/?condition=cystic%20fibrosis");
  });
});
