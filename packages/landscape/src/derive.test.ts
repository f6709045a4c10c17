import { describe, it, expect } from "vitest";
import type { TrialRecord } from "@trialscope/registry";
import { deriveLandscapeRows, durationMonths, parseRegistryDate } from "./derive.js";

describe("parseRegistryDate", () => {
  it("reads day and month precision dates as UTC", () => {
    expect(parseRegistryDate("2021-08-15")).toEqual(new Date(Date.UTC(2021, 7, 15)));
    expect(parseRegistryDate("2019-03")).toEqual(new Date(Date.UTC(2019, 2, 1)));
    expect(parseRegistryDate("2018")).toEqual(new Date(Date.UTC(2018, 0, 1)));
  });

  it.each(["", "March 2020", "2021-02-30", "2021-13", "20-01-01"])(
    "returns null for %j",
    (raw) => {
      expect(parseRegistryDate(raw)).toBeNull();
    }
  );

  it("returns null for a missing date", () => {
    expect(parseRegistryDate(null)).toBeNull();
  });
});

describe("durationMonths", () => {
  it("divides whole days by 30.44", () => {
    const start = new Date(Date.UTC(2020, 0, 1));
    const end = new Date(Date.UTC(2021, 0, 1));

    expect(durationMonths(start, end)).toBe(366 / 30.44);
  });

  it("is null when either end is missing", () => {
    expect(durationMonths(null, new Date())).toBeNull();
    expect(durationMonths(new Date(), null)).toBeNull();
  });
});

describe("deriveLandscapeRows", () => {
  it("adds parsed dates and duration while keeping the record fields", () => {
    const record: TrialRecord = {
      NCT_ID: "NCT00000001",
      Title: "A",
      Status: "COMPLETED",
      Phase: "PHASE2",
      Sponsor: "Example Pharma",
      Enrollment: 30,
      StartDate: "2020-01",
      CompletionDate: "not reported",
    };

    const [row] = deriveLandscapeRows([record]);

    expect(row).toEqual({
      ...record,
      startDate: new Date(Date.UTC(2020, 0, 1)),
      completionDate: null,
      durationMonths: null,
    });
  });
});
