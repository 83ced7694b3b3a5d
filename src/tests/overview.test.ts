import { describe, expect, it } from "vitest";
import { summarizeWorkbook } from "../lib/metrics/overview";
import { describeNumbers, profileSheet } from "../lib/metrics/profile";
import { buildSheet, buildTestWorkbook } from "./helpers";

describe("workbook overview", () => {
  const workbook = buildTestWorkbook(
    buildSheet(
      "Emergency Connectivity Fund",
      ["Billed Entity State", "FRN Approved Amount", "Applicant Name"],
      [
        ["CA", 100, "Acme Schools"],
        ["TX", 50, "Lone Star Library"]
      ]
    ),
    buildSheet(
      "Public Housing Funding",
      ["State", "Award_Amount_USD", "Development", "Connected", "In_Building_WiFi", "Notes"],
      [
        ["CA", "$1,000", "Oak Court", "yes", "no", null],
        ["NY", "$500", "Pine View", "no", "no", "pilot"]
      ]
    )
  );

  it("summarizes funding, records and states", () => {
    const summary = summarizeWorkbook(workbook);

    expect(summary.funding.total).toBe(1650);
    expect(summary.sheetCount).toBe(2);
    expect(summary.recordCount).toBe(4);
    expect(summary.statesCovered).toBe(3);
  });

  it("lists each sheet with a sample of its columns", () => {
    const summary = summarizeWorkbook(workbook);

    expect(summary.sheets).toEqual([
      {
        name: "Emergency Connectivity Fund",
        records: 2,
        columns: 3,
        sampleColumns: "Billed Entity State, FRN Approved Amount, Applicant Name"
      },
      {
        name: "Public Housing Funding",
        records: 2,
        columns: 6,
        sampleColumns: "State, Award_Amount_USD, Development, Connected, In_Building_WiFi..."
      }
    ]);
  });
});

describe("sheet profile", () => {
  it("describes numeric columns with sample statistics", () => {
    const stats = describeNumbers([4, 1, 3, 2]);

    expect(stats?.count).toBe(4);
    expect(stats?.mean).toBe(2.5);
    expect(stats?.std).toBeCloseTo(1.291, 3);
    expect(stats?.min).toBe(1);
    expect(stats?.q25).toBe(1.75);
    expect(stats?.median).toBe(2.5);
    expect(stats?.q75).toBe(3.25);
    expect(stats?.max).toBe(4);
  });

  it("has no deviation for a single value and no stats for none", () => {
    expect(describeNumbers([5])?.std).toBeNull();
    expect(describeNumbers([])).toBeNull();
  });

  it("profiles every column of a sheet", () => {
    const sheet = buildSheet(
      "Lifeline Program",
      ["Subscribers", "Carrier"],
      [
        [1, "Acme"],
        [2, null],
        [3, null],
        [4, null]
      ]
    );

    const profile = profileSheet(sheet);

    expect(profile.rowCount).toBe(4);
    expect(profile.columnCount).toBe(2);
    expect(profile.columns[0].kind).toBe("numeric");
    expect(profile.columns[0].stats?.median).toBe(2.5);
    expect(profile.columns[1]).toEqual({
      name: "Carrier",
      kind: "text",
      missingCount: 3,
      nonEmptyRatio: 0.25,
      examples: ["Acme"],
      stats: null
    });
  });
});
