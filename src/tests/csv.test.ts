import { describe, expect, it } from "vitest";
import { csvFileName, escapeCsvField, toCsv } from "../lib/export/csv";
import { buildSheet } from "./helpers";

describe("CSV export", () => {
  it("quotes fields with delimiters, quotes or newlines", () => {
    expect(escapeCsvField("plain")).toBe("plain");
    expect(escapeCsvField("a,b")).toBe('"a,b"');
    expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvField("line\nbreak")).toBe('"line\nbreak"');
  });

  it("writes a header and one line per row", () => {
    const sheet = buildSheet(
      "Public Housing Funding",
      ["Development", "Award_Amount_USD", "Connected"],
      [
        ["Oak, Court", 10.5, true],
        ["Pine", null, false]
      ]
    );

    expect(toCsv(sheet)).toBe(
      'Development,Award_Amount_USD,Connected\n"Oak, Court",10.5,true\nPine,,false\n'
    );
  });

  it("writes only the header for an empty sheet", () => {
    expect(toCsv(buildSheet("NEWS", ["Headline"], []))).toBe("Headline\n");
  });

  it("derives a file name from the sheet name", () => {
    expect(csvFileName("Public Housing Funding")).toBe("public_housing_funding_filtered.csv");
    expect(csvFileName("990Breakdown")).toBe("990breakdown_filtered.csv");
    expect(csvFileName("!!!", "export")).toBe("sheet_export.csv");
  });
});
