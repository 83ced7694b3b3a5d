import * as XLSX from "xlsx";
import { describe, expect, it } from "vitest";
import { parseCsvText } from "../lib/import/parseCsv";
import { detectFormat } from "../lib/import/parseFile";
import { parseXlsxBuffer } from "../lib/import/parseXlsx";
import { buildWorkbook, loadWorkbook } from "../lib/workbook/load";
import { encodeText } from "./helpers";

const writeWorkbook = (sheets: Record<string, unknown[][]>): Uint8Array => {
  const workbook = XLSX.utils.book_new();
  Object.entries(sheets).forEach(([name, rows]) => {
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), name);
  });
  return new Uint8Array(XLSX.write(workbook, { type: "array", bookType: "xlsx" }));
};

describe("import parsing", () => {
  it("parses CSV with comma delimiter", () => {
    const table = parseCsvText("State,Amount\nCA,10\nTX,2.5\n");

    expect(table.sheetName).toBe("Sheet1");
    expect(table.headers).toEqual(["State", "Amount"]);
    expect(table.rows).toEqual([
      ["CA", "10"],
      ["TX", "2.5"]
    ]);
  });

  it("parses CSV with semicolon delimiter", () => {
    const table = parseCsvText("a;b\n1;2,5\n");

    expect(table.headers).toEqual(["a", "b"]);
    expect(table.rows).toEqual([["1", "2,5"]]);
  });

  it("handles quotes, embedded newlines and a byte order mark", () => {
    const table = parseCsvText('\uFEFFName,Notes\n"Oak ""A""","line1\nline2"\n');

    expect(table.headers).toEqual(["Name", "Notes"]);
    expect(table.rows).toEqual([['Oak "A"', "line1\nline2"]]);
  });

  it("skips blank lines and pads short rows", () => {
    const table = parseCsvText("a,b,c\r\n\r\n1\r\n,,\r\n4,5,6\r\n");

    expect(table.rows).toEqual([
      ["1", null, null],
      ["4", "5", "6"]
    ]);
  });

  it("rejects empty CSV text", () => {
    expect(() => parseCsvText("\n\n")).toThrow("CSV appears to be empty.");
  });

  it("reads every sheet of an XLSX workbook", () => {
    const bytes = writeWorkbook({
      "E-Rate": [
        ["Category1_Funding", "Category2_Funding"],
        [100, 20]
      ],
      "Public Housing Funding": [
        ["Development", "Connected"],
        ["Oak Court", true],
        ["Pine View", null]
      ]
    });

    const tables = parseXlsxBuffer(bytes);

    expect(tables.map((table) => table.sheetName)).toEqual(["E-Rate", "Public Housing Funding"]);
    expect(tables[0].rows).toEqual([[100, 20]]);
    expect(tables[1].rows).toEqual([
      ["Oak Court", true],
      ["Pine View", null]
    ]);
  });

  it("detects formats from extension and signature", () => {
    expect(detectFormat(encodeText("a,b"), "export.CSV")).toBe("csv");
    expect(detectFormat(new Uint8Array([0x50, 0x4b, 0x03, 0x04, 0x00]))).toBe("xlsx");
    expect(
      detectFormat(new Uint8Array([0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1, 0x00]))
    ).toBe("xls");
    expect(detectFormat(encodeText("hello"), "notes.txt")).toBeNull();
  });
});

describe("workbook loading", () => {
  it("loads and normalizes a multi-sheet workbook", () => {
    const bytes = writeWorkbook({
      "Emergency Connectivity Fund": [
        ["Billed Entity State", "FRN Approved Amount", "Award Date"],
        ["CA", "$1,000", 45306],
        ["TX", 250, null]
      ],
      NEWS: [["Headline"], ["Funding announced"]]
    });

    const result = loadWorkbook(bytes, { fileName: "Data.xlsx" });

    expect(result.ok).toBe(true);
    if (!result.ok) {
      return;
    }
    const { workbook } = result;
    expect(workbook.sheetNames).toEqual(["Emergency Connectivity Fund", "NEWS"]);
    const ecf = workbook.sheets.get("Emergency Connectivity Fund");
    expect(ecf?.rowCount).toBe(2);
    expect(ecf?.columns).toEqual([
      { name: "Billed Entity State", kind: "text", values: ["CA", "TX"] },
      { name: "FRN Approved Amount", kind: "numeric", values: [1000, 250] },
      { name: "Award Date", kind: "temporal", values: ["2024-01-15T00:00:00.000Z", null] }
    ]);
  });

  it("names a CSV sheet after its file", () => {
    const result = loadWorkbook(encodeText("Category1_Funding\n5\n"), {
      fileName: "reports/E-Rate.csv"
    });

    expect(result.ok && result.workbook.sheetNames).toEqual(["E-Rate"]);
  });

  it("fingerprints identical bytes identically", () => {
    const first = loadWorkbook(encodeText("a\n1\n"), { fileName: "a.csv" });
    const second = loadWorkbook(encodeText("a\n1\n"), { fileName: "b.csv" });

    expect(first.ok && first.workbook.fingerprint).toBe(second.ok && second.workbook.fingerprint);
  });

  it("reports an empty file", () => {
    const result = loadWorkbook(new Uint8Array());

    expect(!result.ok && result.error.code).toBe("EMPTY_FILE");
  });

  it("reports an unsupported format", () => {
    const result = loadWorkbook(encodeText("just some notes"), { fileName: "notes.txt" });

    expect(!result.ok && result.error.code).toBe("UNSUPPORTED_FORMAT");
  });

  it("reports an unreadable file with the reader's message", () => {
    const result = loadWorkbook(encodeText("\n\n"), { fileName: "blank.csv" });

    expect(result.ok).toBe(false);
    if (result.ok) {
      return;
    }
    expect(result.error.code).toBe("UNREADABLE_FILE");
    expect(result.error.details).toBe("CSV appears to be empty.");
  });

  it("reports a workbook without sheets", () => {
    const result = buildWorkbook([], "0-811c9dc5");

    expect(!result.ok && result.error.code).toBe("NO_SHEETS");
  });
});
