import { render, screen, within } from "@testing-library/react";
import * as XLSX from "xlsx";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import App from "../App";

const workbookBytes = (): ArrayBuffer => {
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(
    workbook,
    XLSX.utils.aoa_to_sheet([
      ["Billed Entity State", "FRN Approved Amount"],
      ["CA", 1200],
      ["TX", 300]
    ]),
    "Emergency Connectivity Fund"
  );
  return XLSX.write(workbook, { type: "array", bookType: "xlsx" });
};

describe("App", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it("asks for an upload when the default workbook is unavailable", async () => {
    vi.stubGlobal("fetch", vi.fn().mockRejectedValue(new Error("offline")));

    render(<App />);

    expect(screen.getByText("Broadband Funding Dashboard")).toBeInTheDocument();
    expect(await screen.findByText("Upload your Excel file")).toBeInTheDocument();
    expect(
      screen.getByText("Could not find Data.xlsx automatically. Upload the workbook to continue.")
    ).toBeInTheDocument();
  });

  it("shows the overview once the default workbook loads", async () => {
    const bytes = workbookBytes();
    vi.stubGlobal(
      "fetch",
      vi.fn().mockResolvedValue({
        ok: true,
        status: 200,
        headers: { get: () => "Data.xlsx" },
        text: async () => "",
        arrayBuffer: async () => bytes
      })
    );

    render(<App />);

    const funding = await screen.findByRole("article", { name: "Total Funding Amount" });
    expect(within(funding).getByText("$1,500")).toBeInTheDocument();
    const states = screen.getByRole("article", { name: "States Covered" });
    expect(within(states).getByText("2")).toBeInTheDocument();
    expect(screen.getByText("Data.xlsx")).toBeInTheDocument();
  });
});
