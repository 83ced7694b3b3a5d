import { fireEvent, render, screen, within } from "@testing-library/react";
import { describe, expect, it } from "vitest";
import { ProgramScreen } from "../components/programs/ProgramScreen";
import { buildSheet, buildTestWorkbook, getProgram } from "./helpers";

const workbook = buildTestWorkbook(
  buildSheet(
    "Public Housing Funding",
    ["Development", "State", "Award_Amount_USD", "Connected"],
    [
      ["Oak Court", "CA", "$100", "yes"],
      ["Pine View", "CA", "$50", "no"],
      ["Elm Row", "TX", 200, "TRUE"]
    ]
  )
);

const card = (name: string) => within(screen.getByRole("article", { name }));

describe("ProgramScreen", () => {
  it("renders each metric card on its own", () => {
    render(<ProgramScreen program={getProgram("public-housing-funding")} workbook={workbook} />);

    expect(screen.getByText("Public Housing Funding Analysis")).toBeInTheDocument();
    expect(screen.getByText("Data loaded: 3 records with 4 columns")).toBeInTheDocument();
    expect(card("Total Developments").getByText("3")).toBeInTheDocument();
    expect(card("Total Funding Awarded").getByText("$350")).toBeInTheDocument();
    expect(card("Connected Developments").getByText("2 (66.7%)")).toBeInTheDocument();
    expect(card("WiFi Available").getByText("Data unavailable")).toBeInTheDocument();
  });

  it("filters rows by the amount range", () => {
    render(<ProgramScreen program={getProgram("public-housing-funding")} workbook={workbook} />);

    expect(screen.getByText("3 of 3 records match.")).toBeInTheDocument();
    fireEvent.change(screen.getByLabelText("Min"), { target: { value: "60" } });

    expect(screen.getByText("2 of 3 records match.")).toBeInTheDocument();
  });

  it("shows an empty state when the sheet is missing", () => {
    render(<ProgramScreen program={getProgram("news")} workbook={workbook} />);

    expect(screen.getByText("Data unavailable")).toBeInTheDocument();
    expect(screen.getByText('Sheet "NEWS" was not found in the workbook.')).toBeInTheDocument();
  });
});
