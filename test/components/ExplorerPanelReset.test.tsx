// @vitest-environment jsdom
import type { ComponentProps } from "react";
import { fireEvent, render, screen } from "@testing-library/react";
import { afterEach, describe, expect, test, vi } from "vitest";
import type { FilterSidebar } from "@/components/explorer/FilterSidebar";
import { DEFAULT_SETTINGS, type DatasetLoadResult, type PaperDataset } from "@/lib/papers";
import { ExplorerDashboard } from "@/pages/Explorer";
import { dataset, paper } from "../fixtures";

vi.mock("@/lib/plotly", () => ({ Plot: () => null }));

vi.mock("@/components/explorer/FilterSidebar", () => ({
  FilterSidebar: ({ onYearRangeChange }: ComponentProps<typeof FilterSidebar>) => (
    <div>
      <button type="button" onClick={() => onYearRangeChange([2021, 2022])}>
        Later years
      </button>
      <button type="button" onClick={() => onYearRangeChange([2020, 2021])}>
        Earlier years
      </button>
    </div>
  ),
}));

vi.mock("@/components/explorer/PublicationTrendChart", () => ({
  PublicationTrendChart: ({ dataset: shown }: { dataset: PaperDataset }) => {
    if (shown.records.some((p) => p.publication_year === 2022)) throw new Error("cannot chart 2022");
    return <p>Trend for {shown.records.length} papers</p>;
  },
}));

afterEach(() => {
  vi.restoreAllMocks();
});

describe("ExplorerDashboard panel errors", () => {
  test("clears a panel error when only the year range changes", () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const result: DatasetLoadResult = {
      status: "loaded",
      source: "/data/papers.csv",
      dataset: dataset([paper({ publication_year: 2020 }), paper({ publication_year: 2022 })]),
      notices: [],
    };
    render(<ExplorerDashboard result={result} settings={DEFAULT_SETTINGS} />);

    expect(screen.getByText("Could not render trends: cannot chart 2022")).toBeTruthy();

    fireEvent.click(screen.getByRole("button", { name: "Later years" }));
    expect(screen.getByText("Could not render trends: cannot chart 2022")).toBeTruthy();

    // Same row count as before; only the range differs.
    fireEvent.click(screen.getByRole("button", { name: "Earlier years" }));
    expect(screen.getByText("Trend for 1 papers")).toBeTruthy();
  });
});
