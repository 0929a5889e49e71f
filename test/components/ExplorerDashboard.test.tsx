// @vitest-environment jsdom
import { fireEvent, render, screen, within } from "@testing-library/react";
import { describe, expect, test, vi } from "vitest";
import { ExplorerDashboard } from "@/pages/Explorer";
import { localFallback } from "@/lib/api";
import { DEFAULT_SETTINGS, type DatasetLoadResult } from "@/lib/papers";
import { dataset, paper } from "../fixtures";

vi.mock("@/lib/plotly", () => ({ Plot: () => null }));

const statValue = (title: string) => within(screen.getByRole("group", { name: title }));

describe("ExplorerDashboard", () => {
  test("shows demo instructions and metrics for the fallback dataset", () => {
    const { result, settings } = localFallback(new Error("offline"));
    render(<ExplorerDashboard result={result} settings={settings} />);

    expect(screen.getByText("Error loading data: offline")).toBeTruthy();
    expect(screen.getByText("Using demonstration data. To use your real data:")).toBeTruthy();
    expect(screen.queryByText("Using demonstration data.")).toBeNull();
    expect(screen.getByText("How to Use Your Real Data")).toBeTruthy();
    expect(statValue("Total Papers").getByText("3")).toBeTruthy();
    expect(statValue("Unique Journals").getByText("3")).toBeTruthy();
    expect(statValue("Avg Title Words").getByText("3.3")).toBeTruthy();
    expect(statValue("Avg Abstract Words").getByText("3.7")).toBeTruthy();
  });

  test("recomputes metrics when a journal is selected", () => {
    const { result, settings } = localFallback(new Error("offline"));
    render(<ExplorerDashboard result={result} settings={settings} />);

    fireEvent.change(screen.getByDisplayValue("All Journals"), { target: { value: "Health Review" } });

    expect(statValue("Total Papers").getByText("1")).toBeTruthy();
    expect(statValue("Avg Title Words").getByText("3.0")).toBeTruthy();
    expect(statValue("Avg Abstract Words").getByText("4.0")).toBeTruthy();
    expect(screen.getByRole("status", { name: "Filter Results" }).textContent).toBe(
      "Filter Results:1 papers2020 - 2022",
    );
  });

  test("lists the filtered rows in the data explorer tab", () => {
    const { result, settings } = localFallback(new Error("offline"));
    render(<ExplorerDashboard result={result} settings={settings} />);

    fireEvent.click(screen.getByRole("tab", { name: "Data Explorer" }));

    expect(screen.getByText("Showing 3 of 3 papers")).toBeTruthy();
  });

  test("treats a small real dataset as real data", () => {
    const result: DatasetLoadResult = {
      status: "loaded",
      source: "/data/papers.csv",
      dataset: dataset([paper({ journal: "BMJ" }), paper({ journal: "Cell", publication_year: 2021 })]),
      notices: [{ level: "success", message: "Data loaded successfully! 2 research papers" }],
    };
    render(<ExplorerDashboard result={result} settings={DEFAULT_SETTINGS} />);

    expect(screen.getByText("Data loaded successfully! 2 research papers")).toBeTruthy();
    expect(screen.queryByText("How to Use Your Real Data")).toBeNull();
    expect(statValue("Total Papers").getByText("2")).toBeTruthy();
  });
});
