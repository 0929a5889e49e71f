import type { Config, Data, Layout } from "plotly.js";
import type { PaperDataset } from "./papers";

export interface YearCount {
  year: number;
  count: number;
}

export interface JournalCount {
  journal: string;
  count: number;
}

export const countByYear = (dataset: PaperDataset): YearCount[] => {
  const counts = new Map<number, number>();
  dataset.records.forEach((paper) => {
    counts.set(paper.publication_year, (counts.get(paper.publication_year) || 0) + 1);
  });
  return Array.from(counts, ([year, count]) => ({ year, count })).sort((a, b) => a.year - b.year);
};

// Ties keep the order in which journals first appear.
export const topJournals = (dataset: PaperDataset, limit = 10): JournalCount[] => {
  const counts = new Map<string, number>();
  dataset.records.forEach((paper) => {
    if (paper.journal == null) return;
    counts.set(paper.journal, (counts.get(paper.journal) || 0) + 1);
  });
  return Array.from(counts, ([journal, count]) => ({ journal, count }))
    .sort((a, b) => b.count - a.count)
    .slice(0, limit);
};

export const plotConfig: Partial<Config> = {
  displaylogo: false,
  displayModeBar: true,
  responsive: true,
};

export const yearChartTraces = (rows: YearCount[]): Data[] => [
  {
    type: "bar",
    x: rows.map((row) => String(row.year)),
    y: rows.map((row) => row.count),
    marker: { color: "skyblue", opacity: 0.7 },
    hovertemplate: "%{x}: %{y} papers<extra></extra>",
  },
];

export const yearChartLayout: Partial<Layout> = {
  title: { text: "Number of Publications by Year" },
  margin: { l: 50, r: 20, t: 40, b: 60 },
  xaxis: { title: { text: "Year" }, type: "category", tickangle: -45 },
  yaxis: { title: { text: "Count" }, rangemode: "tozero" },
};

export const journalChartTraces = (rows: JournalCount[]): Data[] => [
  {
    type: "bar",
    orientation: "h",
    x: rows.map((row) => row.count),
    y: rows.map((row) => row.journal),
    marker: { color: "lightgreen" },
    hovertemplate: "%{y}: %{x} papers<extra></extra>",
  },
];

export const journalChartLayout: Partial<Layout> = {
  title: { text: "Top Journals by Publication Count" },
  margin: { l: 200, r: 20, t: 40, b: 50 },
  xaxis: { title: { text: "Number of Publications" }, rangemode: "tozero" },
  yaxis: { autorange: "reversed", automargin: true },
};
