import type { PaperDataset } from "./papers";

export interface PaperSummary {
  totalPapers: number;
  uniqueJournals: number;
  avgTitleWords: number | null;
  avgAbstractWords: number | null;
}

const mean = (values: number[]) => {
  if (!values.length) return null;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
};

export const summarizePapers = (dataset: PaperDataset): PaperSummary => {
  const journals = new Set<string>();
  dataset.records.forEach((paper) => {
    if (paper.journal != null) journals.add(paper.journal);
  });
  return {
    totalPapers: dataset.records.length,
    uniqueJournals: journals.size,
    avgTitleWords: mean(dataset.records.map((p) => p.title_word_count)),
    avgAbstractWords: mean(dataset.records.map((p) => p.abstract_word_count)),
  };
};

export const NOT_AVAILABLE = "N/A";

export const formatAverage = (value: number | null) => {
  if (value == null || !Number.isFinite(value)) return NOT_AVAILABLE;
  return value.toFixed(1);
};

export const formatMetric = (value: number | null) => {
  if (value == null || !Number.isFinite(value)) return NOT_AVAILABLE;
  if (Number.isInteger(value)) return value.toLocaleString("en-US");
  return value.toFixed(1);
};
