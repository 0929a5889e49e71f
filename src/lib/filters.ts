import type { PaperDataset } from "./papers";

export const ALL_JOURNALS = "All Journals";

export type YearRange = [number, number];

export interface PaperFilter {
  yearRange: YearRange;
  journal: string;
}

export interface YearBounds {
  min: number;
  max: number;
}

export const getYearBounds = (dataset: PaperDataset): YearBounds | null => {
  if (!dataset.records.length) return null;
  let min = Infinity;
  let max = -Infinity;
  for (const paper of dataset.records) {
    if (paper.publication_year < min) min = paper.publication_year;
    if (paper.publication_year > max) max = paper.publication_year;
  }
  return { min: Math.trunc(min), max: Math.trunc(max) };
};

const compareCodePoints = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

export const getJournalOptions = (dataset: PaperDataset) => {
  const journals = new Set<string>();
  dataset.records.forEach((paper) => {
    if (paper.journal != null) journals.add(paper.journal);
  });
  return [ALL_JOURNALS, ...Array.from(journals).sort(compareCodePoints)];
};

export const clampYearRange = ([from, to]: YearRange, bounds: YearBounds): YearRange => {
  const lo = Math.min(Math.max(Math.min(from, to), bounds.min), bounds.max);
  const hi = Math.max(Math.min(Math.max(from, to), bounds.max), bounds.min);
  return [lo, hi];
};

/** Returns a new dataset; the input is never modified. */
export const filterPapers = (dataset: PaperDataset, filter: PaperFilter): PaperDataset => {
  const [from, to] = filter.yearRange;
  const journal = filter.journal;
  return {
    columns: [...dataset.columns],
    records: dataset.records.filter((paper) => {
      if (paper.publication_year < from || paper.publication_year > to) return false;
      if (journal !== ALL_JOURNALS && paper.journal !== journal) return false;
      return true;
    }),
  };
};
