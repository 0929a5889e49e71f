import type { Paper, PaperDataset } from "@/lib/papers";

export const paper = (overrides: Partial<Paper> = {}): Paper => ({
  title: "Sample Paper Title",
  authors: "Doe et al.",
  journal: "Sample Journal",
  publication_year: 2020,
  abstract: "A short abstract",
  title_word_count: 3,
  abstract_word_count: 3,
  ...overrides,
});

export const dataset = (records: Paper[]): PaperDataset => ({
  columns: ["title", "authors", "journal", "publication_year", "abstract", "title_word_count", "abstract_word_count"],
  records,
});
