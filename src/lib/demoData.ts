import type { PaperColumn, PaperDataset } from "./papers";

export const DEMO_COLUMNS: PaperColumn[] = [
  "title",
  "authors",
  "journal",
  "publication_year",
  "abstract",
  "title_word_count",
  "abstract_word_count",
];

/** Fixed three-paper sample shown whenever the real data file cannot be loaded. */
export const createDemoDataset = (): PaperDataset => ({
  columns: [...DEMO_COLUMNS],
  records: [
    {
      title: "COVID-19 Vaccine Efficacy Study",
      authors: "Smith et al.",
      journal: "Medical Journal",
      publication_year: 2020,
      abstract: "Study of vaccine effectiveness",
      title_word_count: 4,
      abstract_word_count: 3,
    },
    {
      title: "Pandemic Response Analysis",
      authors: "Johnson et al.",
      journal: "Health Review",
      publication_year: 2021,
      abstract: "Analysis of pandemic response",
      title_word_count: 3,
      abstract_word_count: 4,
    },
    {
      title: "Virus Transmission Patterns",
      authors: "Williams et al.",
      journal: "Science Today",
      publication_year: 2022,
      abstract: "Patterns of virus transmission",
      title_word_count: 3,
      abstract_word_count: 4,
    },
  ],
});
