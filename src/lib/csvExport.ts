import Papa from "papaparse";
import type { Paper, PaperColumn, PaperDataset } from "./papers";

export const PREVIEW_COLUMNS = ["title", "authors", "journal", "publication_year"] as const satisfies readonly PaperColumn[];
export type PreviewColumn = (typeof PREVIEW_COLUMNS)[number];

export const EXPORT_FILE_NAME = "filtered_cord19_data.csv";
export const EXPORT_MIME_TYPE = "text/csv";

export type PreviewRow = Partial<Record<PreviewColumn, string | number | null>>;

export const getDisplayColumns = (dataset: PaperDataset): PreviewColumn[] =>
  PREVIEW_COLUMNS.filter((column) => dataset.columns.includes(column));

const pick = (paper: Paper, columns: PreviewColumn[]): PreviewRow => {
  const row: PreviewRow = {};
  columns.forEach((column) => {
    row[column] = paper[column] ?? null;
  });
  return row;
};

export const previewRows = (dataset: PaperDataset, limit = 20): PreviewRow[] => {
  const columns = getDisplayColumns(dataset);
  return dataset.records.slice(0, limit).map((paper) => pick(paper, columns));
};

/** Every filtered row, not only the preview. Empty string when nothing is displayable. */
export const papersToCsv = (dataset: PaperDataset) => {
  const columns = getDisplayColumns(dataset);
  if (!columns.length) return "";
  const rows = dataset.records.map((paper) => columns.map((column) => paper[column] ?? ""));
  const body = Papa.unparse({ fields: columns, data: rows }, { newline: "\n" });
  // unparse already ends a header-only body with a newline
  return body.endsWith("\n") ? body : `${body}\n`;
};

export const downloadCsv = (csv: string, fileName = EXPORT_FILE_NAME) => {
  const blob = new Blob([csv], { type: `${EXPORT_MIME_TYPE};charset=utf-8` });
  const url = URL.createObjectURL(blob);
  const link = document.createElement("a");
  link.href = url;
  link.download = fileName;
  link.click();
  URL.revokeObjectURL(url);
};
