import fs from "node:fs";
import Papa from "papaparse";
import { createDemoDataset } from "../lib/demoData";
import {
  DEFAULT_PUBLICATION_YEAR,
  PAPER_COLUMNS,
  REQUIRED_COLUMNS,
  type DatasetLoadResult,
  type LoadFailureReason,
  type Notice,
  type Paper,
  type PaperColumn,
  type PaperDataset,
} from "../lib/papers";
import { countWords } from "../lib/wordCount";
import { DataFileNotFoundError, DatasetLoadError, EmptyDatasetError, MissingColumnError } from "./errors";
import { logger as defaultLogger, type Logger } from "./logger";

type CsvRow = Record<string, string | undefined>;

export interface LoadOptions {
  /** Files to try, highest priority first. */
  candidates: string[];
  fileName: string;
  fileExists?: (file: string) => boolean;
  readFile?: (file: string) => Promise<string>;
  logger?: Logger;
  onNotice?: (notice: Notice) => void;
}

export interface LoadedPapers {
  dataset: PaperDataset;
  source: string;
}

export const resolveDataFile = (
  candidates: string[],
  fileExists: (file: string) => boolean = fs.existsSync,
) => candidates.find((candidate) => fileExists(candidate)) ?? null;

// Leading year of an ISO-style value ("2020", "2020-03", "2020-03-15T10:00:00Z").
const ISO_YEAR = /^(\d{4})(?:-\d{2}(?:-\d{2})?)?(?:[T ]|$)/;

export const parsePublishTime = (raw: string | null) => {
  if (raw == null || !/\d{4}/.test(raw)) return null;
  const value = raw.trim();
  const t = Date.parse(value);
  if (Number.isNaN(t)) return null;
  const date = new Date(t);
  // The written year wins over the offset and the host time zone.
  const written = ISO_YEAR.exec(value);
  return { iso: date.toISOString(), year: written ? Number(written[1]) : date.getFullYear() };
};

const cell = (row: CsvRow, column: string) => {
  const value = row[column];
  return value === undefined || value === "" ? null : value;
};

const isBlank = (raw: string | null) => raw == null || raw.trim() === "";

const toYear = (raw: string | null) => {
  if (isBlank(raw)) return DEFAULT_PUBLICATION_YEAR;
  const n = Number(raw);
  return Number.isFinite(n) ? Math.trunc(n) : DEFAULT_PUBLICATION_YEAR;
};

// Blank cells in a supplied count column are recounted from the text.
const toCount = (raw: string | null, text: string | null) => {
  if (!isBlank(raw)) {
    const n = Number(raw);
    if (Number.isFinite(n)) return n;
  }
  return countWords(text);
};

const toPaper = (row: CsvRow, header: ReadonlySet<string>): Paper => {
  const title = cell(row, "title");
  const abstract = cell(row, "abstract");

  const paper: Paper = {
    title,
    journal: cell(row, "journal"),
    abstract,
    publication_year: DEFAULT_PUBLICATION_YEAR,
    title_word_count: header.has("title_word_count")
      ? toCount(cell(row, "title_word_count"), title)
      : countWords(title),
    abstract_word_count: header.has("abstract_word_count")
      ? toCount(cell(row, "abstract_word_count"), abstract)
      : countWords(abstract),
  };
  if (header.has("authors")) paper.authors = cell(row, "authors");

  if (header.has("publish_time")) {
    const published = parsePublishTime(cell(row, "publish_time"));
    paper.publish_time = published?.iso ?? null;
    paper.publication_year = published?.year ?? DEFAULT_PUBLICATION_YEAR;
  } else if (header.has("publication_year")) {
    paper.publication_year = toYear(cell(row, "publication_year"));
  }
  return paper;
};

const DERIVED_COLUMNS: ReadonlySet<PaperColumn> = new Set([
  "publication_year",
  "title_word_count",
  "abstract_word_count",
]);

export const parsePapersCsv = (text: string, source: string, log: Logger = defaultLogger): PaperDataset => {
  const parsed = Papa.parse<CsvRow>(text.replace(/^\uFEFF/, ""), {
    header: true,
    skipEmptyLines: "greedy",
  });
  if (parsed.errors.length) {
    log.warn(
      { source, errors: parsed.errors.slice(0, 5).map((e) => `${e.code} (row ${e.row}): ${e.message}`) },
      `CSV parser reported ${parsed.errors.length} issue(s)`,
    );
  }
  if (!parsed.data.length) throw new EmptyDatasetError(source);

  const header = new Set(parsed.meta.fields ?? []);
  for (const column of REQUIRED_COLUMNS) {
    if (!header.has(column)) throw new MissingColumnError(column);
  }

  return {
    columns: PAPER_COLUMNS.filter((column) => header.has(column) || DERIVED_COLUMNS.has(column)),
    records: parsed.data.map((row) => toPaper(row, header)),
  };
};

export const loadPaperDataset = async ({
  candidates,
  fileName,
  fileExists = fs.existsSync,
  readFile = (file) => fs.promises.readFile(file, "utf8"),
  logger: log = defaultLogger,
  onNotice,
}: LoadOptions): Promise<LoadedPapers> => {
  log.debug({ candidates }, "Looking for data file");
  const source = resolveDataFile(candidates, fileExists);
  if (source == null) throw new DataFileNotFoundError(fileName, candidates);

  log.info({ source }, "Loading data file");
  onNotice?.({ level: "info", message: `Loading data from: ${source}` });

  const dataset = parsePapersCsv(await readFile(source), source, log);
  log.info({ source, papers: dataset.records.length, columns: dataset.columns }, "Data file loaded");
  return { dataset, source };
};

const describeFailure = (err: unknown): { reason: LoadFailureReason; message: string } => {
  if (err instanceof DatasetLoadError) return { reason: err.kind, message: err.message };
  const detail = err instanceof Error ? err.message : String(err);
  return { reason: "unexpected", message: `Error loading data: ${detail}` };
};

export const fallbackResult = (
  reason: LoadFailureReason,
  message: string,
  notices: Notice[],
): DatasetLoadResult => ({
  status: "fallback",
  dataset: createDemoDataset(),
  reason,
  message,
  notices: [
    ...notices,
    { level: "error", message },
    { level: "info", message: "Demonstration mode activated with sample data" },
  ],
});

/** Never rejects: every failure turns into a demo-data fallback. */
export const loadDatasetOrDemo = async (options: LoadOptions): Promise<DatasetLoadResult> => {
  const log = options.logger ?? defaultLogger;
  const notices: Notice[] = [];
  try {
    const { dataset, source } = await loadPaperDataset({
      ...options,
      onNotice: (notice) => {
        notices.push(notice);
        options.onNotice?.(notice);
      },
    });
    notices.push({
      level: "success",
      message: `Data loaded successfully! ${dataset.records.length.toLocaleString("en-US")} research papers`,
    });
    return { status: "loaded", dataset, source, notices };
  } catch (err) {
    const { reason, message } = describeFailure(err);
    if (reason === "unexpected") log.error({ err }, "Unexpected failure while loading data");
    else log.warn({ reason }, message);
    return fallbackResult(reason, message, notices);
  }
};
