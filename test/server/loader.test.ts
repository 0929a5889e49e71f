import os from "node:os";
import path from "node:path";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import type { Notice } from "@/lib/papers";
import { DataFileNotFoundError, EmptyDatasetError, MissingColumnError } from "@/server/errors";
import { loadDatasetOrDemo, loadPaperDataset, parsePapersCsv, parsePublishTime, resolveDataFile } from "@/server/loader";
import { createLogger } from "@/server/logger";

const FILE_NAME = "cleaned_cord19_data.csv";
const log = createLogger("silent");

describe("loader", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "cord19-loader-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const writeCsv = async (relative: string, content: string) => {
    const file = path.join(dir, relative);
    await mkdir(path.dirname(file), { recursive: true });
    await writeFile(file, content, "utf8");
    return file;
  };

  const load = (candidates: string[], onNotice?: (notice: Notice) => void) =>
    loadPaperDataset({ candidates, fileName: FILE_NAME, logger: log, onNotice });

  describe("resolveDataFile", () => {
    test("returns the first candidate that exists", () => {
      const existing = new Set(["/b/data.csv", "/c/data.csv"]);
      expect(resolveDataFile(["/a/data.csv", "/b/data.csv", "/c/data.csv"], (f) => existing.has(f))).toBe(
        "/b/data.csv",
      );
    });

    test("returns null when nothing exists", () => {
      expect(resolveDataFile(["/a/data.csv"], () => false)).toBeNull();
    });
  });

  describe("parsePublishTime", () => {
    test("parses dates and keeps the calendar year", () => {
      expect(parsePublishTime("2021-03-15")).toEqual({ iso: "2021-03-15T00:00:00.000Z", year: 2021 });
      expect(parsePublishTime("2022")).toEqual({ iso: "2022-01-01T00:00:00.000Z", year: 2022 });
    });

    test("keeps the written year whatever the host time zone", () => {
      const tz = process.env.TZ;
      process.env.TZ = "America/New_York";
      try {
        expect(parsePublishTime("2020-01-01T00:00:00Z")).toEqual({ iso: "2020-01-01T00:00:00.000Z", year: 2020 });
        expect(parsePublishTime("2021-12-31T23:30:00-05:00")).toEqual({
          iso: "2022-01-01T04:30:00.000Z",
          year: 2021,
        });
      } finally {
        if (tz === undefined) delete process.env.TZ;
        else process.env.TZ = tz;
      }
    });

    test("returns null for missing or unparseable values", () => {
      expect(parsePublishTime(null)).toBeNull();
      expect(parsePublishTime("not a date")).toBeNull();
      expect(parsePublishTime("2021-99-99")).toBeNull();
    });
  });

  describe("parsePapersCsv", () => {
    test("treats a whitespace-only year cell as missing", () => {
      const { records } = parsePapersCsv("title,journal,abstract,publication_year\nA,J,x, \n", "inline.csv", log);
      expect(records[0].publication_year).toBe(2020);
    });

    test("recounts a whitespace-only word-count cell", () => {
      const { records } = parsePapersCsv("title,journal,abstract,title_word_count\nTwo words,J,x, \n", "inline.csv", log);
      expect(records[0].title_word_count).toBe(2);
    });
  });

  describe("loadPaperDataset", () => {
    test("prefers the first existing candidate", async () => {
      const first = await writeCsv(`desktop/${FILE_NAME}`, "title,journal,abstract\nFirst copy,J,x\n");
      const second = await writeCsv(`cwd/${FILE_NAME}`, "title,journal,abstract\nSecond copy,J,x\n");

      const { source, dataset } = await load([path.join(dir, "missing", FILE_NAME), first, second]);

      expect(source).toBe(first);
      expect(dataset.records.map((p) => p.title)).toEqual(["First copy"]);
    });

    test("derives years and word counts", async () => {
      const file = await writeCsv(
        FILE_NAME,
        [
          "title,authors,journal,publish_time,abstract",
          "COVID-19 Vaccine Efficacy Study,Smith et al.,Medical Journal,2021-03-15,Study of vaccine effectiveness",
          ",Doe,Health Review,not a date,",
          '"Masks, cloth and N95",Lee,Lancet,2022,Short abstract here',
        ].join("\n"),
      );

      const { dataset } = await load([file]);

      expect(dataset.columns).toEqual([
        "title",
        "authors",
        "journal",
        "publish_time",
        "publication_year",
        "abstract",
        "title_word_count",
        "abstract_word_count",
      ]);
      expect(dataset.records).toEqual([
        {
          title: "COVID-19 Vaccine Efficacy Study",
          authors: "Smith et al.",
          journal: "Medical Journal",
          publish_time: "2021-03-15T00:00:00.000Z",
          publication_year: 2021,
          abstract: "Study of vaccine effectiveness",
          title_word_count: 4,
          abstract_word_count: 4,
        },
        {
          title: null,
          authors: "Doe",
          journal: "Health Review",
          publish_time: null,
          publication_year: 2020,
          abstract: null,
          title_word_count: 1,
          abstract_word_count: 1,
        },
        {
          title: "Masks, cloth and N95",
          authors: "Lee",
          journal: "Lancet",
          publish_time: "2022-01-01T00:00:00.000Z",
          publication_year: 2022,
          abstract: "Short abstract here",
          title_word_count: 4,
          abstract_word_count: 3,
        },
      ]);
    });

    test("keeps supplied word counts and recounts blank ones", async () => {
      const file = await writeCsv(
        FILE_NAME,
        "title,journal,abstract,title_word_count,abstract_word_count\nOne two,J,three four five,7,\n",
      );

      const { dataset } = await load([file]);

      expect(dataset.records[0]).toMatchObject({ title_word_count: 7, abstract_word_count: 3 });
    });

    test("uses a publication_year column when there is no publish_time", async () => {
      const file = await writeCsv(
        FILE_NAME,
        "title,journal,abstract,publication_year\nA,J,x,2019\nB,J,x,\nC,J,x,abc\n",
      );

      const { dataset } = await load([file]);

      expect(dataset.records.map((p) => p.publication_year)).toEqual([2019, 2020, 2020]);
      expect(dataset.columns).not.toContain("authors");
    });

    test("strips a byte order mark from the header", async () => {
      const file = await writeCsv(FILE_NAME, "\uFEFFtitle,journal,abstract\nA b,J,x y\n");
      const { dataset } = await load([file]);
      expect(dataset.records[0]?.title).toBe("A b");
    });

    test("reports where it is loading from", async () => {
      const file = await writeCsv(FILE_NAME, "title,journal,abstract\nA,J,x\n");
      const notices: Notice[] = [];

      await load([file], (notice) => notices.push(notice));

      expect(notices).toEqual([{ level: "info", message: `Loading data from: ${file}` }]);
    });

    test("fails when no candidate exists", async () => {
      await expect(load([path.join(dir, FILE_NAME)])).rejects.toBeInstanceOf(DataFileNotFoundError);
    });

    test("fails on a file without rows", async () => {
      const headerOnly = await writeCsv("header.csv", "title,journal,abstract\n");
      const blank = await writeCsv("blank.csv", "");

      await expect(load([headerOnly])).rejects.toBeInstanceOf(EmptyDatasetError);
      await expect(load([blank])).rejects.toBeInstanceOf(EmptyDatasetError);
    });

    test("fails on the first missing required column", async () => {
      const file = await writeCsv(FILE_NAME, "title,authors\nA,B\n");

      await expect(load([file])).rejects.toBeInstanceOf(MissingColumnError);
      await expect(load([file])).rejects.toThrow("Required column 'journal' not found in data.");
    });
  });

  describe("loadDatasetOrDemo", () => {
    test("tags a successful load, even for a tiny file", async () => {
      const file = await writeCsv(FILE_NAME, "title,journal,abstract\nA,J,x\nB,K,y\n");

      const result = await loadDatasetOrDemo({ candidates: [file], fileName: FILE_NAME, logger: log });

      expect(result.status).toBe("loaded");
      expect(result.dataset.records).toHaveLength(2);
      expect(result.notices).toEqual([
        { level: "info", message: `Loading data from: ${file}` },
        { level: "success", message: "Data loaded successfully! 2 research papers" },
      ]);
    });

    test("falls back to demo data when the file is missing", async () => {
      const result = await loadDatasetOrDemo({
        candidates: [path.join(dir, FILE_NAME)],
        fileName: FILE_NAME,
        logger: log,
      });

      expect(result).toMatchObject({
        status: "fallback",
        reason: "not_found",
        message: "Data file not found. Please make sure 'cleaned_cord19_data.csv' exists.",
      });
      expect(result.dataset.records).toHaveLength(3);
      expect(result.notices.map((n) => n.level)).toEqual(["error", "info"]);
    });

    test("converts unexpected errors into a fallback", async () => {
      const result = await loadDatasetOrDemo({
        candidates: ["/data/papers.csv"],
        fileName: FILE_NAME,
        fileExists: () => true,
        readFile: async () => {
          throw new Error("disk unavailable");
        },
        logger: log,
      });

      expect(result).toMatchObject({
        status: "fallback",
        reason: "unexpected",
        message: "Error loading data: disk unavailable",
      });
      expect(result.notices).toEqual([
        { level: "info", message: "Loading data from: /data/papers.csv" },
        { level: "error", message: "Error loading data: disk unavailable" },
        { level: "info", message: "Demonstration mode activated with sample data" },
      ]);
    });
  });
});
