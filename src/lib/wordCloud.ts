import stopwordList from "../../data/stopwords.json";
import type { PaperDataset } from "./papers";

export class WordCloudError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "WordCloudError";
  }
}

export const DEFAULT_STOPWORDS: ReadonlySet<string> = new Set(stopwordList);

export interface WeightedWord {
  text: string;
  count: number;
  /** count relative to the most frequent word, in (0, 1] */
  weight: number;
}

export interface WordFrequencyOptions {
  maxWords?: number;
  stopwords?: ReadonlySet<string>;
}

// A word is at least two characters; apostrophes may appear after the first one.
const TOKEN_PATTERN = /[\p{L}\p{N}_][\p{L}\p{N}_']+/gu;

export const buildTitleCorpus = (dataset: PaperDataset) =>
  dataset.records
    .map((paper) => paper.title)
    .filter((title): title is string => title != null)
    .map((title) => title.toLowerCase())
    .join(" ");

const foldPlurals = (counts: Map<string, number>) => {
  for (const [word, count] of Array.from(counts)) {
    if (!word.endsWith("s") || word.endsWith("ss")) continue;
    const singular = word.slice(0, -1);
    const singularCount = counts.get(singular);
    if (singularCount === undefined) continue;
    counts.set(singular, singularCount + count);
    counts.delete(word);
  }
  return counts;
};

export const computeWordFrequencies = (
  text: string,
  { maxWords = 200, stopwords = DEFAULT_STOPWORDS }: WordFrequencyOptions = {},
): WeightedWord[] => {
  const counts = new Map<string, number>();
  for (const match of text.matchAll(TOKEN_PATTERN)) {
    let word = match[0];
    if (word.toLowerCase().endsWith("'s")) word = word.slice(0, -2);
    if (/^\d+$/.test(word)) continue;
    if (stopwords.has(word.toLowerCase())) continue;
    counts.set(word, (counts.get(word) || 0) + 1);
  }

  const ranked = Array.from(foldPlurals(counts), ([word, count]) => ({ word, count }))
    .sort((a, b) => b.count - a.count || (a.word < b.word ? -1 : a.word > b.word ? 1 : 0))
    .slice(0, maxWords);

  if (!ranked.length) {
    throw new WordCloudError("We need at least 1 word to plot a word cloud, got 0.");
  }

  const top = ranked[0].count;
  return ranked.map(({ word, count }) => ({ text: word, count, weight: count / top }));
};

export const fontSizeFor = (weight: number, minSize = 12, maxSize = 64) =>
  Math.round(minSize + (maxSize - minSize) * weight);
