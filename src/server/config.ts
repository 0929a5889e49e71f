import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { z } from "zod";
import explorerConfigJson from "../../data/config/explorer.config.json";
import { ExplorerSettingsSchema, type ExplorerSettings } from "../lib/papers";
import { ConfigError } from "./errors";

export type Env = Record<string, string | undefined>;

export const ExplorerConfigSchema = ExplorerSettingsSchema.extend({
  dataFileName: z.string().min(1).default("cleaned_cord19_data.csv"),
  candidateDirs: z.array(z.string().min(1)).min(1).default(["~/Desktop", ".", "~/Documents"]),
});
export type ExplorerConfig = z.infer<typeof ExplorerConfigSchema>;

export const parseExplorerConfig = (raw: unknown, source: string): ExplorerConfig => {
  const parsed = ExplorerConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid explorer config in ${source}`,
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
    );
  }
  return parsed.data;
};

const readJson = (file: string, readFile: (file: string) => string): unknown => {
  let text: string;
  try {
    text = readFile(file);
  } catch (err) {
    throw new ConfigError(`Could not read explorer config ${file}`, [err instanceof Error ? err.message : String(err)]);
  }
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Explorer config ${file} is not valid JSON`, [err instanceof Error ? err.message : String(err)]);
  }
};

/**
 * Bundled defaults from data/config/explorer.config.json, or the file named by
 * EXPLORER_CONFIG when set.
 */
export const loadExplorerConfig = (
  env: Env = process.env,
  readFile: (file: string) => string = (file) => fs.readFileSync(file, "utf8"),
): ExplorerConfig => {
  const override = env.EXPLORER_CONFIG?.trim();
  if (!override) return parseExplorerConfig(explorerConfigJson, "data/config/explorer.config.json");
  return parseExplorerConfig(readJson(override, readFile), override);
};

export const pickSettings = (config: ExplorerConfig): ExplorerSettings => ({
  previewRows: config.previewRows,
  topJournals: config.topJournals,
  wordCloud: { ...config.wordCloud },
});

export interface CandidateContext {
  env?: Env;
  home?: string;
  cwd?: string;
}

export const expandDir = (dir: string, home: string, cwd: string) => {
  if (dir === "~") return home;
  if (dir.startsWith("~/")) return path.join(home, dir.slice(2));
  return path.resolve(cwd, dir);
};

/** Ordered list of files to try; EXPLORER_DATA_FILE, when set, comes first. */
export const buildCandidates = (
  config: ExplorerConfig,
  { env = process.env, home = os.homedir(), cwd = process.cwd() }: CandidateContext = {},
) => {
  const explicit = env.EXPLORER_DATA_FILE?.trim();
  const fromDirs = config.candidateDirs.map((dir) =>
    path.join(expandDir(dir, home, cwd), config.dataFileName),
  );
  return explicit ? [path.resolve(cwd, explicit), ...fromDirs] : fromDirs;
};
