import { DEFAULT_SETTINGS, type DatasetResponse } from "../lib/papers";
import { buildCandidates, loadExplorerConfig, pickSettings, type Env, type ExplorerConfig } from "./config";
import { createDatasetAccessor } from "./datasetCache";
import { fallbackResult, loadDatasetOrDemo, type LoadOptions } from "./loader";
import { logger as defaultLogger, type Logger } from "./logger";

export interface DatasetServiceOptions {
  env?: Env;
  logger?: Logger;
  home?: string;
  cwd?: string;
  fileExists?: LoadOptions["fileExists"];
  readFile?: LoadOptions["readFile"];
}

export const buildDatasetResponse = async ({
  env = process.env,
  logger: log = defaultLogger,
  home,
  cwd,
  fileExists,
  readFile,
}: DatasetServiceOptions = {}): Promise<DatasetResponse> => {
  let config: ExplorerConfig;
  try {
    config = loadExplorerConfig(env);
  } catch (err) {
    log.error({ err }, "Explorer config rejected");
    const detail = err instanceof Error ? err.message : String(err);
    return {
      result: fallbackResult("unexpected", `Error loading data: ${detail}`, []),
      settings: DEFAULT_SETTINGS,
    };
  }

  const result = await loadDatasetOrDemo({
    candidates: buildCandidates(config, { env, home, cwd }),
    fileName: config.dataFileName,
    fileExists,
    readFile,
    logger: log,
  });
  return { result, settings: pickSettings(config) };
};

/** One load per server process; restart the server to pick up a new file. */
export const createDatasetService = (options: DatasetServiceOptions = {}) =>
  createDatasetAccessor(() => buildDatasetResponse(options));
