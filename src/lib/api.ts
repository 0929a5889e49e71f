import { createDemoDataset } from "./demoData";
import { DEFAULT_SETTINGS, DatasetResponseSchema, type DatasetResponse } from "./papers";

export const DATASET_URL = "/api/dataset";

export const fetchDataset = async (fetchImpl: typeof fetch = fetch): Promise<DatasetResponse> => {
  const res = await fetchImpl(DATASET_URL, { headers: { Accept: "application/json" } });
  if (!res.ok) throw new Error(`Dataset request failed with status ${res.status}`);
  return DatasetResponseSchema.parse(await res.json());
};

/** Used when the dataset endpoint itself is unreachable. */
export const localFallback = (err: unknown): DatasetResponse => {
  const detail = err instanceof Error ? err.message : String(err);
  const message = `Error loading data: ${detail}`;
  return {
    result: {
      status: "fallback",
      dataset: createDemoDataset(),
      reason: "unexpected",
      message,
      notices: [
        { level: "error", message },
        { level: "info", message: "Demonstration mode activated with sample data" },
      ],
    },
    settings: DEFAULT_SETTINGS,
  };
};
