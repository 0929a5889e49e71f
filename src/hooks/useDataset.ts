import { useEffect, useState } from "react";
import { fetchDataset, localFallback } from "@/lib/api";
import type { DatasetResponse } from "@/lib/papers";

export type DatasetState = { status: "loading" } | ({ status: "ready" } & DatasetResponse);

export const useDataset = (fetchImpl?: typeof fetch): DatasetState => {
  const [state, setState] = useState<DatasetState>({ status: "loading" });

  useEffect(() => {
    let cancelled = false;
    void fetchDataset(fetchImpl)
      .catch((err: unknown) => {
        console.error("[dataset]", err);
        return localFallback(err);
      })
      .then((response) => {
        if (!cancelled) setState({ status: "ready", ...response });
      });
    return () => {
      cancelled = true;
    };
  }, [fetchImpl]);

  return state;
};
