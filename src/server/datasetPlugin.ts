import type { Plugin } from "vite";
import type { DatasetResponse } from "../lib/papers";
import { createDatasetService, type DatasetServiceOptions } from "./datasetService";
import { logger as defaultLogger, type Logger } from "./logger";

export const DATASET_ENDPOINT = "/api/dataset";

export interface EndpointRequest {
  method?: string;
}

export interface EndpointResponse {
  statusCode: number;
  setHeader(name: string, value: string): unknown;
  end(body?: string): unknown;
}

export const createDatasetMiddleware =
  (getResponse: () => Promise<DatasetResponse>, log: Logger = defaultLogger) =>
  (req: EndpointRequest, res: EndpointResponse, next: (err?: unknown) => void) => {
    if (req.method !== "GET" && req.method !== "HEAD") {
      res.statusCode = 405;
      res.setHeader("Allow", "GET, HEAD");
      res.end();
      return;
    }

    getResponse()
      .then((body) => {
        res.statusCode = 200;
        res.setHeader("Content-Type", "application/json; charset=utf-8");
        res.setHeader("Cache-Control", "no-store");
        res.end(req.method === "HEAD" ? undefined : JSON.stringify(body));
      })
      .catch((err: unknown) => {
        log.error({ err }, "Dataset endpoint failed");
        next(err);
      });
  };

/** Serves the loaded dataset from the dev and preview servers. */
export const datasetPlugin = (options: DatasetServiceOptions = {}): Plugin => {
  const log = options.logger ?? defaultLogger;
  const handler = createDatasetMiddleware(createDatasetService(options), log);

  return {
    name: "cord19-dataset",
    configureServer(server) {
      server.middlewares.use(DATASET_ENDPOINT, handler);
    },
    configurePreviewServer(server) {
      server.middlewares.use(DATASET_ENDPOINT, handler);
    },
  };
};
