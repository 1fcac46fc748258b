// Filename: core/SeriesStores.ts

import type { RunConfig } from "../config/loadRunConfig.js";
import { createBlobSeriesStore } from "../utils/seriesBlobStore.js";
import { createFileSeriesStore } from "../utils/seriesFileStore.js";
import type { SeriesStore } from "./SeriesStore.js";

/**
 * Builds the SeriesStore selected by the run configuration.
 */
export function createSeriesStore(config: RunConfig): SeriesStore {
  switch (config.storage) {
    case "file":
      return createFileSeriesStore(config.outputPath, config.requestTimeoutMs);
    case "blob":
      return createBlobSeriesStore(config.blobKey, config.requestTimeoutMs);
  }
}
