// Filename: utils/seriesFileStore.ts

import * as fs from "fs/promises";
import { dirname } from "path";
import type { Series } from "../core/PriceSource.js";
import { PersistenceError, type SeriesStore } from "../core/SeriesStore.js";
import { log, TMI, WARN } from "./log.js";
import { parseSeries, serializeSeries } from "./seriesCodec.js";

const LOG_EMOJI = "📄";

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Series persisted as a local JSON file.
 * Writes go to a sibling temp file that is then renamed over the target, so a
 * crash mid-write never leaves a truncated series behind.
 */
export function createFileSeriesStore(filePath: string, timeoutMs: number): SeriesStore {
  return {
    describe: () => filePath,

    async load(): Promise<Series> {
      let text: string;
      try {
        text = await fs.readFile(filePath, { encoding: "utf8", signal: AbortSignal.timeout(timeoutMs) });
      } catch (error) {
        if (isMissingFile(error)) {
          throw new PersistenceError("Series file does not exist", filePath);
        }
        throw error;
      }

      const series = parseSeries(text, filePath);
      log(`${LOG_EMOJI} Loaded ${series.length} points from ${filePath}`, TMI);
      return series;
    },

    async save(series: Series): Promise<void> {
      await fs.mkdir(dirname(filePath), { recursive: true });

      const tempPath = `${filePath}.${process.pid}.tmp`;
      try {
        await fs.writeFile(tempPath, serializeSeries(series), {
          encoding: "utf8",
          signal: AbortSignal.timeout(timeoutMs),
        });
        await fs.rename(tempPath, filePath);
      } catch (error) {
        await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
          log(`${LOG_EMOJI} Could not remove temp file ${tempPath}: ${String(cleanupError)}`, WARN);
        });
        throw error;
      }
      log(`${LOG_EMOJI} Wrote ${series.length} points to ${filePath}`, TMI);
    },
  };
}
