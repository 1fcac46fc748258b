// Filename: utils/seriesBlobStore.ts

import { del, list, put } from "@vercel/blob";
import type { Series } from "../core/PriceSource.js";
import { PersistenceError, type SeriesStore } from "../core/SeriesStore.js";
import { fetchText } from "./httpClient.js";
import { log, TMI, WARN } from "./log.js";
import { parseSeries, serializeSeries } from "./seriesCodec.js";
import { withTimeout } from "./timeout.js";

// Blob Utility specific emoji
const LOG_EMOJI = "☁️";

/**
 * Local view of a Vercel Blob list entry, containing only the properties this
 * store needs.
 */
interface VercelBlobMetadata {
  pathname: string;
  uploadedAt: Date;
  url: string;
}

// --- Private Utilities ---

const SERIES_BLOB_SUFFIX = /^\d+\.json$/;

/**
 * Lists every `<key>_<epochMs>.json` blob of one series, newest first.
 * Blobs of other series whose key starts with this one are skipped.
 */
async function listSeriesBlobs(key: string, timeoutMs: number): Promise<VercelBlobMetadata[]> {
  const prefix = `${key}_`;
  const found: VercelBlobMetadata[] = [];
  let cursor: string | undefined;

  do {
    const page = await withTimeout(list({ prefix, limit: 100, cursor }), timeoutMs, "Vercel Blob list");
    for (const blob of page.blobs) {
      if (!SERIES_BLOB_SUFFIX.test(blob.pathname.slice(prefix.length))) {
        continue;
      }
      found.push({ pathname: blob.pathname, uploadedAt: new Date(blob.uploadedAt), url: blob.url });
    }
    cursor = page.hasMore ? page.cursor : undefined;
  } while (cursor);

  found.sort((a, b) => b.uploadedAt.getTime() - a.uploadedAt.getTime());
  return found;
}

// --- Public Access Methods ---

/**
 * Series persisted in Vercel Blob storage. Every save uploads a new
 * `<key>_<epochMs>.json` blob; loads read the most recently uploaded one.
 * Older blobs are removed once a newer one has been written.
 */
export function createBlobSeriesStore(key: string, timeoutMs: number): SeriesStore {
  return {
    describe: () => `blob:${key}`,

    async load(): Promise<Series> {
      const blobs = await listSeriesBlobs(key, timeoutMs);
      const latest = blobs[0];
      if (!latest) {
        throw new PersistenceError("No series blob found", `blob:${key}`);
      }

      log(`${LOG_EMOJI} Blob List: Found ${blobs.length} blobs. Latest is ${latest.pathname}`, TMI);
      const text = await fetchText(latest.url, { context: "Vercel Blob Fetch", timeoutMs });
      return parseSeries(text, latest.pathname);
    },

    async save(series: Series): Promise<void> {
      const previous = await listSeriesBlobs(key, timeoutMs);
      const pathname = `${key}_${Date.now()}.json`;

      await withTimeout(
        put(pathname, serializeSeries(series), {
          access: "public",
          contentType: "application/json",
          addRandomSuffix: false,
        }),
        timeoutMs,
        "Vercel Blob put"
      );
      log(`${LOG_EMOJI} Blob Put: Stored as ${pathname}`, TMI);

      if (previous.length > 0) {
        try {
          await withTimeout(del(previous.map((blob) => blob.url)), timeoutMs, "Vercel Blob delete");
          log(`${LOG_EMOJI} Blob Delete: Removed ${previous.length} superseded blob(s)`, TMI);
        } catch (error) {
          // The new blob is already the latest, so stale ones only cost storage
          log(`${LOG_EMOJI} Blob Delete: ❌ Failed to remove superseded blobs. Error: ${error}`, WARN);
        }
      }
    },
  };
}
