// Filename: config/loadRunConfig.ts

import dotenv from "dotenv";
import { dirname, join, resolve } from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import { ALL_SOURCE_NAMES, type SourceName } from "../constants/SourceNames.js";
import { sourceConfig } from "./configSources.js";
import { log, maskSecret, LOG, TMI } from "../utils/log.js";

const LOG_EMOJI = "⚙️";

// This file is in config/, so the project root is one level up
const projectRoot = join(dirname(fileURLToPath(import.meta.url)), "..");

export const DEFAULT_OUTPUT_PATH = join("data", "price_data.json");

/**
 * Fatal configuration problem, raised before any network or storage I/O.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export const STORAGE_KINDS = ["file", "blob"] as const;
export type StorageKind = (typeof STORAGE_KINDS)[number];

/** Everything one run needs, resolved from the environment. */
export interface RunConfig {
  source: SourceName;
  asset: string;
  vsCurrency: string;
  /** Undefined only for sources that accept unauthenticated requests. */
  credential?: string;
  storage: StorageKind;
  /** Absolute path of the series file (file storage). */
  outputPath: string;
  /** Pathname prefix of the series blobs (blob storage). */
  blobKey: string;
  requestTimeoutMs: number;
  ratePauseMs: number;
  /** History depth requested when no series exists and the source cannot page backward. */
  fullHistoryDays: number;
  maxBackfillPages: number;
}

const envSchema = z.object({
  PRICE_SOURCE: z.enum(ALL_SOURCE_NAMES).default("coingecko"),
  PRICE_ASSET: z.string().optional(),
  VS_CURRENCY: z.string().default("usd"),
  PRICE_STORAGE: z.enum(STORAGE_KINDS).default("file"),
  PRICE_OUTPUT_PATH: z.string().default(DEFAULT_OUTPUT_PATH),
  PRICE_BLOB_KEY: z.string().optional(),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  RATE_LIMIT_PAUSE_MS: z.coerce.number().int().nonnegative().optional(),
  FULL_HISTORY_DAYS: z.coerce.number().int().positive().default(365),
  MAX_BACKFILL_PAGES: z.coerce.number().int().positive().default(500),
});

/**
 * Loads `.env.local` from the project root into process.env.
 * Skipped in Vercel production, where variables come from the deployment.
 */
export function loadEnvFile(): void {
  if (process.env.VERCEL_ENV === "production") {
    return;
  }
  const envPath = join(projectRoot, ".env.local");
  const result = dotenv.config({ path: envPath });
  if (result.error) {
    log(`${LOG_EMOJI} No .env.local loaded (${result.error.message}); using process environment`, TMI);
  }
}

/**
 * Resolves and validates the run configuration.
 * @throws ConfigError on an invalid value or a missing required credential
 */
export function loadRunConfig(env: NodeJS.ProcessEnv = process.env): RunConfig {
  // Treat empty assignments (`FOO=`) as unset
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      present[key] = value.trim();
    }
  }

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const values = parsed.data;
  const source = values.PRICE_SOURCE;
  const settings = sourceConfig[source];
  const credential = present[settings.credentialEnvVar];

  if (!credential && settings.credentialRequired) {
    throw new ConfigError(
      `${settings.credentialEnvVar} is not set. Add it to .env.local or the environment before running the '${source}' source.`
    );
  }

  if (values.PRICE_STORAGE === "blob" && !present.BLOB_READ_WRITE_TOKEN) {
    throw new ConfigError("BLOB_READ_WRITE_TOKEN is not set. It is required when PRICE_STORAGE=blob.");
  }

  if (credential) {
    log(`${LOG_EMOJI} Loaded ${settings.credentialEnvVar} ('${maskSecret(credential)}')`, LOG);
  } else {
    log(`${LOG_EMOJI} No ${settings.credentialEnvVar} set; sending unauthenticated requests`, LOG);
  }

  const asset = values.PRICE_ASSET ?? settings.defaultAsset;

  return {
    source,
    asset,
    vsCurrency: values.VS_CURRENCY.toLowerCase(),
    credential,
    storage: values.PRICE_STORAGE,
    outputPath: resolve(process.cwd(), values.PRICE_OUTPUT_PATH),
    blobKey: values.PRICE_BLOB_KEY ?? `price-history/${source}-${asset.toLowerCase()}`,
    requestTimeoutMs: values.REQUEST_TIMEOUT_MS,
    ratePauseMs: values.RATE_LIMIT_PAUSE_MS ?? settings.defaultPauseMs,
    fullHistoryDays: values.FULL_HISTORY_DAYS,
    maxBackfillPages: values.MAX_BACKFILL_PAGES,
  };
}
