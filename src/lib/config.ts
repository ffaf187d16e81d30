// src/lib/config.ts
import path from "node:path";

export type InsightsConfig = {
  /** A trial conversion is kept only when parsed / non-null exceeds this. */
  minSuccessRatio: number;
  /** Text columns with a larger null ratio are never converted. */
  maxMissingRatio: number;
  sampleCap: number;
  sampleSeed: number;
  categoryOptionLimit: number;
  /** Filter sets whose view, sample and summary stay memoized; least recently used go first. */
  viewCacheSize: number;
  datasetDir: string;
  sampleDataset: string;
};

export const DEFAULT_CONFIG: InsightsConfig = {
  minSuccessRatio: 0.9,
  maxMissingRatio: 0.5,
  sampleCap: 5000,
  sampleSeed: 42,
  categoryOptionLimit: 50,
  viewCacheSize: 16,
  datasetDir: path.join(process.cwd(), "public", "sample-data"),
  sampleDataset: "sample_data.csv",
};

function num(raw: string | undefined, fallback: number, valid: (n: number) => boolean) {
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number(raw);
  return Number.isFinite(n) && valid(n) ? n : fallback;
}

const ratio = (n: number) => n >= 0 && n <= 1;
const positiveInt = (n: number) => Number.isInteger(n) && n > 0;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): InsightsConfig {
  return {
    minSuccessRatio: num(env.INSIGHTS_MIN_SUCCESS_RATIO, DEFAULT_CONFIG.minSuccessRatio, ratio),
    maxMissingRatio: num(env.INSIGHTS_MAX_MISSING_RATIO, DEFAULT_CONFIG.maxMissingRatio, ratio),
    sampleCap: num(env.INSIGHTS_SAMPLE_CAP, DEFAULT_CONFIG.sampleCap, positiveInt),
    sampleSeed: num(env.INSIGHTS_SAMPLE_SEED, DEFAULT_CONFIG.sampleSeed, Number.isInteger),
    categoryOptionLimit: num(env.INSIGHTS_CATEGORY_OPTION_LIMIT, DEFAULT_CONFIG.categoryOptionLimit, positiveInt),
    viewCacheSize: num(env.INSIGHTS_VIEW_CACHE_SIZE, DEFAULT_CONFIG.viewCacheSize, positiveInt),
    datasetDir: env.INSIGHTS_DATASET_DIR || DEFAULT_CONFIG.datasetDir,
    sampleDataset: env.INSIGHTS_SAMPLE_DATASET || DEFAULT_CONFIG.sampleDataset,
  };
}
