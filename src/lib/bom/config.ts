export interface BomExtractorConfig {
  tableBaseScore: number;
  annotationDiscount: number;
  listingDiscount: number;
  geometryMaxBaseScore: number;
  unparsableQuantityPenalty: number;
  minTableScore: number;
  minClusterSize: number;
  clusterSizeSaturation: number;
  minShapeSize: number;
  spatialMergeMargin: number;
  maxCalloutWords: number;
  minListingLines: number;
  listingMarginTolerance: number;
  strongLexicalCue: number;
  learningRate: number;
  snapshotInterval: number;
  pageTimeoutMs: number;
  learningPath: string;
}

export const DEFAULT_CONFIG: BomExtractorConfig = {
  tableBaseScore: 0.9,
  annotationDiscount: 0.2,
  listingDiscount: 0.15,
  geometryMaxBaseScore: 0.5,
  unparsableQuantityPenalty: 0.7,
  minTableScore: 0.5,
  minClusterSize: 2,
  clusterSizeSaturation: 10,
  minShapeSize: 3,
  spatialMergeMargin: 10,
  maxCalloutWords: 10,
  minListingLines: 3,
  listingMarginTolerance: 6,
  strongLexicalCue: 0.8,
  learningRate: 0.05,
  snapshotInterval: 25,
  pageTimeoutMs: 15_000,
  learningPath: '.bom-learning',
};

type Env = Record<string, string | undefined>;

function numberFromEnv(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    console.warn(`[config] Ignoring ${key}=${raw}: expected a non-negative number`);
    return fallback;
  }
  return value;
}

/**
 * Defaults overlaid with `BOM_EXTRACTOR_*` environment variables, then with
 * explicit overrides.
 */
export function loadConfig(
  overrides: Partial<BomExtractorConfig> = {},
  env: Env = process.env
): BomExtractorConfig {
  const fromEnv: BomExtractorConfig = {
    ...DEFAULT_CONFIG,
    learningPath: env.BOM_EXTRACTOR_LEARNING_PATH || DEFAULT_CONFIG.learningPath,
    learningRate: numberFromEnv(env, 'BOM_EXTRACTOR_LEARNING_RATE', DEFAULT_CONFIG.learningRate),
    pageTimeoutMs: numberFromEnv(env, 'BOM_EXTRACTOR_PAGE_TIMEOUT_MS', DEFAULT_CONFIG.pageTimeoutMs),
    minClusterSize: numberFromEnv(env, 'BOM_EXTRACTOR_MIN_CLUSTER_SIZE', DEFAULT_CONFIG.minClusterSize),
    minTableScore: numberFromEnv(env, 'BOM_EXTRACTOR_MIN_TABLE_SCORE', DEFAULT_CONFIG.minTableScore),
  };

  const config = { ...fromEnv, ...overrides };
  if (config.learningRate >= 1) {
    throw new Error(`learningRate must be below 1, got ${config.learningRate}`);
  }
  return config;
}
