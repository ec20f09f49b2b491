/**
 * Configuration advisor.
 * Purpose: derive batch size, concurrency and pacing from environment scale and resource hints.
 * Assumptions: pure and deterministic; hints are advisory and may be omitted.
 * Usage: const advice = adviseConfiguration({ totalSubjects: 42000, memoryMb: 1024 });
 */

// =============================================================================
// TYPES
// =============================================================================

export type AdvisorInput = {
  totalSubjects: number;
  memoryMb?: number;
  bandwidthMbps?: number;
};

export type RecommendedWindow = "any" | "business-hours-ok" | "off-peak";

export type ConfigurationAdvice = {
  batchSize: number;
  concurrencyLimit: number;
  cleanupInterval: number;
  throttleDelayMs: number;
  recommendedWindow: RecommendedWindow;
  warnings: string[];
};

export type ScaleTier = {
  /** Exclusive upper bound on subject count; `null` marks the open-ended last tier. */
  below: number | null;
  batchSize: number;
  concurrencyLimit: number;
  cleanupInterval: number;
  recommendedWindow: RecommendedWindow;
  warning?: string;
};

// =============================================================================
// CONSTANTS
// =============================================================================

export const DEFAULT_MEMORY_MB = 4096;
export const DEFAULT_BANDWIDTH_MBPS = 100;

export const LOW_MEMORY_MB = 2048;
export const HIGH_MEMORY_MB = 8192;
export const LOW_BANDWIDTH_MBPS = 50;

export const MIN_BATCH_SIZE = 50;
export const MAX_BATCH_SIZE = 2000;
export const MIN_CONCURRENCY = 2;
export const MAX_CONCURRENCY = 25;
export const LOW_BANDWIDTH_THROTTLE_MS = 500;

export const LARGE_ENVIRONMENT_WARNING = "large environment — prefer off-peak window";

export const SCALE_LADDER: readonly ScaleTier[] = [
  {
    below: 1_000,
    batchSize: 100,
    concurrencyLimit: 5,
    cleanupInterval: 10,
    recommendedWindow: "any",
  },
  {
    below: 10_000,
    batchSize: 250,
    concurrencyLimit: 8,
    cleanupInterval: 10,
    recommendedWindow: "business-hours-ok",
  },
  {
    below: 50_000,
    batchSize: 500,
    concurrencyLimit: 10,
    cleanupInterval: 10,
    recommendedWindow: "business-hours-ok",
  },
  {
    below: 100_000,
    batchSize: 750,
    concurrencyLimit: 15,
    cleanupInterval: 10,
    recommendedWindow: "business-hours-ok",
  },
  {
    below: null,
    batchSize: 1000,
    concurrencyLimit: 20,
    cleanupInterval: 5,
    recommendedWindow: "off-peak",
    warning: LARGE_ENVIRONMENT_WARNING,
  },
];

// =============================================================================
// PUBLIC API
// =============================================================================

export function resolveScaleTier(
  totalSubjects: number,
  ladder: readonly ScaleTier[] = SCALE_LADDER,
): ScaleTier {
  const tier = ladder.find((entry) => entry.below === null || totalSubjects < entry.below);
  if (!tier) {
    throw new Error(`scale ladder has no tier for ${totalSubjects} subjects`);
  }
  return tier;
}

export function adviseConfiguration(input: AdvisorInput): ConfigurationAdvice {
  const tier = resolveScaleTier(input.totalSubjects);
  const base: ConfigurationAdvice = {
    batchSize: tier.batchSize,
    concurrencyLimit: tier.concurrencyLimit,
    cleanupInterval: tier.cleanupInterval,
    throttleDelayMs: 0,
    recommendedWindow: tier.recommendedWindow,
    warnings: tier.warning ? [tier.warning] : [],
  };

  const withMemory = applyMemoryModifier(base, input.memoryMb ?? DEFAULT_MEMORY_MB);
  return applyBandwidthModifier(withMemory, input.bandwidthMbps ?? DEFAULT_BANDWIDTH_MBPS);
}

export function applyMemoryModifier(
  advice: ConfigurationAdvice,
  memoryMb: number,
): ConfigurationAdvice {
  if (memoryMb < LOW_MEMORY_MB) {
    return {
      ...advice,
      batchSize: Math.max(MIN_BATCH_SIZE, Math.floor(advice.batchSize * 0.5)),
      concurrencyLimit: Math.max(MIN_CONCURRENCY, Math.floor(advice.concurrencyLimit * 0.5)),
      warnings: [
        ...advice.warnings,
        `low memory (${memoryMb}MB): batch size and concurrency halved`,
      ],
    };
  }

  if (memoryMb > HIGH_MEMORY_MB) {
    return {
      ...advice,
      batchSize: Math.min(MAX_BATCH_SIZE, Math.floor(advice.batchSize * 1.5)),
      concurrencyLimit: Math.min(MAX_CONCURRENCY, Math.floor(advice.concurrencyLimit * 1.5)),
    };
  }

  return advice;
}

export function applyBandwidthModifier(
  advice: ConfigurationAdvice,
  bandwidthMbps: number,
): ConfigurationAdvice {
  if (bandwidthMbps >= LOW_BANDWIDTH_MBPS) {
    return advice;
  }

  return {
    ...advice,
    throttleDelayMs: LOW_BANDWIDTH_THROTTLE_MS,
    concurrencyLimit: Math.max(MIN_CONCURRENCY, Math.floor(advice.concurrencyLimit * 0.7)),
    warnings: [
      ...advice.warnings,
      `low bandwidth (${bandwidthMbps}Mbps): throttling mutations by ${LOW_BANDWIDTH_THROTTLE_MS}ms`,
    ],
  };
}
