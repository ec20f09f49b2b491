import { adviseConfiguration, type ConfigurationAdvice } from "../core/advisor.js";

import type { ConsoleLike } from "./console-reporter.js";

export type AdviseCommandOptions = {
  total: number;
  memoryMb?: number;
  bandwidthMbps?: number;
  json?: boolean;
};

export function adviseCommand(
  opts: AdviseCommandOptions,
  out: ConsoleLike = console,
): ConfigurationAdvice {
  const advice = adviseConfiguration({
    totalSubjects: opts.total,
    memoryMb: opts.memoryMb,
    bandwidthMbps: opts.bandwidthMbps,
  });

  if (opts.json) {
    out.log(JSON.stringify(advice, null, 2));
    return advice;
  }

  out.log(`Advice for ${opts.total} subjects:`);
  out.log(`  batch size:         ${advice.batchSize}`);
  out.log(`  concurrency limit:  ${advice.concurrencyLimit}`);
  out.log(`  cleanup interval:   ${advice.cleanupInterval}`);
  out.log(`  throttle delay:     ${advice.throttleDelayMs}ms`);
  out.log(`  window:             ${advice.recommendedWindow}`);
  for (const warning of advice.warnings) {
    out.warn(`Warning: ${warning}`);
  }

  return advice;
}
