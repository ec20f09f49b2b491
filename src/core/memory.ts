/**
 * Advisory memory-pressure relief between batches. Runs a collection only when the process
 * was started with --expose-gc; otherwise it is a no-op that reports false.
 */
export function tryCollectGarbage(): boolean {
  const gc: unknown = Reflect.get(globalThis, "gc");
  if (typeof gc !== "function") {
    return false;
  }
  gc();
  return true;
}

export function heapUsedMb(): number {
  return Math.round(process.memoryUsage().heapUsed / (1024 * 1024));
}
