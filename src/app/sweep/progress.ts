export type SweepPhase = "reconcile" | "mutate";

export type ProgressEvent = {
  phase: SweepPhase;
  batchIndex: number;
  batchCount: number;
  processed: number;
  total: number;
  percent: number;
};

export type ProgressListener = (event: ProgressEvent) => void;

export function buildProgressEvent(
  phase: SweepPhase,
  batchIndex: number,
  batchCount: number,
  processed: number,
  total: number,
): ProgressEvent {
  const percent = total === 0 ? 100 : Math.floor((processed * 100) / total);
  return { phase, batchIndex, batchCount, processed, total, percent };
}
