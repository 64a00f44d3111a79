import type { RawMetrics } from "../collector/metrics.js";

/**
 * Folds a sample into one unsigned integer. Used to seed the generator when no
 * seed is given, and as the per-frame trigger for the signature line.
 * The sum is exact up to 2^53, roughly 9 PB of total disk capacity.
 */
export function deriveEntropy(metrics: RawMetrics): number {
  const diskTotal = metrics.disks.reduce((sum, disk) => sum + disk.totalSpace, 0);
  return (
    Math.round(metrics.cpuUsagePercent * 100) +
    metrics.usedMemory +
    metrics.networkRx +
    metrics.networkTx +
    diskTotal
  );
}
