import type { MetricsSnapshot } from "../src/collector/metrics.js";

export function makeMetrics(overrides: Partial<MetricsSnapshot> = {}): MetricsSnapshot {
  return {
    timestamp: 1700000000000,
    cpuUsagePercent: 42.5,
    loadAverage: 1.25,
    usedMemory: 6000000000,
    totalMemory: 16000000000,
    networkRx: 150000,
    networkTx: 50000,
    disks: [{ name: "/dev/sda1", totalSpace: 500000000000, availableSpace: 200000000000 }],
    entropy: 1234,
    ...overrides,
  };
}

/** Replays a fixed list of draws, cycling when exhausted. */
export function sequenceSource(values: number[]): { next(): number; draws: number } {
  let index = 0;
  return {
    draws: 0,
    next() {
      this.draws++;
      const value = values[index % values.length];
      index++;
      return value;
    },
  };
}
