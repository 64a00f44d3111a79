import type { MetricsSnapshot } from "../collector/metrics.js";
import type { RandomSource } from "./random.js";

export interface MetricRatios {
  cpu: number;
  memory: number;
  network: number;
}

export function memoryRatio(metrics: Pick<MetricsSnapshot, "usedMemory" | "totalMemory">): number {
  return metrics.totalMemory > 0 ? metrics.usedMemory / metrics.totalMemory : 0;
}

export function metricRatios(metrics: MetricsSnapshot): MetricRatios {
  return {
    cpu: metrics.cpuUsagePercent / 100,
    memory: memoryRatio(metrics),
    network: Math.max(0, Math.log(metrics.networkRx + metrics.networkTx + 1) / 15),
  };
}

export function swirlAt(
  x: number,
  y: number,
  width: number,
  height: number,
  noise: number,
  ratios: MetricRatios
): number {
  return Math.sin((x / width) * ratios.cpu + (y / height) * ratios.memory + noise * ratios.network);
}

/**
 * Draws exactly one value per cell, row-major, left to right. The draw order
 * is what makes a seeded run reproducible, so keep it that way.
 */
export function generateSwirlField(
  rng: RandomSource,
  width: number,
  height: number,
  ratios: MetricRatios
): number[][] {
  const field: number[][] = [];
  for (let y = 0; y < height; y++) {
    const row: number[] = [];
    for (let x = 0; x < width; x++) {
      row.push(swirlAt(x, y, width, height, rng.next(), ratios));
    }
    field.push(row);
  }
  return field;
}
