import type { MetricsSnapshot } from "../collector/metrics.js";
import type { CanvasOptions } from "../render/frame.js";
import type { Frame } from "../render/overlay.js";
import type { StyleName } from "../render/styles.js";

// Field names are a published format; keep them as they are.
export interface SerializedDisk {
  name: string;
  total_space: number;
  available_space: number;
}

export interface SerializedMetrics {
  cpu_usage: number;
  load_avg: number;
  total_memory: number;
  used_memory: number;
  disk_usage: SerializedDisk[];
  network_rx: number;
  network_tx: number;
  entropy: number;
}

export interface Snapshot {
  metrics: SerializedMetrics;
  frame: string[];
  width: number;
  height: number;
  style: StyleName;
}

export function serializeMetrics(metrics: MetricsSnapshot): SerializedMetrics {
  return {
    cpu_usage: metrics.cpuUsagePercent,
    load_avg: metrics.loadAverage,
    total_memory: metrics.totalMemory,
    used_memory: metrics.usedMemory,
    disk_usage: metrics.disks.map((disk) => ({
      name: disk.name,
      total_space: disk.totalSpace,
      available_space: disk.availableSpace,
    })),
    network_rx: metrics.networkRx,
    network_tx: metrics.networkTx,
    entropy: metrics.entropy,
  };
}

export function createSnapshot(metrics: MetricsSnapshot, frame: Frame, canvas: CanvasOptions): Snapshot {
  return {
    metrics: serializeMetrics(metrics),
    frame: [...frame],
    width: canvas.width,
    height: canvas.height,
    style: canvas.style,
  };
}

export function toJson(value: Snapshot | SerializedMetrics): string {
  return JSON.stringify(value, null, 2);
}
