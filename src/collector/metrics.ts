export interface DiskEntry {
  name: string;
  totalSpace: number;
  availableSpace: number;
}

export interface MetricsSnapshot {
  timestamp: number;
  cpuUsagePercent: number;
  loadAverage: number;
  usedMemory: number;
  totalMemory: number;
  networkRx: number;
  networkTx: number;
  disks: DiskEntry[];
  entropy: number;
}

export type RawMetrics = Omit<MetricsSnapshot, "entropy">;
