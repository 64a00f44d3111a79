import si from "systeminformation";
import { deriveEntropy } from "../render/entropy.js";
import type { MetricsSnapshot, RawMetrics } from "./metrics.js";

export class MetricsCollector {
  private previousNetwork: {
    rx: number;
    tx: number;
  } | null = null;

  async collectMetrics(): Promise<MetricsSnapshot> {
    const [cpu, mem, disks, networkStats] = await Promise.all([
      si.currentLoad(),
      si.mem(),
      si.fsSize(),
      si.networkStats("*"),
    ]);

    const totalRxBytes = networkStats.reduce((sum, iface) => sum + iface.rx_bytes, 0);
    const totalTxBytes = networkStats.reduce((sum, iface) => sum + iface.tx_bytes, 0);

    // Bytes moved since the previous sample; counters can reset when an interface goes away
    let networkRx = 0;
    let networkTx = 0;
    if (this.previousNetwork) {
      networkRx = Math.max(0, totalRxBytes - this.previousNetwork.rx);
      networkTx = Math.max(0, totalTxBytes - this.previousNetwork.tx);
    }

    this.previousNetwork = {
      rx: totalRxBytes,
      tx: totalTxBytes,
    };

    const raw: RawMetrics = {
      timestamp: Date.now(),
      cpuUsagePercent: Math.min(100, Math.max(0, cpu.currentLoad || 0)),
      loadAverage: cpu.avgLoad || 0,
      totalMemory: mem.total,
      usedMemory: mem.active || mem.used,
      networkRx,
      networkTx,
      disks: disks.map((d) => ({
        name: d.fs,
        totalSpace: d.size,
        availableSpace: d.available,
      })),
    };

    return { ...raw, entropy: deriveEntropy(raw) };
  }
}
