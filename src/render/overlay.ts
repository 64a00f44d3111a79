import type { MetricsSnapshot } from "../collector/metrics.js";
import { memoryRatio } from "./noise.js";
import type { StyleName } from "./styles.js";

export type Frame = string[];

function fixed(value: number, width: number): string {
  return value.toFixed(1).padStart(width);
}

export function formatStatusLine(metrics: MetricsSnapshot): string {
  const memoryPercent = memoryRatio(metrics) * 100;
  const networkKb = (metrics.networkRx + metrics.networkTx) / 1024;
  return `CPU ${fixed(metrics.cpuUsagePercent, 5)}% | MEM ${fixed(memoryPercent, 5)}% | NET ${fixed(networkKb, 7)}k/s`;
}

export function signatureLine(style: StyleName, entropy: number): string {
  return `Style: ${style} | Frames seeded by entropy ${entropy}`;
}

/** Left-biased start column, or null when the text is wider than the row. */
export function centerOffset(textLength: number, width: number): number | null {
  if (textLength > width) {
    return null;
  }
  return Math.floor((width - textLength) / 2);
}

export function writeCentered(row: string, text: string): string {
  const offset = centerOffset(text.length, row.length);
  if (offset === null) {
    return row;
  }
  return row.slice(0, offset) + text + row.slice(offset + text.length);
}

export function fitToWidth(text: string, width: number): string {
  return text.length >= width ? text.slice(0, width) : text.padEnd(width);
}

export function shouldSign(entropy: number): boolean {
  return entropy % 7 === 0;
}

/**
 * Writes the status line into the middle row, then the signature over row 0
 * when the entropy calls for it. On a one-row frame the signature wins.
 */
export function applyOverlays(
  frame: readonly string[],
  metrics: MetricsSnapshot,
  style: StyleName,
  width: number
): Frame {
  const result = [...frame];
  if (result.length === 0) {
    return result;
  }

  const statusRow = Math.floor(result.length / 2);
  result[statusRow] = writeCentered(result[statusRow], formatStatusLine(metrics));

  if (shouldSign(metrics.entropy)) {
    result[0] = fitToWidth(signatureLine(style, metrics.entropy), width);
  }

  return result;
}
