import type { MetricRatios } from "./noise.js";

export function intensityOf(swirl: number, ratios: Pick<MetricRatios, "cpu" | "memory">): number {
  const value = ((swirl + 1) / 2) * ratios.memory + ratios.cpu;
  return value - Math.floor(value);
}

export function glyphIndex(intensity: number, rampLength: number): number {
  if (rampLength <= 1 || !Number.isFinite(intensity)) {
    return 0;
  }
  const clamped = Math.min(Math.max(intensity, 0), 1);
  const index = Math.round(clamped * (rampLength - 1));
  return Math.min(Math.max(index, 0), rampLength - 1);
}

export function glyphFor(ramp: string, intensity: number): string {
  return ramp.charAt(glyphIndex(intensity, ramp.length));
}
