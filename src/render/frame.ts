import type { MetricsSnapshot } from "../collector/metrics.js";
import { glyphFor, intensityOf } from "./glyphs.js";
import { generateSwirlField, metricRatios } from "./noise.js";
import { applyOverlays, type Frame } from "./overlay.js";
import type { RandomSource } from "./random.js";
import { STYLES, type StyleName } from "./styles.js";

export interface CanvasOptions {
  width: number;
  height: number;
  style: StyleName;
}

export function renderFrame(metrics: MetricsSnapshot, rng: RandomSource, canvas: CanvasOptions): Frame {
  const ratios = metricRatios(metrics);
  const { ramp } = STYLES[canvas.style];

  const rows = generateSwirlField(rng, canvas.width, canvas.height, ratios).map((cells) =>
    cells.map((swirl) => glyphFor(ramp, intensityOf(swirl, ratios))).join("")
  );

  return applyOverlays(rows, metrics, canvas.style, canvas.width);
}
