import { setTimeout as sleep } from "timers/promises";
import type { MetricsSnapshot } from "../collector/metrics.js";
import { renderFrame, type CanvasOptions } from "../render/frame.js";
import type { Frame } from "../render/overlay.js";
import { SeededRandom, type RandomSource } from "../render/random.js";
import { STYLES, type PaletteColor } from "../render/styles.js";

export interface MetricsSource {
  collectMetrics(): Promise<MetricsSnapshot>;
}

export interface FrameSink {
  draw(frame: Frame, palette: readonly PaletteColor[]): Promise<void>;
}

export interface RenderLoopOptions {
  canvas: CanvasOptions;
  interval: number;
  once?: boolean;
  signal?: AbortSignal;
}

export interface RenderedFrame {
  metrics: MetricsSnapshot;
  frame: Frame;
}

/** Explicit seed wins; otherwise the first sample's entropy seeds the run. */
export async function createGenerator(seed: number | undefined, source: MetricsSource): Promise<SeededRandom> {
  if (seed !== undefined) {
    return new SeededRandom(seed);
  }
  const metrics = await source.collectMetrics();
  return new SeededRandom(metrics.entropy);
}

export class RenderLoop {
  constructor(
    private readonly source: MetricsSource,
    private readonly sink: FrameSink,
    private readonly rng: RandomSource,
    private readonly options: RenderLoopOptions
  ) {}

  /** Renders until aborted (or once); resolves with the last frame drawn. */
  async run(): Promise<RenderedFrame | null> {
    const { canvas, interval, once, signal } = this.options;
    const palette = STYLES[canvas.style].palette;
    let last: RenderedFrame | null = null;

    while (!signal?.aborted) {
      const metrics = await this.source.collectMetrics();
      const frame = renderFrame(metrics, this.rng, canvas);
      await this.sink.draw(frame, palette);

      last = { metrics, frame };

      if (once || signal?.aborted) {
        break;
      }

      try {
        await sleep(interval, undefined, { signal });
      } catch (error) {
        if (signal?.aborted) {
          break;
        }
        throw error;
      }
    }

    return last;
  }
}
