import type { Writable } from "stream";
import type { Config } from "./config/loader.js";
import { TerminalDisplay, withTerminal, type TerminalInput } from "./display/terminal.js";
import { RenderLoop, createGenerator, type MetricsSource } from "./loop/runner.js";
import { renderFrame } from "./render/frame.js";
import { createSnapshot, serializeMetrics, toJson } from "./snapshot/serializer.js";

export interface AppIo {
  output: Writable;
  input?: TerminalInput;
  print: (text: string) => void;
}

export interface LiveOptions {
  /** Render a single frame and print it as a snapshot instead of opening the live screen. */
  once: boolean;
  signal: AbortSignal;
  onInterrupt: () => void;
}

export async function runSnapshot(config: Config, source: MetricsSource, io: AppIo): Promise<void> {
  const rng = await createGenerator(config.canvas.seed, source);
  const metrics = await source.collectMetrics();
  const frame = renderFrame(metrics, rng, config.canvas);
  io.print(toJson(createSnapshot(metrics, frame, config.canvas)));
}

export async function runMetrics(source: MetricsSource, io: AppIo): Promise<void> {
  io.print(toJson(serializeMetrics(await source.collectMetrics())));
}

export async function runLive(
  config: Config,
  source: MetricsSource,
  io: AppIo,
  options: LiveOptions
): Promise<void> {
  // Once mode never touches the terminal: one frame goes straight to the snapshot.
  if (options.once) {
    await runSnapshot(config, source, io);
    return;
  }

  const rng = await createGenerator(config.canvas.seed, source);
  const display = new TerminalDisplay({
    output: io.output,
    input: io.input,
    onInterrupt: options.onInterrupt,
  });
  const loop = new RenderLoop(source, display, rng, {
    canvas: config.canvas,
    interval: config.loop.interval,
    signal: options.signal,
  });

  await withTerminal(display, () => loop.run());
}
