import { describe, it, expect, vi } from "vitest";
import { Writable } from "stream";
import { runLive, runMetrics, runSnapshot, type AppIo } from "../src/app.js";
import type { Config } from "../src/config/loader.js";
import { ansi } from "../src/display/terminal.js";
import { renderFrame } from "../src/render/frame.js";
import { SeededRandom } from "../src/render/random.js";
import { makeMetrics } from "./helpers.js";

const config: Config = {
  canvas: { width: 48, height: 6, style: "waves", seed: 7 },
  loop: { interval: 0 },
};

function testIo() {
  const chunks: string[] = [];
  const printed: string[] = [];
  const io: AppIo = {
    output: new Writable({
      write(chunk: Buffer, _encoding, callback) {
        chunks.push(chunk.toString());
        callback();
      },
    }),
    print: (text) => printed.push(text),
  };
  return { io, chunks, printed };
}

const source = { collectMetrics: vi.fn(async () => makeMetrics({ entropy: 1234 })) };

describe("runSnapshot", () => {
  it("should print one snapshot rendered from the configured seed", async () => {
    const { io, chunks, printed } = testIo();

    await runSnapshot(config, source, io);

    expect(chunks).toEqual([]);
    expect(printed).toHaveLength(1);
    const snapshot = JSON.parse(printed[0]);
    expect(snapshot.width).toBe(48);
    expect(snapshot.height).toBe(6);
    expect(snapshot.style).toBe("waves");
    expect(snapshot.metrics.entropy).toBe(1234);
    expect(snapshot.frame).toEqual(renderFrame(makeMetrics({ entropy: 1234 }), new SeededRandom(7), config.canvas));
  });
});

describe("runMetrics", () => {
  it("should print the serialized metrics", async () => {
    const { io, printed } = testIo();

    await runMetrics(source, io);

    expect(JSON.parse(printed[0]).used_memory).toBe(6000000000);
  });
});

describe("runLive", () => {
  it("should print one snapshot without touching the terminal in once mode", async () => {
    const { io, chunks, printed } = testIo();
    const input = { isTTY: true, setRawMode: vi.fn(), on: vi.fn(), off: vi.fn(), resume: vi.fn(), pause: vi.fn() };

    await runLive(config, source, { ...io, input }, {
      once: true,
      signal: new AbortController().signal,
      onInterrupt: () => {},
    });

    expect(chunks).toEqual([]);
    expect(input.setRawMode).not.toHaveBeenCalled();
    expect(printed).toHaveLength(1);
    expect(JSON.parse(printed[0]).frame).toEqual(
      renderFrame(makeMetrics({ entropy: 1234 }), new SeededRandom(7), config.canvas)
    );
  });

  it("should draw on the live screen and restore it when stopped", async () => {
    const { io, chunks, printed } = testIo();
    const controller = new AbortController();

    const run = runLive(config, source, io, { once: false, signal: controller.signal, onInterrupt: () => {} });
    await vi.waitFor(() => {
      expect(chunks).toContain(ansi.clear);
    });
    controller.abort();
    await run;

    expect(chunks[0]).toBe(ansi.enterAlternateScreen + ansi.hideCursor);
    expect(chunks[chunks.length - 1]).toBe(ansi.reset + ansi.showCursor + ansi.leaveAlternateScreen);
    expect(printed).toEqual([]);
  });

  it("should print nothing when stopped without once", async () => {
    const { io, printed } = testIo();
    const controller = new AbortController();
    controller.abort();

    await runLive(config, source, io, { once: false, signal: controller.signal, onInterrupt: () => {} });

    expect(printed).toEqual([]);
  });
});
