import { describe, it, expect } from "vitest";
import {
  applyOverlays,
  centerOffset,
  fitToWidth,
  formatStatusLine,
  signatureLine,
  writeCentered,
} from "../../src/render/overlay.js";
import { makeMetrics } from "../helpers.js";

const STATUS = "CPU  50.0% | MEM  25.0% | NET     2.0k/s";

function statusMetrics(entropy: number) {
  return makeMetrics({
    cpuUsagePercent: 50,
    usedMemory: 1,
    totalMemory: 4,
    networkRx: 1024,
    networkTx: 1024,
    entropy,
  });
}

describe("formatStatusLine", () => {
  it("should format metrics with fixed widths and one decimal", () => {
    expect(formatStatusLine(statusMetrics(1))).toBe(STATUS);
  });

  it("should report zero memory when total memory is zero", () => {
    const line = formatStatusLine(makeMetrics({ cpuUsagePercent: 0, usedMemory: 10, totalMemory: 0, networkRx: 0, networkTx: 0 }));
    expect(line).toBe("CPU   0.0% | MEM   0.0% | NET     0.0k/s");
  });
});

describe("centering", () => {
  it("should center text inside the row", () => {
    expect(centerOffset(10, 20)).toBe(5);
    expect(writeCentered("-".repeat(20), "ABCDEFGHIJ")).toBe("-----ABCDEFGHIJ-----");
  });

  it("should bias odd remainders to the left", () => {
    expect(centerOffset(3, 10)).toBe(3);
    expect(writeCentered("..........", "abc")).toBe("...abc....");
  });

  it("should write text that exactly fills the row", () => {
    expect(writeCentered("....", "abcd")).toBe("abcd");
  });

  it("should skip text wider than the row", () => {
    const row = "-".repeat(20);
    expect(centerOffset(21, 20)).toBeNull();
    expect(writeCentered(row, "x".repeat(21))).toBe(row);
  });
});

describe("fitToWidth", () => {
  it("should pad short text and cut long text", () => {
    expect(fitToWidth("abc", 5)).toBe("abc  ");
    expect(fitToWidth("abcdef", 4)).toBe("abcd");
  });
});

describe("applyOverlays", () => {
  const base = Array.from({ length: 5 }, () => ".".repeat(60));

  it("should write the status line into the middle row", () => {
    const frame = applyOverlays(base, statusMetrics(15), "plasma", 60);

    expect(frame[2]).toBe(".".repeat(10) + STATUS + ".".repeat(10));
    expect(frame[0]).toBe(".".repeat(60));
    expect(frame[4]).toBe(".".repeat(60));
  });

  it("should replace row 0 with the signature when entropy is a multiple of 7", () => {
    const frame = applyOverlays(base, statusMetrics(14), "plasma", 60);

    expect(frame[0]).toBe(signatureLine("plasma", 14).padEnd(60));
    expect(frame[0].startsWith("Style: plasma | Frames seeded by entropy 14")).toBe(true);
    expect(frame[1]).toBe(".".repeat(60));
  });

  it("should cut the signature to narrow rows", () => {
    const narrow = Array.from({ length: 3 }, () => ".".repeat(20));
    const frame = applyOverlays(narrow, statusMetrics(14), "plasma", 20);

    expect(frame[0]).toBe("Style: plasma | Fram");
  });

  it("should let the signature win on a one-row frame", () => {
    const frame = applyOverlays([".".repeat(60)], statusMetrics(21), "waves", 60);

    expect(frame).toEqual([signatureLine("waves", 21).padEnd(60)]);
  });

  it("should not touch the input frame", () => {
    const input = [...base];
    applyOverlays(input, statusMetrics(14), "plasma", 60);

    expect(input).toEqual(base);
  });

  it("should leave an empty frame empty", () => {
    expect(applyOverlays([], statusMetrics(14), "plasma", 60)).toEqual([]);
  });
});
