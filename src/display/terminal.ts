import type { Writable } from "stream";
import { DisplayError } from "../errors.js";
import type { Frame } from "../render/overlay.js";
import { colorForRow, type PaletteColor } from "../render/styles.js";

const ESC = "\x1b[";

export const ansi = {
  enterAlternateScreen: `${ESC}?1049h`,
  leaveAlternateScreen: `${ESC}?1049l`,
  hideCursor: `${ESC}?25l`,
  showCursor: `${ESC}?25h`,
  clear: `${ESC}H${ESC}2J`,
  reset: `${ESC}0m`,
  moveTo: (row: number, column: number) => `${ESC}${row + 1};${column + 1}H`,
};

// Dark variants map to the standard SGR colors, plain names to the bright ones.
const BACKGROUND_CODES: Record<PaletteColor, number> = {
  black: 40,
  darkRed: 41,
  darkYellow: 43,
  darkMagenta: 45,
  red: 101,
  yellow: 103,
  blue: 104,
  magenta: 105,
  cyan: 106,
};

export function backgroundColor(color: PaletteColor): string {
  return `${ESC}${BACKGROUND_CODES[color]}m`;
}

export interface TerminalInput {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
  on(event: "data", listener: (chunk: Buffer | string) => void): unknown;
  off(event: "data", listener: (chunk: Buffer | string) => void): unknown;
  resume(): unknown;
  pause(): unknown;
}

export interface TerminalDisplayOptions {
  output: Writable;
  input?: TerminalInput;
  /** Called on Ctrl+C or "q" while raw mode swallows the usual SIGINT. */
  onInterrupt?: () => void;
}

const INTERRUPT_KEYS = new Set(["\u0003", "q", "Q"]);

export class TerminalDisplay {
  private readonly output: Writable;
  private readonly input?: TerminalInput;
  private readonly onInterrupt?: () => void;
  private rawMode = false;
  private active = false;
  private outputError: Error | null = null;

  private readonly handleOutputError = (error: Error): void => {
    this.outputError = error;
  };

  private readonly handleInput = (chunk: Buffer | string): void => {
    const text = typeof chunk === "string" ? chunk : chunk.toString("utf-8");
    if ([...text].some((key) => INTERRUPT_KEYS.has(key))) {
      this.onInterrupt?.();
    }
  };

  constructor(options: TerminalDisplayOptions) {
    this.output = options.output;
    this.input = options.input;
    this.onInterrupt = options.onInterrupt;
    // Stays attached after leave(): a late EPIPE must not surface as an unhandled "error" event.
    this.output.on("error", this.handleOutputError);
  }

  isActive(): boolean {
    return this.active;
  }

  async enter(): Promise<void> {
    if (this.input?.isTTY && this.input.setRawMode) {
      this.input.setRawMode(true);
      this.input.on("data", this.handleInput);
      this.input.resume();
      this.rawMode = true;
    }
    this.active = true;
    await this.write(ansi.enterAlternateScreen + ansi.hideCursor);
  }

  async draw(frame: Frame, palette: readonly PaletteColor[]): Promise<void> {
    await this.write(ansi.clear);
    for (let row = 0; row < frame.length; row++) {
      await this.write(
        ansi.moveTo(row, 0) + backgroundColor(colorForRow(palette, row)) + frame[row] + ansi.reset
      );
    }
  }

  /** Undoes everything enter() did. Raw mode is restored first so a dead output stream cannot block it. */
  async leave(): Promise<void> {
    if (!this.active) {
      return;
    }
    this.active = false;
    if (this.rawMode && this.input) {
      this.input.off("data", this.handleInput);
      this.input.setRawMode?.(false);
      this.input.pause();
      this.rawMode = false;
    }
    await this.write(ansi.reset + ansi.showCursor + ansi.leaveAlternateScreen);
  }

  private write(chunk: string): Promise<void> {
    if (this.outputError) {
      return Promise.reject(
        new DisplayError(`Terminal output failed: ${this.outputError.message}`, { cause: this.outputError })
      );
    }
    return new Promise((resolve, reject) => {
      this.output.write(chunk, (error) => {
        if (error) {
          reject(new DisplayError(`Failed to write to terminal: ${error.message}`, { cause: error }));
        } else {
          resolve();
        }
      });
    });
  }
}

/**
 * Runs `fn` with the terminal in live mode and restores it on every exit path.
 * If `fn` fails, that error is the one rethrown; a restore failure is only logged.
 */
export async function withTerminal<T>(
  display: TerminalDisplay,
  fn: (display: TerminalDisplay) => Promise<T>
): Promise<T> {
  let result: T;
  try {
    await display.enter();
    result = await fn(display);
  } catch (error) {
    await display.leave().catch((leaveError: unknown) => {
      console.error("[Display] Failed to restore terminal:", leaveError);
    });
    throw error;
  }
  await display.leave();
  return result;
}
